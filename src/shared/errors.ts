export class InvalidArgumentError extends Error {
  readonly code = 'INVALID_ARGUMENT';

  constructor(
    readonly argument: string,
    readonly value: unknown,
    reason: string,
  ) {
    super(`Invalid ${argument}: ${reason} (received ${describeValue(value)})`);
    this.name = 'InvalidArgumentError';
  }
}

const describeValue = (value: unknown): string => {
  if (typeof value === 'string') return JSON.stringify(value);
  if (Array.isArray(value)) return `list of ${value.length}`;
  if (value === null || typeof value !== 'object') return String(value);
  return 'object';
};

export const isInvalidArgumentError = (
  error: unknown,
): error is InvalidArgumentError => error instanceof InvalidArgumentError;
