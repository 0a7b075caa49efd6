import { InvalidArgumentError } from '../shared/errors';

export type StyleConfig = {
  /** Emit vendor-prefixed duplicates of keyframes and animation declarations. */
  prefixMode: boolean;
  vendorPrefixes: readonly string[];
  animationNamePrefix: string;
  /** Seeds the document's random source; unseeded documents use Math.random. */
  seed?: number;
  indent: string;
};

export const DEFAULT_STYLE_CONFIG: StyleConfig = {
  prefixMode: false,
  vendorPrefixes: ['-webkit-'],
  animationNamePrefix: 'random-animation',
  indent: '  ',
};

const VENDOR_PREFIX_PATTERN = /^-[a-z]+-$/;
const IDENTIFIER_PATTERN = /^-?[_a-zA-Z][_a-zA-Z0-9-]*$/;

export const resolveStyleConfig = (
  overrides: Partial<StyleConfig> = {},
): StyleConfig => {
  const config: StyleConfig = { ...DEFAULT_STYLE_CONFIG, ...overrides };
  for (const prefix of config.vendorPrefixes) {
    if (!VENDOR_PREFIX_PATTERN.test(prefix)) {
      throw new InvalidArgumentError('vendorPrefixes', prefix, 'expected "-name-"');
    }
  }
  if (!IDENTIFIER_PATTERN.test(config.animationNamePrefix)) {
    throw new InvalidArgumentError(
      'animationNamePrefix',
      config.animationNamePrefix,
      'expected a CSS identifier',
    );
  }
  return config;
};
