export type NamePool = {
  next: () => string;
  reserve: (name: string) => void;
  has: (name: string) => boolean;
  readonly size: number;
};

/** Issues `${prefix}-1`, `${prefix}-2`, ... skipping any name already taken. */
export const createNamePool = (prefix: string): NamePool => {
  const taken = new Set<string>();
  let counter = 0;
  return {
    next: () => {
      let name: string;
      do {
        counter += 1;
        name = `${prefix}-${counter}`;
      } while (taken.has(name));
      taken.add(name);
      return name;
    },
    reserve: (name) => {
      taken.add(name);
    },
    has: (name) => taken.has(name),
    get size() {
      return taken.size;
    },
  };
};
