export type ElementIdGenerator = () => string;

export const ELEMENT_ID_PREFIX = 'filterable-table';

// Several tables can share one page; ids must never repeat within a session.
export function createElementIdGenerator(prefix = ELEMENT_ID_PREFIX): ElementIdGenerator {
  const session = Math.random().toString(36).slice(2, 8) || 'session';
  let counter = 0;
  return () => {
    counter += 1;
    return `${prefix}-${session}-${counter}`;
  };
}

export const defaultElementIdGenerator: ElementIdGenerator = createElementIdGenerator();
