/**
 * Outcome of a repository read that may miss.
 * Repositories return this; services decide whether a miss is an error.
 */
export type Lookup<T> = Found<T> | Absent;

export interface Found<T> {
  readonly found: true;
  readonly value: T;
}

export interface Absent {
  readonly found: false;
}

const ABSENT: Absent = Object.freeze({ found: false });

export function found<T>(value: T): Found<T> {
  return { found: true, value };
}

export function absent(): Absent {
  return ABSENT;
}

export function isFound<T>(lookup: Lookup<T>): lookup is Found<T> {
  return lookup.found;
}

/** Unwrap a hit or throw the error built by `onAbsent`. */
export function orThrow<T>(lookup: Lookup<T>, onAbsent: () => Error): T {
  if (isFound(lookup)) return lookup.value;
  throw onAbsent();
}
