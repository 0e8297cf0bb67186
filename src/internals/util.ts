/**
 * Additional generic TypeScript functions used in the project.
 *
 * @packageDocumentation
 */

import { InternalException } from "./exceptions";

export const differenceSets = <T>(lhs: Set<T>, rhs: Set<T>): Set<T> =>
  new Set([...lhs].filter((item) => !rhs.has(item)));

/**
 * Unreachable case for exhaustive checking.
 */
export function unreachable(value: never): never {
  throw InternalException.make(`Reached impossible case`, { node: value });
}

/**
 * Splits a comma-separated CLI value into trimmed, non-empty entries.
 */
export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");
}
