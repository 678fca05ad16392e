import { TreeContractError } from '../errors/tree.js';

/**
 * True for `null`, `undefined` or an empty array.
 */
export function isEmptySequence<F>(source: readonly F[] | null | undefined): source is null | undefined | readonly [] {
  return source == null || source.length === 0;
}

/**
 * Fails loudly when a required callback is missing. The types already forbid
 * this; the check covers untyped callers.
 */
export function requireFunction(value: unknown, parameter: string, operation: string): void {
  if (typeof value !== 'function') {
    throw new TreeContractError(
      `${parameter} must be a function, received ${value === null ? 'null' : typeof value}`,
      parameter,
      operation
    );
  }
}

/**
 * Same as {@link requireFunction}, but an absent optional callback passes.
 */
export function optionalFunction(value: unknown, parameter: string, operation: string): void {
  if (value !== undefined) {
    requireFunction(value, parameter, operation);
  }
}

export function requireAccessors(
  accessors: unknown,
  keys: readonly string[],
  operation: string
): void {
  if (typeof accessors !== 'object' || accessors === null) {
    throw new TreeContractError('accessors must be an object', 'accessors', operation);
  }
  for (const key of keys) {
    requireFunction(Reflect.get(accessors, key), `accessors.${key}`, operation);
  }
}

export function requireArrayOrNull(value: unknown, parameter: string, operation: string): void {
  if (value != null && !Array.isArray(value)) {
    throw new TreeContractError(`${parameter} must be an array`, parameter, operation);
  }
}

export function requireArray(value: unknown, parameter: string, operation: string): void {
  if (!Array.isArray(value)) {
    throw new TreeContractError(`${parameter} must be an array`, parameter, operation);
  }
}

export function requirePositiveInteger(value: unknown, parameter: string, operation: string): void {
  if (!Number.isInteger(value) || Number(value) < 1) {
    throw new TreeContractError(
      `${parameter} must be a positive integer, received ${String(value)}`,
      parameter,
      operation
    );
  }
}

export function requireNonNegativeInteger(value: unknown, parameter: string, operation: string): void {
  if (!Number.isInteger(value) || Number(value) < 0) {
    throw new TreeContractError(
      `${parameter} must be a non-negative integer, received ${String(value)}`,
      parameter,
      operation
    );
  }
}
