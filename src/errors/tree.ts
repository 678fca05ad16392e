/**
 * Tree-specific error classes
 *
 * Raised by the opt-in guards and by contract checks on public entry points.
 */

import { RowtreeError } from './base.js';

export type TreeErrorKind = 'CycleDetected' | 'DuplicateId' | 'ContractViolation';

/**
 * Base class for tree errors, discriminated by `kind`
 */
export abstract class TreeError extends RowtreeError {
  abstract readonly kind: TreeErrorKind;

  constructor(
    message: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'tree', operation, context);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), kind: this.kind };
  }
}

/**
 * Thrown when the depth guard trips or a node's id repeats on its own
 * ancestor path. Both mean the parent-id chains are not acyclic.
 */
export class CycleDetectedError extends TreeError {
  override readonly kind = 'CycleDetected' as const;

  constructor(
    message: string,
    operation: string,
    public readonly path: readonly unknown[],
    context?: Record<string, unknown>
  ) {
    super(message, operation, { ...context, path });
  }
}

/**
 * Thrown in strict mode when more than one record carries the same id
 */
export class DuplicateIdError extends TreeError {
  override readonly kind = 'DuplicateId' as const;

  constructor(
    public readonly id: unknown,
    public readonly count: number,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(`Duplicate id found: ${String(id)} (appears ${count} times)`, operation, {
      ...context,
      id,
      count,
    });
  }
}

/**
 * Thrown when a caller passes something other than what the signature asks for,
 * e.g. a missing accessor function
 */
export class TreeContractError extends TreeError {
  override readonly kind = 'ContractViolation' as const;

  constructor(
    message: string,
    public readonly parameter: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, operation, { ...context, parameter });
  }
}
