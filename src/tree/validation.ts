import { CycleDetectedError, DuplicateIdError } from '../errors/tree.js';
import { createModuleLogger } from '../utils/logger.js';
import { requireAccessors } from './contract.js';
import type { TreeAccessors } from './types.js';

const logger = createModuleLogger('TreeValidation');

/**
 * Strict-mode checks over a flat collection, run before assembly.
 *
 * Default conversion is permissive: duplicate ids share a bucket and cycles
 * are the caller's problem. These checks let a caller reject both up front.
 */

export type ValidationAccessors<F, T> = Pick<TreeAccessors<F, T>, 'getId' | 'getParentId' | 'isRoot'>;

export interface ValidationResult<T> {
  isValid: boolean;
  errors: ValidationError<T>[];
  warnings: ValidationWarning<T>[];
}

export type ValidationError<T> =
  | { type: 'duplicate_id'; id: T; count: number; message: string }
  | { type: 'cycle'; id: T; cyclePath: T[]; message: string };

export interface ValidationWarning<T> {
  type: 'orphaned_child';
  id: T;
  message: string;
  details?: Record<string, unknown>;
}

const VALIDATION_ACCESSORS = ['getId', 'getParentId', 'isRoot'] as const;

/**
 * Checks a flat collection for duplicate ids and parent-id cycles, and warns
 * about non-root records whose parent is missing (those never reach the tree).
 *
 * Parent lookups use the first record carrying each id.
 */
export function validateFlatCollection<F, T>(
  source: Iterable<F> | null | undefined,
  accessors: ValidationAccessors<F, T>
): ValidationResult<T> {
  requireAccessors(accessors, VALIDATION_ACCESSORS, 'validateFlatCollection');
  const { getId, getParentId, isRoot } = accessors;

  const records = source == null ? [] : Array.from(source);
  const errors: ValidationError<T>[] = [];
  const warnings: ValidationWarning<T>[] = [];

  const firstById = new Map<T, F>();
  const idCounts = new Map<T, number>();
  for (const record of records) {
    const id = getId(record);
    if (!firstById.has(id)) firstById.set(id, record);
    idCounts.set(id, (idCounts.get(id) ?? 0) + 1);
  }

  for (const [id, count] of idCounts) {
    if (count > 1) {
      errors.push({
        type: 'duplicate_id',
        id,
        count,
        message: `Duplicate id found: ${String(id)} (appears ${count} times)`,
      });
    }
  }

  // Ids whose parent chain has already been followed to its end
  const settled = new Set<T>();
  for (const record of records) {
    if (isRoot(record)) continue;

    const parentId = getParentId(record);
    if (!firstById.has(parentId)) {
      warnings.push({
        type: 'orphaned_child',
        id: getId(record),
        message: `Parent ${String(parentId)} of ${String(getId(record))} does not exist`,
        details: { parentId },
      });
    }

    const cycle = followParentChain(record, accessors, firstById, settled);
    if (cycle) {
      errors.push({
        type: 'cycle',
        id: cycle.id,
        cyclePath: cycle.path,
        message: `Parent-id cycle detected: ${cycle.path.map(String).join(' -> ')}`,
      });
    }
  }

  if (errors.length > 0) {
    logger.warn({ errors: errors.length, warnings: warnings.length }, 'Flat collection failed validation');
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Throws for the first problem {@link validateFlatCollection} reports.
 */
export function assertValidFlatCollection<F, T>(
  source: Iterable<F> | null | undefined,
  accessors: ValidationAccessors<F, T>
): void {
  const [first] = validateFlatCollection(source, accessors).errors;
  if (!first) return;

  if (first.type === 'duplicate_id') {
    throw new DuplicateIdError(first.id, first.count, 'validateFlatCollection');
  }
  throw new CycleDetectedError(first.message, 'validateFlatCollection', first.cyclePath);
}

/**
 * Walks up from `record` until a root, a missing parent, or an already settled
 * id. Returns the cycle when the walk comes back onto itself.
 */
function followParentChain<F, T>(
  record: F,
  { getId, getParentId, isRoot }: ValidationAccessors<F, T>,
  firstById: ReadonlyMap<T, F>,
  settled: Set<T>
): { id: T; path: T[] } | null {
  const chain: T[] = [];
  const onChain = new Set<T>();
  let cycle: { id: T; path: T[] } | null = null;

  let current = record;
  for (;;) {
    const id = getId(current);
    if (settled.has(id)) break;
    if (onChain.has(id)) {
      cycle = { id, path: chain.slice(chain.indexOf(id)) };
      break;
    }
    chain.push(id);
    onChain.add(id);

    if (isRoot(current)) break;
    const parent = firstById.get(getParentId(current));
    if (parent === undefined) break;
    current = parent;
  }

  for (const id of chain) settled.add(id);
  return cycle;
}
