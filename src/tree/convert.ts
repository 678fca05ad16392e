import { cfg } from '../config/index.js';
import { wrapError } from '../errors/base.js';
import { createModuleLogger, logError, startTimer } from '../utils/logger.js';
import { assembleTree } from './assembler.js';
import { requireAccessors, requireArrayOrNull, requirePositiveInteger } from './contract.js';
import { GroupIndex } from './group-index.js';
import type { ConcurrentConvertOptions, ConvertOptions, TreeAccessors } from './types.js';
import { assertValidFlatCollection } from './validation.js';

const logger = createModuleLogger('TreeConvert');

const TREE_ACCESSORS = ['getId', 'getParentId', 'isRoot', 'setChildren'] as const;

// Roots are split off before grouping, so the index sees none
const noRoots = (): boolean => false;

/**
 * Build a tree from an array of records.
 *
 * Records passing `isRoot` become the returned top level, in source order;
 * every other record is attached under the record whose id equals its parent
 * id. Children keep their source order. Records whose parent never shows up
 * are dropped.
 *
 * @example
 * ```typescript
 * const roots = listToTree(rows, {
 *   getId: (row) => row.id,
 *   getParentId: (row) => row.parentId,
 *   isRoot: (row) => row.parentId === null,
 *   setChildren: (row, children) => {
 *     row.children = children;
 *   },
 * });
 * ```
 */
export function listToTree<F, T>(
  source: readonly F[] | null | undefined,
  accessors: TreeAccessors<F, T>,
  options: ConvertOptions<F> = {}
): F[] {
  requireArrayOrNull(source, 'source', 'listToTree');
  return iterableToTree(source, accessors, options);
}

/**
 * Same as {@link listToTree} for a lazily produced sequence, such as a
 * generator. The sequence is consumed exactly once.
 */
export function iterableToTree<F, T>(
  source: Iterable<F> | null | undefined,
  accessors: TreeAccessors<F, T>,
  options: ConvertOptions<F> = {}
): F[] {
  requireAccessors(accessors, TREE_ACCESSORS, 'iterableToTree');
  if (source == null) return [];

  const endTimer = startTimer(logger, 'iterableToTree');
  const records = prepare(source, accessors, options);
  const { roots, rest } = partitionRoots(records, accessors);
  const index = GroupIndex.build(rest, accessors.getParentId, noRoots);

  assembleTree(roots, index, accessors.getId, accessors.setChildren, options.onVisit, options);
  endTimer({ roots: roots.length, buckets: index.size });
  return roots;
}

/**
 * {@link listToTree} with the grouping pass split into partitions that run as
 * separate tasks. Root order still follows the source; child order within a
 * parent is only guaranteed when everything fits one partition.
 *
 * An error thrown by an accessor during grouping rejects the promise as a
 * `RowtreeError` carrying the original as `context.cause`.
 */
export async function listToTreeConcurrent<F, T>(
  source: readonly F[] | null | undefined,
  accessors: TreeAccessors<F, T>,
  options: ConcurrentConvertOptions<F> = {}
): Promise<F[]> {
  requireArrayOrNull(source, 'source', 'listToTreeConcurrent');
  requireAccessors(accessors, TREE_ACCESSORS, 'listToTreeConcurrent');
  const partitionSize = options.partitionSize ?? cfg.TREE_PARTITION_SIZE;
  requirePositiveInteger(partitionSize, 'partitionSize', 'listToTreeConcurrent');
  if (source == null) return [];

  const endTimer = startTimer(logger, 'listToTreeConcurrent');
  const records = prepare(source, accessors, options);
  const { roots, rest } = partitionRoots(records, accessors);
  let index: GroupIndex<F, T>;
  try {
    index = await GroupIndex.buildConcurrent(rest, accessors.getParentId, noRoots, { partitionSize });
  } catch (error) {
    const wrapped = wrapError(error, 'tree', 'listToTreeConcurrent', { records: rest.length, partitionSize });
    logError(logger, wrapped, { operation: 'listToTreeConcurrent' });
    throw wrapped;
  }

  assembleTree(roots, index, accessors.getId, accessors.setChildren, options.onVisit, options);
  endTimer({ roots: roots.length, buckets: index.size });
  return roots;
}

/**
 * Split records into roots and the rest, keeping source order in both
 */
export function partitionRoots<F, T>(
  source: Iterable<F>,
  { isRoot }: Pick<TreeAccessors<F, T>, 'isRoot'>
): { roots: F[]; rest: F[] } {
  const roots: F[] = [];
  const rest: F[] = [];
  for (const record of source) {
    if (isRoot(record)) {
      roots.push(record);
    } else {
      rest.push(record);
    }
  }
  return { roots, rest };
}

function prepare<F, T>(
  source: Iterable<F>,
  accessors: TreeAccessors<F, T>,
  options: ConvertOptions<F>
): Iterable<F> {
  if (!(options.strict ?? cfg.TREE_STRICT)) return source;

  const records = Array.from(source);
  assertValidFlatCollection(records, accessors);
  return records;
}
