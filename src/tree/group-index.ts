import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { cfg } from '../config/index.js';
import { createModuleLogger, startTimer } from '../utils/logger.js';
import { requireArrayOrNull, requireFunction, requirePositiveInteger } from './contract.js';
import type { ParentIdAccessor, RootPredicate } from './types.js';

const logger = createModuleLogger('GroupIndex');

export interface ConcurrentBuildOptions {
  /** Records per partition; defaults to `TREE_PARTITION_SIZE` */
  partitionSize?: number;
}

/**
 * Children of every non-root record, bucketed by parent id.
 *
 * A missing bucket means "no children": {@link GroupIndex.get} hands back a
 * fresh empty array for it. Buckets themselves are shared, so records with a
 * duplicate id all receive the same array.
 */
export class GroupIndex<F, T> {
  private readonly buckets = new Map<T, F[]>();
  private records = 0;

  /**
   * Single pass over the source. Bucket order follows source order.
   */
  static build<F, T>(
    source: Iterable<F> | null | undefined,
    getParentId: ParentIdAccessor<F, T>,
    isRoot: RootPredicate<F>
  ): GroupIndex<F, T> {
    requireFunction(getParentId, 'getParentId', 'GroupIndex.build');
    requireFunction(isRoot, 'isRoot', 'GroupIndex.build');

    const index = new GroupIndex<F, T>();
    if (source == null) return index;

    for (const record of source) {
      if (!isRoot(record)) {
        index.append(getParentId(record), record);
      }
    }
    return index;
  }

  /**
   * Partitioned build: every partition fills a local index in its own task,
   * and local indexes are merged into the result as their tasks complete.
   *
   * Only per-key append is atomic. Order across partitions is not guaranteed;
   * use {@link GroupIndex.build} when child order matters.
   */
  static async buildConcurrent<F, T>(
    source: readonly F[] | null | undefined,
    getParentId: ParentIdAccessor<F, T>,
    isRoot: RootPredicate<F>,
    options: ConcurrentBuildOptions = {}
  ): Promise<GroupIndex<F, T>> {
    requireArrayOrNull(source, 'source', 'GroupIndex.buildConcurrent');
    requireFunction(getParentId, 'getParentId', 'GroupIndex.buildConcurrent');
    requireFunction(isRoot, 'isRoot', 'GroupIndex.buildConcurrent');
    const partitionSize = options.partitionSize ?? cfg.TREE_PARTITION_SIZE;
    requirePositiveInteger(partitionSize, 'partitionSize', 'GroupIndex.buildConcurrent');

    const index = new GroupIndex<F, T>();
    if (source == null || source.length === 0) return index;

    const endTimer = startTimer(logger, 'buildConcurrent');

    const partitions: Promise<void>[] = [];
    for (let start = 0; start < source.length; start += partitionSize) {
      const partition = source.slice(start, start + partitionSize);
      partitions.push(
        yieldToEventLoop().then(() => {
          index.merge(GroupIndex.build(partition, getParentId, isRoot));
        })
      );
    }
    await Promise.all(partitions);

    endTimer({ partitions: partitions.length, buckets: index.size, records: index.recordCount });
    return index;
  }

  /**
   * Children grouped under `id`, or a new empty array when there are none
   */
  get(id: T): F[] {
    return this.buckets.get(id) ?? [];
  }

  has(id: T): boolean {
    return this.buckets.has(id);
  }

  /**
   * Get-or-create the bucket for `parentId`, then append
   */
  append(parentId: T, record: F): void {
    let bucket = this.buckets.get(parentId);
    if (!bucket) {
      bucket = [];
      this.buckets.set(parentId, bucket);
    }
    bucket.push(record);
    this.records++;
  }

  /**
   * Append every bucket of `other` onto this index
   */
  merge(other: GroupIndex<F, T>): void {
    for (const [parentId, bucket] of other.buckets) {
      for (const record of bucket) {
        this.append(parentId, record);
      }
    }
  }

  keys(): IterableIterator<T> {
    return this.buckets.keys();
  }

  /** Number of buckets */
  get size(): number {
    return this.buckets.size;
  }

  /** Number of indexed (non-root) records */
  get recordCount(): number {
    return this.records;
  }
}
