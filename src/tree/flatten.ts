import { createModuleLogger } from '../utils/logger.js';
import { requireArray, requireFunction } from './contract.js';
import type { ChildrenAccessor, IncludeFilter, Sequence } from './types.js';
import { walkTree } from './walker.js';

const logger = createModuleLogger('Flattener');

const includeAll = (): boolean => true;

/**
 * Append every node of the tree that passes `includeIf` to `target`, in
 * pre-order. A rejected node's descendants are still visited and tested.
 *
 * @returns `target`
 */
export function flattenTreeInto<F>(
  roots: Sequence<F>,
  getChildren: ChildrenAccessor<F>,
  includeIf: IncludeFilter<F>,
  target: F[]
): F[] {
  requireFunction(includeIf, 'includeIf', 'flattenTreeInto');
  requireArray(target, 'target', 'flattenTreeInto');

  const before = target.length;
  walkTree(roots, getChildren, (node) => {
    if (includeIf(node)) {
      target.push(node);
    }
  });

  logger.debug({ appended: target.length - before }, 'Flattened tree');
  return target;
}

/**
 * Pre-order list of the tree's nodes that pass `includeIf` (all of them by default)
 */
export function flattenTree<F>(
  roots: Sequence<F>,
  getChildren: ChildrenAccessor<F>,
  includeIf: IncludeFilter<F> = includeAll
): F[] {
  return flattenTreeInto(roots, getChildren, includeIf, []);
}
