import { isEmptySequence, optionalFunction, requireFunction } from './contract.js';
import type { ChildrenAccessor, Sequence, WalkCallback } from './types.js';

interface WalkFrame<F> {
  node: F;
  depth: number;
  pending: Iterator<F>;
}

/**
 * Depth-first walk over any nested structure.
 *
 * For each node, in sequence order: `preVisit(node, depth)`, then the whole
 * subtree under `getChildren(node)`, then `postVisit(node, depth)`. The given
 * nodes sit at depth 0. An empty or absent sequence is a no-op, and so is a
 * `null`/`undefined` children list.
 *
 * @example
 * ```typescript
 * walkTree(menu, (item) => item.items, (item, depth) => {
 *   console.log(`${'  '.repeat(depth)}${item.label}`);
 * });
 * ```
 */
export function walkTree<F>(
  nodes: Sequence<F>,
  getChildren: ChildrenAccessor<F>,
  preVisit?: WalkCallback<F>,
  postVisit?: WalkCallback<F>
): void {
  requireFunction(getChildren, 'getChildren', 'walkTree');
  optionalFunction(preVisit, 'preVisit', 'walkTree');
  optionalFunction(postVisit, 'postVisit', 'walkTree');

  if (isEmptySequence(nodes)) return;

  const stack: WalkFrame<F>[] = [];
  const enter = (node: F, depth: number): void => {
    preVisit?.(node, depth);
    const children = getChildren(node) ?? [];
    stack.push({ node, depth, pending: children[Symbol.iterator]() });
  };

  for (const node of nodes) {
    enter(node, 0);

    let frame = stack.at(-1);
    while (frame !== undefined) {
      const step = frame.pending.next();
      if (!step.done) {
        enter(step.value, frame.depth + 1);
      } else {
        stack.pop();
        postVisit?.(frame.node, frame.depth);
      }
      frame = stack.at(-1);
    }
  }
}
