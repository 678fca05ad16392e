import { cfg } from '../config/index.js';
import { CycleDetectedError, TreeContractError } from '../errors/tree.js';
import { createModuleLogger } from '../utils/logger.js';
import { isEmptySequence, optionalFunction, requireFunction, requireNonNegativeInteger } from './contract.js';
import { GroupIndex } from './group-index.js';
import type { AssembleOptions, AttachChildren, IdAccessor, VisitListener } from './types.js';

const logger = createModuleLogger('TreeAssembler');

interface AssemblyFrame<F, T> {
  node: F;
  id: T;
  depth: number;
  pending: Iterator<F>;
}

/**
 * Attach children to every node reachable from `roots`, in place.
 *
 * Each node gets `setChildren(node, index.get(getId(node)))`, even when that
 * list is empty, and `onVisit(depth, node)` fires once all of its children have
 * been visited. Runs on an explicit stack, so deep trees do not exhaust the
 * call stack; callback order is that of a recursive pre-order descent.
 *
 * Parent-id cycles make this loop forever unless `maxDepth` or `detectCycles`
 * is set.
 *
 * @returns the same `roots` array, or a new empty array when none were given
 */
export function assembleTree<F, T>(
  roots: F[] | null | undefined,
  index: GroupIndex<F, T>,
  getId: IdAccessor<F, T>,
  setChildren: AttachChildren<F>,
  onVisit?: VisitListener<F>,
  options: AssembleOptions = {}
): F[] {
  requireFunction(getId, 'getId', 'assembleTree');
  requireFunction(setChildren, 'setChildren', 'assembleTree');
  optionalFunction(onVisit, 'onVisit', 'assembleTree');
  if (!(index instanceof GroupIndex)) {
    throw new TreeContractError('index must be a GroupIndex', 'index', 'assembleTree');
  }

  // 0 turns the depth guard off
  const maxDepth = options.maxDepth ?? cfg.TREE_MAX_DEPTH;
  requireNonNegativeInteger(maxDepth, 'maxDepth', 'assembleTree');

  if (isEmptySequence(roots)) return [];

  const detectCycles = options.detectCycles ?? false;

  const stack: AssemblyFrame<F, T>[] = [];
  // ids on the current root-to-node path, only tracked for detectCycles
  const pathIds = new Set<T>();

  const enter = (node: F, depth: number): void => {
    const id = getId(node);
    if (maxDepth > 0 && depth > maxDepth) {
      throw cycleError(`Tree depth exceeded maximum of ${maxDepth}`, stack, id, { maxDepth, depth });
    }
    if (detectCycles) {
      if (pathIds.has(id)) {
        throw cycleError(`Id ${String(id)} repeats on its own ancestor path`, stack, id, { depth });
      }
      pathIds.add(id);
    }

    const children = index.get(id);
    setChildren(node, children);
    stack.push({ node, id, depth, pending: children[Symbol.iterator]() });
  };

  const leave = (frame: AssemblyFrame<F, T>): void => {
    if (detectCycles) {
      pathIds.delete(frame.id);
    }
    onVisit?.(frame.depth, frame.node);
  };

  let visited = 0;
  for (const root of roots) {
    enter(root, 0);

    let frame = stack.at(-1);
    while (frame !== undefined) {
      const step = frame.pending.next();
      if (!step.done) {
        enter(step.value, frame.depth + 1);
      } else {
        stack.pop();
        visited++;
        leave(frame);
      }
      frame = stack.at(-1);
    }
  }

  logger.debug({ roots: roots.length, nodes: visited }, 'Assembled tree');
  return roots;
}

function cycleError<F, T>(
  message: string,
  stack: readonly AssemblyFrame<F, T>[],
  id: T,
  context: Record<string, unknown>
): CycleDetectedError {
  const path = [...stack.map((frame) => frame.id), id];
  logger.warn({ ...context, pathLength: path.length }, message);
  return new CycleDetectedError(message, 'assembleTree', path, context);
}
