/**
 * Tree operations: list → tree assembly, depth-first walking and flattening
 */

export { GroupIndex, type ConcurrentBuildOptions } from './group-index.js';
export { assembleTree } from './assembler.js';
export { listToTree, iterableToTree, listToTreeConcurrent, partitionRoots } from './convert.js';
export { walkTree } from './walker.js';
export { flattenTree, flattenTreeInto } from './flatten.js';
export {
  validateFlatCollection,
  assertValidFlatCollection,
  type ValidationAccessors,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
} from './validation.js';
export { isEmptySequence } from './contract.js';
export type {
  IdAccessor,
  ParentIdAccessor,
  RootPredicate,
  ChildrenAccessor,
  AttachChildren,
  IncludeFilter,
  VisitListener,
  WalkCallback,
  TreeAccessors,
  AssembleOptions,
  ConvertOptions,
  ConcurrentConvertOptions,
  Sequence,
} from './types.js';
