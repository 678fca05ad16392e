/**
 * Centralized error handling for rowtree
 */

export {
  RowtreeError,
  wrapError,
  isRowtreeError,
} from './base.js';

export {
  TreeError,
  CycleDetectedError,
  DuplicateIdError,
  TreeContractError,
  type TreeErrorKind,
} from './tree.js';
