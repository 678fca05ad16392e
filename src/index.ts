/**
 * rowtree - generic list/tree transformations for records stored as
 * id + parent-id rows
 *
 * For specialized functionality, see:
 * - rowtree/errors - Error classes and helpers
 */

export * from './tree/index.js';

export {
  RowtreeError,
  TreeError,
  CycleDetectedError,
  DuplicateIdError,
  TreeContractError,
  isRowtreeError,
  type TreeErrorKind,
} from './errors/index.js';

export { configSchema, type AppConfig } from './config/index.js';
export { createModuleLogger, createLoggerFactory, LoggerFactory } from './utils/logger.js';
