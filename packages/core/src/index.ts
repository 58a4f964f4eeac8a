/**
 * @snapferry/core
 *
 * Transfer Protocol Core - Types, Operation State Machine, and Error Definitions
 */

// Types
export * from './types/index.js';

// Utils
export * from './utils/index.js';

// State Machine - Operation
export {
  OperationStateMachine,
  isTerminalStatus,
  isValidStatusTransition,
  createOperation,
  type OperationEvent,
  type OperationTransitionResult,
} from './state-machine/index.js';

// Registry
export {
  OperationRegistry,
  type ReclaimableRegistry,
  type CreateOperationParams,
} from './registry/index.js';

// Errors
export * from './errors/index.js';
