export {
  OperationStateMachine,
  isTerminalStatus,
  isValidStatusTransition,
  createOperation,
  type OperationEvent,
  type OperationTransitionResult,
} from './operation.js';
