export {
  OperationRegistry,
  type ReclaimableRegistry,
  type CreateOperationParams,
} from './operation-registry.js';
