/**
 * Express integration for the transfer endpoints
 */

export {
  transferHandler,
  type TransferHandlerOptions,
  type TransferHandlerResult,
} from './transfer-handler.js';
