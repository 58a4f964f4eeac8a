export {
  generateId,
  generateOperationId,
  isValidOperationId,
  type IdLength,
  type GenerateIdOptions,
} from './id.js';
export { formatSize, formatTimestamp } from './format.js';
