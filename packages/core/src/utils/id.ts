/**
 * ID Generation Utilities
 */

import { randomUUID, randomBytes } from 'node:crypto';

export type IdLength = 'short' | 'medium' | 'long' | 'full';

export interface GenerateIdOptions {
  prefix?: string;
  length?: IdLength;
}

const LENGTH_CONFIG: Record<IdLength, number> = {
  short: 8,    // 8 chars: ~48 bits entropy
  medium: 12,  // 12 chars: ~72 bits entropy
  long: 16,    // 16 chars: ~96 bits entropy
  full: 32,    // 32 chars: full UUID without hyphens
};

// Operation ids name staging directories, so they must be safe path segments
const OPERATION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/**
 * Generate a unique ID with optional prefix and configurable length.
 *
 * @example
 * generateId() // "a1b2c3d4e5f6" (medium, no prefix)
 * generateId({ prefix: 'op' }) // "op_a1b2c3d4e5f6"
 * generateId({ length: 'full' }) // "a1b2c3d4e5f6a7b8c9d0e1f2a3b4c5d6"
 */
export function generateId(options: GenerateIdOptions = {}): string {
  const { prefix, length = 'medium' } = options;

  let id: string;
  if (length === 'full') {
    id = randomUUID().replace(/-/g, '');
  } else {
    const bytes = Math.ceil(LENGTH_CONFIG[length] / 2);
    id = randomBytes(bytes).toString('hex').slice(0, LENGTH_CONFIG[length]);
  }

  return prefix ? `${prefix}_${id}` : id;
}

/**
 * Generate a transfer operation ID.
 */
export function generateOperationId(length: IdLength = 'full'): string {
  return generateId({ prefix: 'op', length });
}

export function isValidOperationId(id: string): boolean {
  return OPERATION_ID_PATTERN.test(id);
}
