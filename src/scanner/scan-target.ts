import { ScanTargetSchema, type ScanTargetInput } from '../schemas/config.js';
import { ValidationError } from '../utils/errors.js';
import type { ScanTarget } from '../types/scanner.js';

export const DEFAULT_CONCURRENCY = 50;
export const DEFAULT_TIMEOUT_SECONDS = 3;
export const FAST_TIMEOUT_SECONDS = 1;

export const INVALID_RANGE_MESSAGE = 'Invalid port range. Ports must be 1-65535 and start <= end';

export function createScanTarget(input: ScanTargetInput): ScanTarget {
  const parsed = ScanTargetSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid scan target', {
      field: issue?.path.join('.'),
    });
  }
  return parsed.data;
}

// Inclusive range; rejected before anything touches the network
export function portRange(start: number, end: number): number[] {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start > end || start < 1 || end > 65535) {
    throw new ValidationError(INVALID_RANGE_MESSAGE, { start, end });
  }
  return Array.from({ length: end - start + 1 }, (_, i) => start + i);
}
