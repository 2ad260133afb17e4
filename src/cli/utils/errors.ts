/**
 * Shared CLI error handling utilities
 */

import { describeError } from '../../core/errors.js';
import { error } from './output.js';

/**
 * Print error message and exit with code 1
 */
export function handleError(err: unknown): never {
  error(describeError(err));
  process.exit(1);
}
