/**
 * Error handling utilities and helper functions
 */

import { BrokerLinkError } from './types.js';

/**
 * Normalize any thrown value into a plain record for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof BrokerLinkError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    const code = getErrorCode(error);
    return {
      name: error.name,
      message: error.message,
      ...(code !== undefined && { code }),
    };
  }

  return {
    error: String(error),
  };
}

/**
 * The string `code` carried by Node system errors (ETIMEDOUT, ENOTFOUND, ...)
 * and by every BrokerLinkError
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}
