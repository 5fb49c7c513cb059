import { isRecord } from "./typeGuards.js";

/**
 * Extracts a readable message from an unknown thrown value.
 *
 * Handles:
 * - Error instances (message property)
 * - String errors
 * - Objects with message/error properties
 * - null/undefined
 */
export function extractErrorMessage(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error (empty response)';
  }

  if (error instanceof Error) {
    return error.message || 'Unknown error';
  }

  if (typeof error === 'string') {
    return error.trim() || 'Unknown error (empty string)';
  }

  if (isRecord(error)) {
    const messageVal = error['message'];
    if (typeof messageVal === 'string' && messageVal.trim()) {
      return messageVal.trim();
    }

    // { error: '...' } or { error: { message: '...' } }
    const errorProp = error['error'];
    if (typeof errorProp === 'string' && errorProp.trim()) {
      return errorProp.trim();
    }
    if (isRecord(errorProp)) {
      const nestedMessage = errorProp['message'];
      if (typeof nestedMessage === 'string' && nestedMessage.trim()) {
        return nestedMessage.trim();
      }
    }

    try {
      const stringified = JSON.stringify(error);
      if (stringified && stringified !== '{}') {
        return `Error details: ${stringified}`;
      }
    } catch {
      // circular structures fall through to the default
    }
  }

  return 'Unknown error';
}
