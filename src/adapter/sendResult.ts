/**
 * Send Result Helpers
 *
 * Tagged outcome of a single adapter send.
 */

import type { RequestError } from '../errors.js';
import type { Response } from '../message/Response.js';

export interface SendSuccess {
  ok: true;
  response: Response | null;
}

export interface SendFailure<TNativeRequest = unknown> {
  ok: false;
  error: RequestError<TNativeRequest>;
}

export type SendResult<TNativeRequest = unknown> = SendSuccess | SendFailure<TNativeRequest>;

export function createSuccessResult(response: Response | null): SendSuccess {
  return { ok: true, response };
}

export function createFailureResult<TNativeRequest>(
  error: RequestError<TNativeRequest>,
): SendFailure<TNativeRequest> {
  return { ok: false, error };
}

/**
 * Returns the response of a success and throws the error of a failure.
 */
export function unwrapResult<TNativeRequest>(result: SendResult<TNativeRequest>): Response | null {
  if (!result.ok) {
    throw result.error;
  }
  return result.response;
}
