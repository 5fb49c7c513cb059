/**
 * Error taxonomy for the message model and the adapter boundary.
 */

import { extractErrorMessage } from "./utils/errorMessage.js";

import type { Response } from "./message/Response.js";

export type HttpAdapterErrorCode =
  | "VALIDATION_ERROR"
  | "STREAM_DETACHED"
  | "REQUEST_FAILED";

export class HttpAdapterError extends Error {
  readonly code: HttpAdapterErrorCode;

  constructor(code: HttpAdapterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HttpAdapterError";
    this.code = code;
  }
}

/**
 * Raised while constructing a message from malformed input.
 */
export class ValidationError extends HttpAdapterError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
    this.name = "ValidationError";
  }
}

export class StreamDetachedError extends HttpAdapterError {
  constructor(operation: string) {
    super("STREAM_DETACHED", `Cannot ${operation}: stream has been detached`);
    this.name = "StreamDetachedError";
  }
}

/**
 * The transport failed to complete an exchange.
 *
 * `request` is the transport-native request that was dispatched. `response` is
 * only set when the transport produced one before failing (an HTTP error
 * status, for instance); it is `null` for connection-level failures.
 */
export class RequestError<TNativeRequest = unknown> extends HttpAdapterError {
  readonly request: TNativeRequest;
  readonly response: Response | null;

  constructor(
    message: string,
    request: TNativeRequest,
    response: Response | null,
    cause: unknown,
  ) {
    super("REQUEST_FAILED", message, { cause });
    this.name = "RequestError";
    this.request = request;
    this.response = response;
  }

  static create<TNativeRequest>(
    request: TNativeRequest,
    response: Response | null,
    cause: unknown,
  ): RequestError<TNativeRequest> {
    const label = response
      ? `Request failed with status ${response.statusCode} ${response.reasonPhrase}`
      : "Request failed before a response was received";

    return new RequestError(`${label}: ${extractErrorMessage(cause)}`, request, response, cause);
  }
}
