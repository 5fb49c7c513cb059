import { ValidationError } from "../errors.js";

import { Message } from "./Message.js";
import { getReasonPhrase } from "./reasonPhrases.js";

import type { MessageInit, MessageParts } from "./Message.js";

export interface ResponseInit extends MessageInit {
  statusCode: number;
  reasonPhrase?: string | null;
}

export const MIN_STATUS_CODE = 100;
export const MAX_STATUS_CODE = 599;

function assertValidStatusCode(statusCode: number): void {
  if (!Number.isInteger(statusCode)) {
    throw new ValidationError("Status code should be an integer");
  }

  if (statusCode < MIN_STATUS_CODE || MAX_STATUS_CODE < statusCode) {
    throw new ValidationError(
      `Status code must be between ${MIN_STATUS_CODE} and ${MAX_STATUS_CODE}`,
    );
  }
}

/**
 * HTTP response. When no reason phrase is given, the standard phrase for the
 * status code is used.
 */
export class Response extends Message<Response> {
  readonly statusCode: number;
  readonly reasonPhrase: string;

  constructor(init: ResponseInit) {
    super(init);
    assertValidStatusCode(init.statusCode);
    this.statusCode = init.statusCode;
    this.reasonPhrase = init.reasonPhrase || getReasonPhrase(init.statusCode);
  }

  getStatusCode(): number {
    return this.statusCode;
  }

  getReasonPhrase(): string {
    return this.reasonPhrase;
  }

  withStatus(statusCode: number, reasonPhrase?: string): Response {
    return new Response({ ...this.parts(), statusCode, reasonPhrase });
  }

  protected copy(parts: MessageParts): Response {
    return new Response({
      ...parts,
      statusCode: this.statusCode,
      reasonPhrase: this.reasonPhrase,
    });
  }
}
