import { ValidationError } from "../errors.js";
import { isNonEmptyString } from "../utils/typeGuards.js";

import { Message } from "./Message.js";

import type { MessageInit, MessageParts } from "./Message.js";

export interface RequestInit extends MessageInit {
  method: string;
  url: string | URL;
}

function assertValidMethod(method: string): void {
  if (!isNonEmptyString(method)) {
    throw new ValidationError("Request method must be a non-empty string");
  }
}

/**
 * Checks that a URL is absolute and has a host. A string is kept as given;
 * a URL object is stored as its href.
 */
function validateUrl(url: string | URL): string {
  let parsed: URL;
  try {
    parsed = typeof url === "string" ? new URL(url) : url;
  } catch {
    throw new ValidationError(`Request URL must be absolute: ${String(url)}`);
  }

  if (parsed.host === "") {
    throw new ValidationError(`Request URL must include a host: ${parsed.href}`);
  }

  return typeof url === "string" ? url : parsed.href;
}

/**
 * Outgoing HTTP request.
 */
export class Request extends Message<Request> {
  readonly method: string;
  readonly url: string;

  constructor(init: RequestInit) {
    super(init);
    assertValidMethod(init.method);
    this.method = init.method;
    this.url = validateUrl(init.url);
  }

  getMethod(): string {
    return this.method;
  }

  getUrl(): string {
    return this.url;
  }

  withMethod(method: string): Request {
    return new Request({ ...this.parts(), method, url: this.url });
  }

  withUrl(url: string | URL): Request {
    return new Request({ ...this.parts(), method: this.method, url });
  }

  protected copy(parts: MessageParts): Request {
    return new Request({ ...parts, method: this.method, url: this.url });
  }
}
