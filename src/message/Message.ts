/**
 * Message
 *
 * Base for Request and Response: protocol version, headers and an optional
 * body. Header access is delegated to the composed HeaderBag. Instances never
 * change; every with* call builds a new message through copy().
 */

import { DEFAULT_PROTOCOL_VERSION } from "../config.js";
import { ValidationError } from "../errors.js";
import { isNonEmptyString } from "../utils/typeGuards.js";

import { HeaderBag } from "./HeaderBag.js";

import type { HeaderRecord, RawHeaders, RawHeaderScalar } from "./HeaderBag.js";
import type { Stream } from "../stream/Stream.js";

export interface MessageInit {
  headers?: RawHeaders | HeaderBag;
  body?: Stream | null;
  protocolVersion?: string;
}

export interface MessageParts {
  headers: HeaderBag;
  body: Stream | null;
  protocolVersion: string;
}

export abstract class Message<TSelf extends Message<TSelf>> {
  readonly protocolVersion: string;
  readonly headers: HeaderBag;
  readonly body: Stream | null;

  protected constructor(init: MessageInit) {
    const protocolVersion = init.protocolVersion ?? DEFAULT_PROTOCOL_VERSION;
    if (!isNonEmptyString(protocolVersion)) {
      throw new ValidationError("Protocol version must be a non-empty string");
    }

    this.protocolVersion = protocolVersion;
    this.headers = HeaderBag.normalize(init.headers);
    this.body = init.body ?? null;
  }

  protected abstract copy(parts: MessageParts): TSelf;

  getProtocolVersion(): string {
    return this.protocolVersion;
  }

  getHeaders(): HeaderRecord {
    return this.headers.toRecord();
  }

  hasHeader(name: string): boolean {
    return this.headers.has(name);
  }

  getHeader(name: string): string[] {
    return this.headers.get(name);
  }

  getHeaderLine(name: string): string {
    return this.headers.getLine(name);
  }

  getBody(): Stream | null {
    return this.body;
  }

  withProtocolVersion(protocolVersion: string): TSelf {
    return this.copy({ ...this.parts(), protocolVersion });
  }

  withHeader(name: string, value: RawHeaderScalar | readonly RawHeaderScalar[]): TSelf {
    return this.copy({ ...this.parts(), headers: this.headers.with(name, value) });
  }

  withAddedHeader(name: string, value: RawHeaderScalar | readonly RawHeaderScalar[]): TSelf {
    return this.copy({ ...this.parts(), headers: this.headers.withAdded(name, value) });
  }

  withoutHeader(name: string): TSelf {
    return this.copy({ ...this.parts(), headers: this.headers.without(name) });
  }

  withBody(body: Stream | null): TSelf {
    return this.copy({ ...this.parts(), body });
  }

  protected parts(): MessageParts {
    return {
      headers: this.headers,
      body: this.body,
      protocolVersion: this.protocolVersion,
    };
  }
}
