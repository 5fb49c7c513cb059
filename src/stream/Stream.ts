/**
 * Stream
 *
 * Owns a single Node.js Readable handle. Ownership leaves the Stream through
 * detach(); from then on the Stream holds nothing and whoever received the
 * handle is responsible for reading and closing it.
 */

import { StreamDetachedError } from "../errors.js";
import { streamToString, toReadable } from "../utils/http/streamUtils.js";

import type { Readable } from "stream";

export interface StreamMetadata {
  detached: boolean;
  readable: boolean;
  ended: boolean;
  destroyed: boolean;
}

export class Stream {
  private handle: Readable | null;

  constructor(handle: Readable) {
    this.handle = handle;
  }

  static from(content: string | Buffer | Uint8Array): Stream {
    return new Stream(toReadable(content));
  }

  get isDetached(): boolean {
    return this.handle === null;
  }

  /**
   * Hands the raw handle to the caller. A second call throws.
   */
  detach(): Readable {
    const handle = this.handle;
    if (handle === null) {
      throw new StreamDetachedError("detach");
    }
    this.handle = null;
    return handle;
  }

  isReadable(): boolean {
    return this.handle !== null && this.handle.readable;
  }

  /**
   * Reads the remaining content as UTF-8 and releases the handle.
   */
  async getContents(): Promise<string> {
    const handle = this.detach();
    return streamToString(handle);
  }

  /** No-op once detached. */
  close(): void {
    if (this.handle === null) {
      return;
    }
    const handle = this.handle;
    this.handle = null;
    handle.destroy();
  }

  getMetadata(): StreamMetadata {
    const handle = this.handle;
    if (handle === null) {
      return { detached: true, readable: false, ended: false, destroyed: false };
    }
    return {
      detached: false,
      readable: handle.readable,
      ended: handle.readableEnded,
      destroyed: handle.destroyed,
    };
  }
}
