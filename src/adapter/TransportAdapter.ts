/**
 * Transport Adapter
 *
 * Maps abstract Request/Response messages onto an injected transport and
 * translates the transport's failures into RequestError. Holds nothing but
 * the transport reference, so concurrent sends are as safe as the transport.
 */

import { RequestError, ValidationError } from "../errors.js";
import { describeFailure, describeRequest, describeResponse, logger } from "../logging/index.js";
import { Response } from "../message/Response.js";
import { Stream } from "../stream/Stream.js";

import { createFailureResult, createSuccessResult } from "./sendResult.js";

import type { SendResult } from "./sendResult.js";
import type { Request } from "../message/Request.js";
import type {
  TransportClient,
  TransportRequestOptions,
  TransportResponse,
} from "../types/transport.js";

/**
 * Anything that can send an abstract request.
 */
export interface Adapter<TNativeRequest = unknown> {
  send(request: Request): Promise<SendResult<TNativeRequest>>;
}

export class TransportAdapter<
  TNativeRequest,
  TNativeResponse extends TransportResponse = TransportResponse,
  TFailure = unknown,
> implements Adapter<TNativeRequest> {
  private readonly transport: TransportClient<TNativeRequest, TNativeResponse, TFailure>;

  constructor(transport: TransportClient<TNativeRequest, TNativeResponse, TFailure>) {
    this.transport = transport;
  }

  async send(request: Request): Promise<SendResult<TNativeRequest>> {
    // Factory failures propagate unwrapped.
    const nativeRequest = this.transformRequest(request);
    const start = performance.now();

    let response: Response | null;
    try {
      response = this.transformResponse(await this.transport.send(nativeRequest));
    } catch (error: unknown) {
      if (!this.transport.isRequestFailure(error)) {
        throw error;
      }

      const partial = this.partialResponseOf(error, nativeRequest);
      const failure = RequestError.create(nativeRequest, partial, error);
      logger.warn(describeFailure(failure));
      return createFailureResult(failure);
    }

    const elapsed = Math.round((performance.now() - start) * 100) / 100;
    logger.debug(
      response
        ? describeResponse(response.statusCode, response.reasonPhrase, elapsed)
        : `[ADAPTER] ${request.method} ${request.url} completed without a response`,
    );

    return createSuccessResult(response);
  }

  /**
   * Builds the transport-native request. A body's handle is detached and
   * handed to the transport; without a body the option is left out.
   */
  transformRequest(request: Request): TNativeRequest {
    const method = request.getMethod();
    const url = request.getUrl();
    const options: TransportRequestOptions = {
      version: request.getProtocolVersion(),
      headers: request.getHeaders(),
    };

    const body = request.getBody();
    if (body?.isDetached) {
      throw new ValidationError(`Request body of ${method} ${url} has already been detached`);
    }
    if (body) {
      options.body = body.detach();
    }

    logger.debug(describeRequest(method, url, options.version, options.headers));

    return this.transport.createRequest(method, url, options);
  }

  /**
   * Reads a native response into a Response. The reason phrase is always
   * derived from the status code. A body handle that cannot be wrapped is
   * destroyed before the error propagates.
   */
  transformResponse(response: TNativeResponse | null): Response | null {
    if (response === null) {
      return null;
    }

    const handle = response.detachBody();

    try {
      return new Response({
        statusCode: response.statusCode,
        reasonPhrase: null,
        headers: response.headers,
        body: handle ? new Stream(handle) : null,
        protocolVersion: response.protocolVersion,
      });
    } catch (error: unknown) {
      handle?.destroy();
      throw error;
    }
  }

  // Unreadable partial responses become null.
  private partialResponseOf(failure: TFailure, nativeRequest: TNativeRequest): Response | null {
    try {
      return this.transformResponse(this.transport.responseOf(failure, nativeRequest));
    } catch (error: unknown) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      logger.warn(`[ADAPTER] Discarding partial response: ${error.message}`);
      return null;
    }
  }
}
