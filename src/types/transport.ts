/**
 * Transport Contracts
 *
 * The adapter talks to a concrete HTTP library only through these interfaces.
 * A transport is injected when the adapter is built.
 */

import type { HeaderRecord, RawHeaders } from '../message/HeaderBag.js';
import type { Readable } from 'stream';

/**
 * Options handed to the transport's request factory. `body` is absent, not
 * empty, when the request carries no body.
 */
export interface TransportRequestOptions {
    version: string;
    headers: HeaderRecord;
    body?: Readable;
}

/**
 * What a native response must expose for the adapter to read it.
 */
export interface TransportResponse {
    readonly statusCode: number;
    readonly protocolVersion: string;
    readonly headers: RawHeaders;
    /** Hands over the body handle once; null when there is none left. */
    detachBody(): Readable | null;
}

export interface TransportClient<
    TRequest,
    TResponse extends TransportResponse = TransportResponse,
    TFailure = unknown,
> {
    createRequest(method: string, url: string, options: TransportRequestOptions): TRequest;

    /**
     * Dispatches a native request. Resolves to null when the exchange yields
     * no response object; rejects with a native failure otherwise.
     */
    send(request: TRequest): Promise<TResponse | null>;

    /** Recognises the transport's own request failures. */
    isRequestFailure(error: unknown): error is TFailure;

    /** The partial response a failure of `request` carries, if any. */
    responseOf(failure: TFailure, request: TRequest): TResponse | null;
}
