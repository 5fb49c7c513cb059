/**
 * Axios Transport
 *
 * TransportClient backed by an axios instance. Responses are requested as
 * streams so the body handle can be handed to a Stream untouched.
 */

import { IncomingMessage } from "http";

import axios, {
  AxiosHeaders,
  type AxiosError,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
  type CreateAxiosDefaults,
} from "axios";

import { config, DEFAULT_PROTOCOL_VERSION, type HttpAdapterConfig } from "../config.js";
import { logger } from "../logging/index.js";
import { isReadable, toReadable } from "../utils/http/streamUtils.js";
import { isRecord } from "../utils/typeGuards.js";

import type { RawHeaders, RawHeaderScalar, RawHeaderValue } from "../message/HeaderBag.js";
import type {
  TransportClient,
  TransportRequestOptions,
  TransportResponse,
} from "../types/transport.js";
import type { Readable } from "stream";

export interface AxiosNativeRequest {
  readonly config: AxiosRequestConfig & { headers: AxiosHeaders };
  /** Protocol version the caller asked for. */
  readonly version: string;
}

const isHeaderScalar = (value: unknown): value is RawHeaderScalar =>
  typeof value === "string" || typeof value === "number" || typeof value === "boolean";

function toRawHeaders(headers: unknown): RawHeaders {
  if (!isRecord(headers)) {
    return {};
  }

  const raw: Record<string, RawHeaderValue> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (isHeaderScalar(value)) {
      raw[name] = value;
    } else if (Array.isArray(value)) {
      raw[name] = value.filter(isHeaderScalar);
    }
  }
  return raw;
}

function toBodyHandle(data: unknown): Readable | null {
  if (data === undefined || data === null || data === "") {
    return null;
  }
  if (isReadable(data)) {
    return data;
  }
  if (typeof data === "string" || data instanceof Uint8Array) {
    return toReadable(data);
  }
  return toReadable(JSON.stringify(data));
}

export class AxiosTransportResponse implements TransportResponse {
  readonly statusCode: number;
  readonly protocolVersion: string;
  readonly headers: RawHeaders;
  private body: Readable | null;

  constructor(response: AxiosResponse<unknown>, fallbackVersion: string = DEFAULT_PROTOCOL_VERSION) {
    this.statusCode = response.status;
    this.headers = toRawHeaders(response.headers);
    // Only the node http adapter exposes the negotiated version.
    this.protocolVersion = response.data instanceof IncomingMessage
      ? response.data.httpVersion
      : fallbackVersion;
    this.body = toBodyHandle(response.data);
  }

  detachBody(): Readable | null {
    const body = this.body;
    this.body = null;
    return body;
  }
}

export class AxiosTransport
  implements TransportClient<AxiosNativeRequest, AxiosTransportResponse, AxiosError> {
  private readonly client: AxiosInstance;

  constructor(client: AxiosInstance) {
    this.client = client;
  }

  /**
   * Creates the axios instance from the transport settings. `defaults` is
   * merged underneath them (a base URL or a custom axios adapter, say).
   */
  static fromConfig(
    settings: HttpAdapterConfig["transport"] = config.transport,
    defaults: CreateAxiosDefaults = {},
  ): AxiosTransport {
    return new AxiosTransport(axios.create({
      ...defaults,
      timeout: settings.timeoutMs,
      maxRedirects: settings.maxRedirects,
      // leaving validateStatus unset keeps axios' 2xx-only default
      ...(settings.throwOnHttpError ? {} : { validateStatus: () => true }),
    }));
  }

  createRequest(method: string, url: string, options: TransportRequestOptions): AxiosNativeRequest {
    const headers = new AxiosHeaders();
    for (const [name, values] of Object.entries(options.headers)) {
      headers.set(name, values);
    }

    return {
      config: {
        method,
        url,
        headers,
        responseType: "stream",
        ...(options.body ? { data: options.body } : {}),
      },
      version: options.version,
    };
  }

  async send(request: AxiosNativeRequest): Promise<AxiosTransportResponse> {
    logger.debug(`[AXIOS] ${request.config.method?.toUpperCase() ?? "GET"} ${request.config.url ?? ""}`);
    const response = await this.client.request<unknown>(request.config);
    return new AxiosTransportResponse(response, request.version);
  }

  isRequestFailure(error: unknown): error is AxiosError {
    return axios.isAxiosError(error);
  }

  responseOf(failure: AxiosError, request: AxiosNativeRequest): AxiosTransportResponse | null {
    return failure.response ? new AxiosTransportResponse(failure.response, request.version) : null;
  }
}
