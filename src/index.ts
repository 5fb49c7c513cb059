/**
 * http-message-adapter: public API surface.
 */

// Messages
export {
  HeaderBag,
  Message,
  Request,
  Response,
  getReasonPhrase,
  hasReasonPhrase,
  UNKNOWN_REASON_PHRASE,
  MIN_STATUS_CODE,
  MAX_STATUS_CODE,
} from "./message/index.js";
export type {
  HeaderRecord,
  RawHeaders,
  RawHeaderScalar,
  RawHeaderValue,
  MessageInit,
  RequestInit,
  ResponseInit,
} from "./message/index.js";

// Streams
export { Stream } from "./stream/Stream.js";
export type { StreamMetadata } from "./stream/Stream.js";

// Adapter
export {
  TransportAdapter,
  createSuccessResult,
  createFailureResult,
  unwrapResult,
} from "./adapter/index.js";
export type { Adapter, SendResult, SendSuccess, SendFailure } from "./adapter/index.js";

// Transports
export { AxiosTransport, AxiosTransportResponse } from "./transports/index.js";
export type { AxiosNativeRequest } from "./transports/index.js";
export type {
  TransportClient,
  TransportRequestOptions,
  TransportResponse,
} from "./types/index.js";

// Errors
export {
  HttpAdapterError,
  ValidationError,
  StreamDetachedError,
  RequestError,
} from "./errors.js";
export type { HttpAdapterErrorCode } from "./errors.js";

// Infrastructure
export { config, resolveConfig, validateConfig, DEFAULT_CONFIG } from "./config.js";
export type { HttpAdapterConfig } from "./config.js";
export { logger, createConfigLogger } from "./logging/index.js";
export type { Logger } from "./logging/index.js";

// Helpers
export {
  maskSensitiveHeaders,
  flattenHeaders,
  MASKED_VALUE,
  streamToString,
  toReadable,
  isReadable,
} from "./utils/http/index.js";
export { extractErrorMessage } from "./utils/errorMessage.js";
