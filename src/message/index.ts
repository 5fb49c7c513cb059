/**
 * Message Module
 *
 * Immutable request/response value objects and the header store they share.
 */

export { HeaderBag } from './HeaderBag.js';
export type { HeaderRecord, RawHeaders, RawHeaderScalar, RawHeaderValue } from './HeaderBag.js';
export { Message } from './Message.js';
export type { MessageInit, MessageParts } from './Message.js';
export { Request } from './Request.js';
export type { RequestInit } from './Request.js';
export { Response, MIN_STATUS_CODE, MAX_STATUS_CODE } from './Response.js';
export type { ResponseInit } from './Response.js';
export { getReasonPhrase, hasReasonPhrase, UNKNOWN_REASON_PHRASE } from './reasonPhrases.js';
