export { TransportAdapter } from './TransportAdapter.js';
export type { Adapter } from './TransportAdapter.js';
export { createSuccessResult, createFailureResult, unwrapResult } from './sendResult.js';
export type { SendResult, SendSuccess, SendFailure } from './sendResult.js';
