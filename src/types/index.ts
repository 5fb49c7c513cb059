export type {
  TransportClient,
  TransportRequestOptions,
  TransportResponse,
} from './transport.js';
