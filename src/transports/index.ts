export { AxiosTransport, AxiosTransportResponse } from './axiosTransport.js';
export type { AxiosNativeRequest } from './axiosTransport.js';
