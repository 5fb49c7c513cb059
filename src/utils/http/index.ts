/**
 * HTTP Module
 *
 * Header and stream helpers shared by the adapter and the transports.
 */

export { maskSensitiveHeaders, flattenHeaders, MASKED_VALUE } from './headerUtils.js';
export { streamToString, toReadable, isReadable } from './streamUtils.js';
