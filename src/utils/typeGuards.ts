/**
 * Type Guards
 *
 * Runtime checks shared by the message model and the transports.
 */

export type UnknownRecord = Record<string, unknown>;

/**
 * Plain object check (not array, not null).
 */
export const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isNonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value.trim() !== "";
