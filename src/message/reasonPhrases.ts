import table from "./reasonPhrases.json" with { type: "json" };

export const UNKNOWN_REASON_PHRASE = "Unknown";

// Built once at load, never written afterwards.
const REASON_PHRASES: ReadonlyMap<number, string> = new Map(
  Object.entries(table).map(([code, phrase]): [number, string] => [Number(code), phrase]),
);

/**
 * Standard reason phrase for a status code, or "Unknown" when the code has no
 * table entry.
 */
export function getReasonPhrase(statusCode: number): string {
  return REASON_PHRASES.get(statusCode) ?? UNKNOWN_REASON_PHRASE;
}

export function hasReasonPhrase(statusCode: number): boolean {
  return REASON_PHRASES.has(statusCode);
}
