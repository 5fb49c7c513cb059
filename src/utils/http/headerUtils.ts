import type { HeaderRecord } from "../../message/HeaderBag.js";

const SENSITIVE_HEADERS: ReadonlySet<string> = new Set([
  "authorization",
  "proxy-authorization",
  "cookie",
  "set-cookie",
]);

export const MASKED_VALUE = "********";

/**
 * Copy of a normalized header record that is safe to log. Authorization
 * schemes are kept ("Bearer ********"), everything else is replaced whole.
 */
export function maskSensitiveHeaders(headers: HeaderRecord): HeaderRecord {
  const masked: HeaderRecord = {};
  for (const [name, values] of Object.entries(headers)) {
    if (!SENSITIVE_HEADERS.has(name)) {
      masked[name] = [...values];
      continue;
    }
    masked[name] = values.map((value) => {
      const scheme = /^(\S+)\s+\S/.exec(value);
      return name.endsWith("authorization") && scheme?.[1]
        ? `${scheme[1]} ${MASKED_VALUE}`
        : MASKED_VALUE;
    });
  }
  return masked;
}

/**
 * Flattens a header record to one line per name, values joined with ", ".
 */
export function flattenHeaders(headers: HeaderRecord): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).map(([name, values]) => [name, values.join(", ")]),
  );
}
