/**
 * Canonical query string encoding.
 *
 * Form encoding (space as "+", letters, digits and "_.-~" kept) with ";"
 * left literal, since list-valued parameters such as handles are
 * ";"-separated and the remote service expects them unescaped.
 */

export type QueryParam = readonly [key: string, value: string];

const FORM_ESCAPES: Readonly<Record<string, string>> = {
  "!": "%21",
  "'": "%27",
  "(": "%28",
  ")": "%29",
  "*": "%2A",
};

/**
 * Encode one key or value of a query string.
 */
export function encodeQueryComponent(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (ch) => FORM_ESCAPES[ch] ?? ch)
    .replace(/%20/g, "+")
    .replace(/%3B/g, ";");
}

/**
 * Decode one key or value; malformed escapes are kept as written.
 */
export function decodeQueryComponent(value: string): string {
  const spaced = value.replace(/\+/g, " ");
  try {
    return decodeURIComponent(spaced);
  } catch {
    return spaced;
  }
}

/**
 * Join parameters into a query string, preserving their order.
 */
export function formatQuery(params: readonly QueryParam[]): string {
  return params
    .map(([key, value]) => `${encodeQueryComponent(key)}=${encodeQueryComponent(value)}`)
    .join("&");
}

/**
 * Split a raw query string into decoded parameters.
 *
 * Entries are split on their first "=" only; entries without one are
 * dropped. A repeated key keeps its last value, in its first position.
 */
export function parseQuery(raw: string): QueryParam[] {
  const entries = new Map<string, string>();
  for (const part of raw.split("&")) {
    const eq = part.indexOf("=");
    if (eq === -1) continue;
    entries.set(
      decodeQueryComponent(part.slice(0, eq)),
      decodeQueryComponent(part.slice(eq + 1)),
    );
  }
  return [...entries.entries()];
}

/**
 * Sort parameters by key and encode them.
 */
export function canonicalQuery(params: readonly QueryParam[]): string {
  const sorted = [...params].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return formatQuery(sorted);
}
