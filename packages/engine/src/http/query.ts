/**
 * Decode a raw query string into a map. Segments are split on `&` and then on
 * the first `=`; empty segments and segments without `=` are ignored. Values
 * are taken as sent, without percent-decoding. A repeated key keeps its
 * first position and its last value.
 */
export function parseQueryString(query: string): Map<string, string> {
  const params = new Map<string, string>();
  for (const segment of query.split("&")) {
    if (segment === "") continue;
    const eq = segment.indexOf("=");
    if (eq === -1) continue;
    params.set(segment.slice(0, eq), segment.slice(eq + 1));
  }
  return params;
}
