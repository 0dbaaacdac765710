// Wildcard segment -> anchored RegExp. A compiled segment matches exactly one
// path component: `*` and `?` never cross a `/`.

const SPECIAL = /[.*+?^${}()|[\]\\]/g;

export function hasWildcards(s: string): boolean {
  return s.includes("*") || s.includes("?");
}

export function toSegmentRegex(segment: string): RegExp {
  let s = segment;
  if (s.startsWith("!")) s = s.slice(1);
  if (s.startsWith("/")) s = s.slice(1);

  const body = s
    .replace(SPECIAL, "\\$&")
    .replace(/\\\?/g, "[^/]?")
    .replace(/\\\*/g, "[^/]*");

  // optional leading separator: `name` and `/name` both match
  return new RegExp(`^/?${body}$`);
}

export function anyMatch(regexes: readonly RegExp[], input: string): boolean {
  for (const r of regexes) if (r.test(input)) return true;
  return false;
}
