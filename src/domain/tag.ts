/** Purpose: normalize a clan or player tag to upper case without the leading `#`. */
export function normalizeTag(input: string | null | undefined): string {
  return String(input ?? "").trim().toUpperCase().replace(/^#/, "");
}

/** Purpose: check whether two tags point at the same clan or player. */
export function sameTag(a: string | null | undefined, b: string | null | undefined): boolean {
  const left = normalizeTag(a);
  return left !== "" && left === normalizeTag(b);
}

/** Purpose: encode a tag for use in an upstream URL path segment. */
export function encodeTagForPath(tag: string): string {
  return encodeURIComponent(`#${normalizeTag(tag)}`);
}

/** Purpose: display form with the leading `#`. */
export function displayTag(tag: string): string {
  const normalized = normalizeTag(tag);
  return normalized ? `#${normalized}` : "#?";
}
