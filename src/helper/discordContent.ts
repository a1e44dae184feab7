export const DISCORD_CONTENT_LIMIT = 2000;

/** Hard cut at `limit` characters; a long report may end mid-line but never inside a surrogate pair. */
export function truncateDiscordContent(content: string, limit = DISCORD_CONTENT_LIMIT): string {
  if (content.length <= limit) return content;
  const last = content.charCodeAt(limit - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? limit - 1 : limit;
  return content.slice(0, end);
}

/** Progress bar such as `█████░░░░░` for a share between 0 and 1. */
export function progressBar(share: number, width = 18): string {
  const clamped = Math.max(0, Math.min(1, Number.isFinite(share) ? share : 0));
  const filled = Math.round(width * clamped);
  return "█".repeat(filled) + "░".repeat(width - filled);
}

/** Right-aligned list position, `" 1."` … `"10."`. */
export function rankLabel(index: number): string {
  return `${String(index + 1).padStart(2, " ")}.`;
}

/** Case-insensitive name order. */
export function compareNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la < lb) return -1;
  if (la > lb) return 1;
  return 0;
}

export function formatNumber(value: number): string {
  return Intl.NumberFormat("en-US").format(Math.round(value));
}
