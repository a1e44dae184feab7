export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly path: string
  ) {
    super(message);
    this.name = "UpstreamError";
  }
}

export class UpstreamTimeoutError extends UpstreamError {
  constructor(path: string, timeoutMs: number) {
    super(`Upstream request timed out after ${timeoutMs}ms`, null, path);
    this.name = "UpstreamTimeoutError";
  }
}

export class ClanNotFoundError extends UpstreamError {
  constructor(path: string) {
    super("Clan not found", 404, path);
    this.name = "ClanNotFoundError";
  }
}

export class InvalidCredentialsError extends UpstreamError {
  constructor(path: string) {
    super("API token rejected", 403, path);
    this.name = "InvalidCredentialsError";
  }
}

export class RateLimitedError extends UpstreamError {
  constructor(path: string) {
    super("API rate limit reached", 429, path);
    this.name = "RateLimitedError";
  }
}

/** Message shown to Discord users; the error itself only goes to the log. */
export function userMessageForError(err: unknown): string {
  if (err instanceof UpstreamTimeoutError) {
    return "The Clash Royale API did not answer in time. Try again shortly.";
  }
  if (err instanceof ClanNotFoundError) return "That clan could not be found.";
  if (err instanceof InvalidCredentialsError) {
    return "The Clash Royale API token is invalid or expired.";
  }
  if (err instanceof RateLimitedError) {
    return "Too many Clash Royale API requests. Try again in a minute.";
  }
  if (err instanceof UpstreamError) return "Failed to fetch data from the Clash Royale API.";
  return "Something went wrong while building this report.";
}
