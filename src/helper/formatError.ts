type ErrorLike = {
  name?: string;
  message?: string;
  code?: string | number;
  status?: number | null;
  path?: string;
  response?: { status?: number };
};

function isErrorLike(err: unknown): err is ErrorLike {
  return typeof err === "object" && err !== null;
}

/** Flatten an error into one log line; never shown to Discord users. */
export function formatError(err: unknown): string {
  if (!err) return "Unknown error";
  if (typeof err === "string") return err;
  if (!isErrorLike(err)) return String(err);

  const parts: string[] = [];
  if (err.name && err.name !== "Error") parts.push(err.name);
  if (err.message) parts.push(err.message);
  if (err.code) parts.push(`code=${String(err.code)}`);
  if (err.status) parts.push(`status=${err.status}`);
  if (err.response?.status) parts.push(`http=${err.response.status}`);
  if (err.path) parts.push(`path=${err.path}`);

  if (parts.length > 0) return parts.join(" | ");
  return "Unhandled non-error throw";
}
