function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local-time run stamp used in every output filename: YYYYMMDD_HHMMSS */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** YYYY-MM-DD HH:mm:ss, local time */
export function formatLogTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function truncate(text: string, max = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Collapse runs of whitespace (newlines, tabs, nbsp) to single spaces. */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
