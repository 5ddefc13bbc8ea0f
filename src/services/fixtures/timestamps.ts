// ISO-8601 with an explicit zone; seconds and fractions are optional
const ISO_WITH_ZONE =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})$/i;

export function toUtcIso(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

// Returns the timestamp in UTC at second precision, or undefined when the
// value is not an absolute timestamp
export function parseUtcTimestamp(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  if (!ISO_WITH_ZONE.test(trimmed)) return undefined;
  const ms = Date.parse(trimmed.toUpperCase());
  if (Number.isNaN(ms)) return undefined;
  return toUtcIso(new Date(ms));
}

export function formatKickoffDisplay(utcIso: string): string {
  // "Sat, 01 Mar 2025 20:00 UTC"
  return new Date(utcIso).toUTCString().replace(/:\d{2} GMT$/, " UTC");
}

export function addMinutes(utcIso: string, minutes: number): string {
  return toUtcIso(new Date(Date.parse(utcIso) + minutes * 60 * 1000));
}
