/**
 * Configuration helpers for reading environment variables.
 */

/** Anything shaped like process.env */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Turn a setting value into a string, keeping null/undefined as null.
 * Stripping is on by default; pass `strip: false` for values such as
 * passwords where surrounding whitespace is significant.
 */
export function toStringOrNull(value: unknown, { strip = true }: { strip?: boolean } = {}): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = typeof value === "string" ? value : String(value);
  return strip ? text.trim() : text;
}
