// ---------------------------------------------------------------------------
// Human-readable wait times for rate-limit denials.
// ---------------------------------------------------------------------------

/**
 * Render a wait in whole seconds as e.g. `"45 s"`, `"1 min 5 s"` or
 * `"2 h 3 min"`. Zero-valued parts are left out; non-positive input is `"0 s"`.
 */
export function formatWaitTime(seconds: number): string {
  const total = Math.max(0, Math.ceil(seconds));
  if (total === 0) return "0 s";

  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours} h`);
  if (minutes > 0) parts.push(`${minutes} min`);
  if (secs > 0) parts.push(`${secs} s`);

  return parts.join(" ");
}
