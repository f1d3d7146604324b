// Canonical text for values TOML has no lossless slot for.

const MS_PER_MINUTE = 60_000;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** Duration as its whole number of nanoseconds, e.g. "1500000000". */
export function renderDuration(nanos: number): string {
  return Math.trunc(nanos).toString();
}

export function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/**
 * Date as "YYYY-MM-DD HH:MM:SS[.mmm] ±HH:MM", wall-clock time in the
 * value's own offset. Milliseconds appear only when non-zero.
 */
export function renderDate(date: Date, offsetMinutes: number): string {
  const local = new Date(date.getTime() + offsetMinutes * MS_PER_MINUTE);
  const day = `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}`;
  let time = `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}`;
  const ms = local.getUTCMilliseconds();
  if (ms !== 0) time += `.${pad(ms, 3)}`;
  return `${day} ${time} ${formatOffset(offsetMinutes)}`;
}
