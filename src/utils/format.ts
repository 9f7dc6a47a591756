/** Decimal hours as h:mm, minutes truncated (7.5 → "7:30"). */
export function formatHours(hours: number): string {
  const sign = hours < 0 ? '-' : '';
  const abs = Math.abs(hours);
  let h = Math.trunc(abs);
  let m = Math.trunc(Math.round((abs - h) * 60 * 1e6) / 1e6);
  if (m === 60) {
    h += 1;
    m = 0;
  }
  return `${sign}${h}:${String(m).padStart(2, '0')}`;
}

/** Hours since midnight as a 24h clock (23.5 → "23:30"). */
export function formatClock(decimal: number): string {
  let value = decimal % 24;
  if (value < 0) value += 24;
  let h = Math.trunc(value);
  let m = Math.trunc(Math.round((value - h) * 60 * 1e6) / 1e6);
  if (m === 60) {
    h = (h + 1) % 24;
    m = 0;
  }
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}
