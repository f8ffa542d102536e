/**
 * RFC 3339 timestamps with fractional seconds and a numeric UTC offset.
 *
 * The fraction keeps only significant digits and disappears when zero, so
 * 12:00:00.500 renders as `12:00:00.5`. JavaScript clocks stop at milliseconds.
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function formatOffset(offsetMinutes: number): string {
  if (offsetMinutes === 0) {
    return 'Z';
  }
  const sign = offsetMinutes > 0 ? '+' : '-';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/**
 * @param offsetMinutes - minutes east of UTC; defaults to the host's local offset
 */
export function formatRFC3339Nano(
  time: Date,
  offsetMinutes: number = -time.getTimezoneOffset()
): string {
  const shifted = new Date(time.getTime() + offsetMinutes * 60_000);

  const date = `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
  const clock = `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}`;

  const millis = shifted.getUTCMilliseconds();
  const fraction = millis === 0 ? '' : `.${pad(millis, 3).replace(/0+$/, '')}`;

  return `${date}T${clock}${fraction}${formatOffset(offsetMinutes)}`;
}
