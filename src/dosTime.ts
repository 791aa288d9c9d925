/** Converts an MS-DOS time/date pair (local time) to a Date. */
export function dosToDate(time: number, date: number): Date {
  const day = date & 0x1f;
  const month = (date >> 5) & 0x0f;
  const year = ((date >> 9) & 0x7f) + 1980;

  const second = (time & 0x1f) * 2;
  const minute = (time >> 5) & 0x3f;
  const hour = (time >> 11) & 0x1f;

  return new Date(year, month - 1, day, hour, minute, second);
}
