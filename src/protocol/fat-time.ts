/**
 * Packed FAT date/time fields used in directory entries.
 *
 * Date word: [15-9] years since 1980, [8-5] month, [4-0] day
 * Time word: [15-11] hour, [10-5] minute, [4-0] seconds / 2
 */

export const FAT_EPOCH_YEAR = 1980;
export const FAT_MAX_YEAR = FAT_EPOCH_YEAR + 0x7f;

/**
 * Packed date and time words.
 */
export interface FatDateTime {
  date: number;
  time: number;
}

/**
 * Build a UTC date from calendar fields, rejecting values that would roll
 * over (e.g. February 30th or minute 60).
 *
 * @returns Date in UTC, or null if the fields do not name a real instant
 */
export function utcDateFromFields(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millisecond: number = 0
): Date | null {
  if (
    month < 1 || month > 12 ||
    day < 1 || day > 31 ||
    hour > 23 || minute > 59 || second > 59 ||
    millisecond > 999
  ) {
    return null;
  }

  // setUTCFullYear keeps two-digit years literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millisecond);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
}

/**
 * Decode packed FAT date and time words into a UTC date.
 *
 * @param fdate - Packed date word
 * @param ftime - Packed time word
 * @returns Date in UTC, or null if the fields are not a valid calendar date/time
 */
export function decodeFatDateTime(fdate: number, ftime: number): Date | null {
  const year = ((fdate >> 9) & 0x7f) + FAT_EPOCH_YEAR;
  const month = (fdate >> 5) & 0x0f;
  const day = fdate & 0x1f;
  const hour = (ftime >> 11) & 0x1f;
  const minute = (ftime >> 5) & 0x3f;
  const second = (ftime & 0x1f) * 2;

  return utcDateFromFields(year, month, day, hour, minute, second);
}

/**
 * Encode a date into packed FAT date and time words.
 *
 * Seconds are truncated to the 2-second resolution of the format.
 *
 * @throws {RangeError} If the year is outside 1980-2107
 */
export function encodeFatDateTime(date: Date): FatDateTime {
  const year = date.getUTCFullYear();
  if (year < FAT_EPOCH_YEAR || year > FAT_MAX_YEAR) {
    throw new RangeError(
      `Year ${year} outside FAT range ${FAT_EPOCH_YEAR}-${FAT_MAX_YEAR}`
    );
  }

  return {
    date:
      ((year - FAT_EPOCH_YEAR) << 9) |
      ((date.getUTCMonth() + 1) << 5) |
      date.getUTCDate(),
    time:
      (date.getUTCHours() << 11) |
      (date.getUTCMinutes() << 5) |
      Math.floor(date.getUTCSeconds() / 2),
  };
}
