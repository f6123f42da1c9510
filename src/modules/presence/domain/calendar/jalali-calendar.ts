import { toPersianDigits } from './persian-digits';

export type CalendarDate = {
  readonly year: number;
  readonly month: number;
  readonly day: number;
};

/** Monday first, matching `(Date#getDay() + 6) % 7`. */
export const PERSIAN_WEEKDAYS = [
  'دوشنبه',
  'سه‌شنبه',
  'چهارشنبه',
  'پنجشنبه',
  'جمعه',
  'شنبه',
  'یکشنبه',
] as const;

export const PERSIAN_MONTHS = [
  'فروردین',
  'اردیبهشت',
  'خرداد',
  'تیر',
  'مرداد',
  'شهریور',
  'مهر',
  'آبان',
  'آذر',
  'دی',
  'بهمن',
  'اسفند',
] as const;

const GREGORIAN_MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
const JALALI_MONTH_DAYS = [31, 31, 31, 31, 31, 31, 30, 30, 30, 30, 30, 29];

const GREGORIAN_EPOCH_YEAR = 1600;
const JALALI_EPOCH_YEAR = 979;
// 1600-01-01 is 79 days before 979-01-01 (Jalali)
const JALALI_EPOCH_OFFSET_DAYS = 79;
const DAYS_PER_33_YEAR_CYCLE = 12053;
const DAYS_PER_4_YEAR_GROUP = 1461;

function isGregorianLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function div(a: number, b: number): number {
  return Math.floor(a / b);
}

/**
 * Converts a Gregorian date (1-indexed month and day) to the Jalali calendar.
 * Defined for dates from 1600-01-01 onward.
 */
export function gregorianToJalali(
  year: number,
  month: number,
  day: number,
): CalendarDate {
  const gy = year - GREGORIAN_EPOCH_YEAR;
  const gm = month - 1;

  let gDayNo =
    365 * gy + div(gy + 3, 4) - div(gy + 99, 100) + div(gy + 399, 400);
  for (let i = 0; i < gm; i++) {
    gDayNo += GREGORIAN_MONTH_DAYS[i];
  }
  if (gm > 1 && isGregorianLeapYear(year)) {
    gDayNo += 1;
  }
  gDayNo += day - 1;

  let jDayNo = gDayNo - JALALI_EPOCH_OFFSET_DAYS;
  const cycles = div(jDayNo, DAYS_PER_33_YEAR_CYCLE);
  jDayNo %= DAYS_PER_33_YEAR_CYCLE;

  let jYear =
    JALALI_EPOCH_YEAR + 33 * cycles + 4 * div(jDayNo, DAYS_PER_4_YEAR_GROUP);
  jDayNo %= DAYS_PER_4_YEAR_GROUP;

  if (jDayNo >= 366) {
    jYear += div(jDayNo - 1, 365);
    jDayNo = (jDayNo - 1) % 365;
  }

  for (let i = 0; i < 11; i++) {
    if (jDayNo < JALALI_MONTH_DAYS[i]) {
      return { year: jYear, month: i + 1, day: jDayNo + 1 };
    }
    jDayNo -= JALALI_MONTH_DAYS[i];
  }

  return { year: jYear, month: 12, day: jDayNo + 1 };
}

export function toJalali(date: Date): CalendarDate {
  return gregorianToJalali(
    date.getFullYear(),
    date.getMonth() + 1,
    date.getDate(),
  );
}

export function persianWeekdayName(date: Date): string {
  return PERSIAN_WEEKDAYS[(date.getDay() + 6) % 7];
}

export type PersianDateLabelOptions = {
  persianDigits?: boolean;
};

/**
 * "<weekday> <day> <month>" for the local calendar day of `date`,
 * e.g. `سه‌شنبه ۱ فروردین` for 2023-03-21.
 */
export function persianDateLabel(
  date: Date,
  options: PersianDateLabelOptions = {},
): string {
  const jalali = toJalali(date);
  const label = `${persianWeekdayName(date)} ${jalali.day} ${PERSIAN_MONTHS[jalali.month - 1]}`;
  return options.persianDigits === false ? label : toPersianDigits(label);
}
