const PERSIAN_DIGITS = ['۰', '۱', '۲', '۳', '۴', '۵', '۶', '۷', '۸', '۹'] as const;
const PERSIAN_ZERO = PERSIAN_DIGITS[0].charCodeAt(0);

export function toPersianDigits(text: string): string {
  return text.replace(/[0-9]/g, (digit) => PERSIAN_DIGITS[Number(digit)]);
}

export function toAsciiDigits(text: string): string {
  return text.replace(/[۰-۹]/g, (digit) =>
    String(digit.charCodeAt(0) - PERSIAN_ZERO),
  );
}
