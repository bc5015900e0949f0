const KRA_PIN_LENGTH = 11;
const OCR_KRA_PIN_LENGTH = 12;
const TWO_DIGIT_YEAR_PIVOT = 69;
const CENTURY_1900 = 1900;
const CENTURY_2000 = 2000;
const MIN_YEAR = 1;

const AMOUNT_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?$/;
const ALPHANUMERIC_PATTERN = /^[A-Za-z0-9]+$/;
const LETTER_PATTERN = /^[A-Za-z]$/;

interface DateFormat {
  label: string;
  pattern: RegExp;
}

/**
 * Accepted date layouts, tried in order. Day-first layouts follow the
 * Kenyan convention, so 03/04/2025 is the 3rd of April.
 */
const DATE_FORMATS: readonly DateFormat[] = [
  { label: 'YYYY-MM-DD', pattern: /^(?<year>\d{4})-(?<month>\d{1,2})-(?<day>\d{1,2})$/ },
  { label: 'YYYY/MM/DD', pattern: /^(?<year>\d{4})\/(?<month>\d{1,2})\/(?<day>\d{1,2})$/ },
  { label: 'DD/MM/YYYY', pattern: /^(?<day>\d{1,2})\/(?<month>\d{1,2})\/(?<year>\d{4})$/ },
  { label: 'DD-MM-YYYY', pattern: /^(?<day>\d{1,2})-(?<month>\d{1,2})-(?<year>\d{4})$/ },
  { label: 'DD/MM/YY', pattern: /^(?<day>\d{1,2})\/(?<month>\d{1,2})\/(?<shortYear>\d{2})$/ },
  { label: 'DD-MM-YY', pattern: /^(?<day>\d{1,2})-(?<month>\d{1,2})-(?<shortYear>\d{2})$/ },
];

function expandShortYear(shortYear: number): number {
  return shortYear < TWO_DIGIT_YEAR_PIVOT ? CENTURY_2000 + shortYear : CENTURY_1900 + shortYear;
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (year < MIN_YEAR) {
    return null;
  }

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0'),
  ].join('-');
}

/**
 * Normalizes raw field text into typed values: exact decimal amounts,
 * ISO dates and corrected KRA PINs. Every method returns null for input it
 * cannot interpret instead of throwing.
 */
export class TypeCoercionService {
  /**
   * Parses an amount such as "60,000.00" into a normalized decimal string
   * ("60000.00"). Digits are never routed through a float.
   */
  parseAmount(value: string | null | undefined): string | null {
    if (!value) {
      return null;
    }

    const cleaned = value.replace(/,/g, '').replace(/\s+/g, '');
    const match = AMOUNT_PATTERN.exec(cleaned);
    if (!match) {
      return null;
    }

    const [, sign, integerDigits = '', fractionDigits = ''] = match;
    if (integerDigits.length === 0 && fractionDigits.length === 0) {
      return null;
    }

    const integerPart = integerDigits.replace(/^0+(?=\d)/, '') || '0';
    const fractionPart = fractionDigits.length > 0 ? `.${fractionDigits}` : '';
    const prefix = sign === '-' ? '-' : '';

    return `${prefix}${integerPart}${fractionPart}`;
  }

  /**
   * Parses the first whitespace-separated token of `value` as a date and
   * returns it as YYYY-MM-DD.
   */
  parseDate(value: string | null | undefined): string | null {
    if (!value) {
      return null;
    }

    const [token] = value.trim().split(/\s+/);
    if (!token) {
      return null;
    }

    for (const format of DATE_FORMATS) {
      const groups = format.pattern.exec(token)?.groups;
      if (!groups) {
        continue;
      }

      const year = groups.year !== undefined
        ? Number(groups.year)
        : expandShortYear(Number(groups.shortYear));
      const iso = toIsoDate(year, Number(groups.month), Number(groups.day));
      if (iso) {
        return iso;
      }
    }

    return null;
  }

  /**
   * Repairs common OCR misreads in a KRA PIN: the letter O read in place of
   * the digit 0, and a duplicated leading letter.
   *
   *   "PO52006107N"  -> "P052006107N"
   *   "PPO52006107N" -> "P052006107N"
   */
  cleanupKraPin(pin: string | null | undefined): string | null {
    if (!pin) {
      return null;
    }

    const chars = [...pin.trim().toUpperCase()];
    if (chars.length === 0) {
      return null;
    }

    if (chars.length === OCR_KRA_PIN_LENGTH && LETTER_PATTERN.test(chars[0]) && chars[1] === 'O') {
      chars[1] = '0';
    }

    if (chars.length >= KRA_PIN_LENGTH) {
      for (let i = 1; i < chars.length - 1; i++) {
        if (chars[i] === 'O') {
          chars[i] = '0';
        }
      }
    }

    if (chars.length === OCR_KRA_PIN_LENGTH && LETTER_PATTERN.test(chars[0]) && LETTER_PATTERN.test(chars[1])) {
      chars.splice(1, 1);
    }

    return chars.join('');
  }

  isValidKraPin(pin: string | null | undefined): boolean {
    return typeof pin === 'string' && pin.length === KRA_PIN_LENGTH && ALPHANUMERIC_PATTERN.test(pin);
  }
}

let typeCoercionService: TypeCoercionService | null = null;

export function getTypeCoercionService(): TypeCoercionService {
  if (!typeCoercionService) {
    typeCoercionService = new TypeCoercionService();
  }
  return typeCoercionService;
}
