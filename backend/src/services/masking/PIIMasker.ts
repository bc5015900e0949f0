const KRA_PIN_LENGTH = 11;
const PIN_VISIBLE_SUFFIX = 3;
const PHONE_VISIBLE_SUFFIX = 4;
const MIN_PHONE_DIGITS = 9;

const PIN_MASK_FALLBACK = '***********';
const PHONE_MASK_PREFIX = '******';
const PHONE_MASK_FALLBACK = '******';
const EMAIL_MASK_REPLACEMENT = '***@***.***';

const KRA_PIN_PATTERN = /\b[A-Z][0-9O]{9}[A-Z]\b/gi;
const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const PHONE_PATTERN = /(?:\+254|\b0)[17]\d{8}\b/g;

const FIELD_NAME_PIN = 'pin';
const FIELD_NAME_EMAIL = 'email';
const FIELD_NAME_PHONE = 'phone';

function cleanValue(value: string): string {
  return value.replace(/[\s-]/g, '');
}

function lastN(value: string, n: number): string {
  return value.slice(-n);
}

export class PIIMasker {
  maskField(fieldName: string, value: unknown): unknown {
    if (value === null || value === undefined) {
      return value;
    }

    const lowerFieldName = fieldName.toLowerCase();

    if (lowerFieldName.includes(FIELD_NAME_PIN)) {
      return this.maskKraPin(String(value));
    }

    if (lowerFieldName.includes(FIELD_NAME_EMAIL)) {
      return EMAIL_MASK_REPLACEMENT;
    }

    if (lowerFieldName.includes(FIELD_NAME_PHONE)) {
      return this.maskPhone(String(value));
    }

    return value;
  }

  maskObject(obj: object): Record<string, unknown> {
    const masked: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      if (Array.isArray(value)) {
        masked[key] = value.map((item) =>
          typeof item === 'object' && item !== null ? this.maskObject(item) : item
        );
      } else if (typeof value === 'object' && value !== null) {
        masked[key] = this.maskObject(value);
      } else {
        masked[key] = this.maskField(key, value);
      }
    }

    return masked;
  }

  /** P051234567X -> P*******67X */
  maskKraPin(value: string): string {
    const cleaned = cleanValue(value);

    if (cleaned.length !== KRA_PIN_LENGTH) {
      return PIN_MASK_FALLBACK;
    }

    const hiddenLength = KRA_PIN_LENGTH - 1 - PIN_VISIBLE_SUFFIX;
    return `${cleaned[0]}${'*'.repeat(hiddenLength)}${lastN(cleaned, PIN_VISIBLE_SUFFIX)}`;
  }

  private maskPhone(value: string): string {
    const cleaned = cleanValue(value);

    if (cleaned.length < MIN_PHONE_DIGITS) {
      return PHONE_MASK_FALLBACK;
    }

    return `${PHONE_MASK_PREFIX}${lastN(cleaned, PHONE_VISIBLE_SUFFIX)}`;
  }

  maskText(text: string): string {
    let masked = text;

    masked = masked.replace(EMAIL_PATTERN, EMAIL_MASK_REPLACEMENT);
    masked = masked.replace(KRA_PIN_PATTERN, (match) => this.maskKraPin(match));
    masked = masked.replace(PHONE_PATTERN, (match) => this.maskPhone(match));

    return masked;
  }
}

let piiMasker: PIIMasker | null = null;

export function getPIIMasker(): PIIMasker {
  if (!piiMasker) {
    piiMasker = new PIIMasker();
  }
  return piiMasker;
}
