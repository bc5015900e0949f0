import type { PartyDetails, ScoredField } from '@discounting/shared/schemas/invoiceTypes.zod';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { FIELD_RULES, PARTY_NAME_RULES, type FieldRule, type PartyRole } from './fieldPatterns';

/**
 * The value a match yields: the last capture group that took part in the
 * match, or the whole match when the pattern has no groups.
 */
export function captureOf(match: RegExpExecArray): string | undefined {
  for (let i = match.length - 1; i >= 1; i--) {
    if (match[i] !== undefined) {
      return match[i];
    }
  }
  return match[0];
}

export function firstMatch(text: string, rules: readonly FieldRule[]): { value: string; rule: FieldRule } | null {
  for (const rule of rules) {
    const match = rule.pattern.exec(text);
    if (!match) {
      continue;
    }

    const value = captureOf(match)?.trim();
    if (value) {
      return { value, rule };
    }
    // A match with an empty capture ends the search, same as no match
    return null;
  }
  return null;
}

export class FieldExtractor {
  constructor(private readonly logger: Logger = defaultLogger) {}

  /**
   * Raw text of the first rule that matches for `field`, or null.
   */
  extractField(text: string, field: ScoredField): string | null {
    const found = firstMatch(text, FIELD_RULES[field]);
    if (!found) {
      this.logger.warn(`No match found for ${field}`);
      return null;
    }

    this.logger.debug(`Extracted ${field} using ${found.rule.label}`);
    return found.value;
  }

  extractBuyerDetails(text: string): PartyDetails {
    return this.extractParty(text, 'buyer');
  }

  extractSellerDetails(text: string): PartyDetails {
    return this.extractParty(text, 'seller');
  }

  private extractParty(text: string, role: PartyRole): PartyDetails {
    const found = firstMatch(text, PARTY_NAME_RULES[role]);
    if (!found) {
      return {};
    }

    this.logger.debug(`Extracted ${role} name using ${found.rule.label}`);
    return { name: found.value };
  }
}

let fieldExtractor: FieldExtractor | null = null;

export function getFieldExtractor(): FieldExtractor {
  if (!fieldExtractor) {
    fieldExtractor = new FieldExtractor();
  }
  return fieldExtractor;
}
