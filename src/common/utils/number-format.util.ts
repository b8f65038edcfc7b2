export interface NumberFormat {
  readonly decimalSeparator: string;
  readonly thousandsSeparator?: string;
}

const PLAIN_DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export class NumberFormatUtil {
  /**
   * Parses a monetary or quantity text written with the given separators.
   * Thousands separators must split the integer part into groups of three.
   * Returns null for anything that is not a plain signed decimal once the
   * separators are normalized.
   */
  static parse(text: string, format: NumberFormat): number | null {
    let value = text.trim();
    if (!value) {
      return null;
    }

    const thousands = format.thousandsSeparator;
    if (thousands) {
      if (thousands === ' ') {
        value = value.replace(/\u00a0/g, ' ');
      }
      if (value.includes(thousands)) {
        const integerPart = value.split(format.decimalSeparator)[0];
        const grouped = new RegExp(`^[+-]?\\d{1,3}(?:${escapeRegex(thousands)}\\d{3})+$`);
        if (!grouped.test(integerPart)) {
          return null;
        }
        value = value.split(thousands).join('');
      }
    }

    if (format.decimalSeparator !== '.') {
      if (value.includes('.')) {
        return null;
      }
      value = value.replace(format.decimalSeparator, '.');
    }

    if (!PLAIN_DECIMAL.test(value)) {
      return null;
    }

    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
