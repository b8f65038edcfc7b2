export interface DatePattern {
  readonly format: string;
  readonly regex: RegExp;
  readonly groups: readonly DateToken[];
}

type DateToken = 'yyyy' | 'MM' | 'dd' | 'HH' | 'mm' | 'ss';

const TOKENS: readonly DateToken[] = ['yyyy', 'MM', 'dd', 'HH', 'mm', 'ss'];

const TOKEN_PATTERNS: Record<DateToken, string> = {
  yyyy: '(\\d{4})',
  MM: '(\\d{1,2})',
  dd: '(\\d{1,2})',
  HH: '(\\d{1,2})',
  mm: '(\\d{2})',
  ss: '(\\d{2})(?:\\.\\d+)?',
};

// xs:date and xs:dateTime values may carry a zone designator
const OPTIONAL_ZONE = '(?:Z|[+-]\\d{2}:?\\d{2})?';

export class DateFormatUtil {
  /**
   * Compiles a declared date format such as `dd/MM/yyyy` or
   * `yyyy-MM-dd'T'HH:mm:ss`. Text between single quotes is literal.
   */
  static compile(format: string): DatePattern {
    const groups: DateToken[] = [];
    let source = '';
    let index = 0;

    while (index < format.length) {
      if (format[index] === "'") {
        const end = format.indexOf("'", index + 1);
        if (end === -1) {
          throw new Error(`Unterminated literal in date format '${format}'`);
        }
        source += escapeRegex(format.slice(index + 1, end));
        index = end + 1;
        continue;
      }

      const token = TOKENS.find((candidate) => format.startsWith(candidate, index));
      if (token) {
        if (groups.includes(token)) {
          throw new Error(`Date format '${format}' repeats '${token}'`);
        }
        groups.push(token);
        source += TOKEN_PATTERNS[token];
        index += token.length;
        continue;
      }

      if (/[A-Za-z]/.test(format[index])) {
        throw new Error(`Unknown pattern letter '${format[index]}' in date format '${format}'`);
      }
      source += escapeRegex(format[index]);
      index++;
    }

    for (const required of ['yyyy', 'MM', 'dd'] as const) {
      if (!groups.includes(required)) {
        throw new Error(`Date format '${format}' is missing '${required}'`);
      }
    }

    return { format, regex: new RegExp(`^${source}${OPTIONAL_ZONE}$`), groups };
  }

  /**
   * Tries each pattern in order and returns the calendar date as
   * `YYYY-MM-DD`, or null when no pattern yields a real date.
   */
  static parse(text: string, patterns: readonly DatePattern[]): string | null {
    const value = text.trim();

    for (const pattern of patterns) {
      const match = pattern.regex.exec(value);
      if (!match) {
        continue;
      }

      const parts: Partial<Record<DateToken, number>> = {};
      pattern.groups.forEach((token, position) => {
        parts[token] = Number(match[position + 1]);
      });

      const iso = toIsoDate(parts.yyyy ?? 0, parts.MM ?? 0, parts.dd ?? 0);
      if (iso && isValidTime(parts.HH, parts.mm, parts.ss)) {
        return iso;
      }
    }

    return null;
  }
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function isValidTime(hours?: number, minutes?: number, seconds?: number): boolean {
  return (hours ?? 0) <= 23 && (minutes ?? 0) <= 59 && (seconds ?? 0) <= 59;
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
