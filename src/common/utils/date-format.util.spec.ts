import { DateFormatUtil } from './date-format.util';

describe('DateFormatUtil', () => {
  const dayFirst = DateFormatUtil.compile('dd/MM/yyyy');
  const isoDate = DateFormatUtil.compile('yyyy-MM-dd');
  const isoDateTime = DateFormatUtil.compile("yyyy-MM-dd'T'HH:mm:ss");
  const compact = DateFormatUtil.compile('yyyyMMdd');

  describe('parse', () => {
    it('should normalize day-first dates', () => {
      expect(DateFormatUtil.parse('31/01/2024', [dayFirst])).toBe('2024-01-31');
      expect(DateFormatUtil.parse('1/2/2024', [dayFirst])).toBe('2024-02-01');
    });

    it('should accept date-times with fractions and zones', () => {
      expect(DateFormatUtil.parse('2024-03-15T10:20:30', [isoDateTime])).toBe('2024-03-15');
      expect(DateFormatUtil.parse('2024-03-15T10:20:30.125', [isoDateTime])).toBe('2024-03-15');
      expect(DateFormatUtil.parse('2024-03-15T10:20:30Z', [isoDateTime])).toBe('2024-03-15');
      expect(DateFormatUtil.parse('2024-03-15T10:20:30-06:00', [isoDateTime])).toBe('2024-03-15');
    });

    it('should parse compact dates', () => {
      expect(DateFormatUtil.parse('20240305', [compact])).toBe('2024-03-05');
    });

    it('should try patterns in order', () => {
      expect(DateFormatUtil.parse('2024-01-31', [dayFirst, isoDate])).toBe('2024-01-31');
      expect(DateFormatUtil.parse(' 31/01/2024 ', [isoDate, dayFirst])).toBe('2024-01-31');
    });

    it('should reject impossible calendar dates', () => {
      expect(DateFormatUtil.parse('29/02/2023', [dayFirst])).toBeNull();
      expect(DateFormatUtil.parse('29/02/2024', [dayFirst])).toBe('2024-02-29');
      expect(DateFormatUtil.parse('00/01/2024', [dayFirst])).toBeNull();
      expect(DateFormatUtil.parse('2024-13-01', [isoDate])).toBeNull();
    });

    it('should reject out of range times', () => {
      expect(DateFormatUtil.parse('2024-03-15T25:00:00', [isoDateTime])).toBeNull();
      expect(DateFormatUtil.parse('2024-03-15T10:60:00', [isoDateTime])).toBeNull();
    });

    it('should reject text that matches no pattern', () => {
      expect(DateFormatUtil.parse('January 31, 2024', [dayFirst, isoDate])).toBeNull();
      expect(DateFormatUtil.parse('', [dayFirst])).toBeNull();
    });
  });

  describe('compile', () => {
    it('should reject formats without a full date', () => {
      expect(() => DateFormatUtil.compile('dd/MM')).toThrow("Date format 'dd/MM' is missing 'yyyy'");
    });

    it('should reject unknown pattern letters', () => {
      expect(() => DateFormatUtil.compile('yyyy-MM-dd Q')).toThrow(
        "Unknown pattern letter 'Q' in date format 'yyyy-MM-dd Q'",
      );
    });

    it('should reject repeated tokens', () => {
      expect(() => DateFormatUtil.compile('yyyy-MM-dd-dd')).toThrow("Date format 'yyyy-MM-dd-dd' repeats 'dd'");
    });

    it('should reject unterminated literals', () => {
      expect(() => DateFormatUtil.compile("yyyy-MM-dd'T")).toThrow(
        "Unterminated literal in date format 'yyyy-MM-dd'T'",
      );
    });
  });
});
