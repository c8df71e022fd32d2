import { calendarDayOf, defaultWindow, formatCalendarDay, isWithinDays, parseCalendarDay } from '../dates';

describe('calendar dates', () => {
  const evaluatedAt = new Date('2025-06-15T10:30:00Z');

  describe('parseCalendarDay', () => {
    it('should accept named-month and ISO dates', () => {
      expect(parseCalendarDay('2024-Mar-05')).toBe(parseCalendarDay('2024-03-05'));
      expect(parseCalendarDay('2024-mar-05')).toBe(parseCalendarDay('2024-03-05'));
      expect(parseCalendarDay('2024-03-05T23:59:59Z')).toBe(parseCalendarDay('2024-03-05'));
    });

    it('should reject blank, malformed and impossible dates', () => {
      expect(parseCalendarDay('')).toBeUndefined();
      expect(parseCalendarDay('   ')).toBeUndefined();
      expect(parseCalendarDay('05/03/2024')).toBeUndefined();
      expect(parseCalendarDay('2024-Foo-05')).toBeUndefined();
      expect(parseCalendarDay('2023-02-29')).toBeUndefined();
      expect(parseCalendarDay(null)).toBeUndefined();
    });
  });

  describe('isWithinDays', () => {
    it('should count a date exactly 365 days back as recent', () => {
      const day = calendarDayOf(evaluatedAt) - 365;
      expect(isWithinDays(day, evaluatedAt)).toBe(true);
    });

    it('should not count a date 366 days back as recent', () => {
      const day = calendarDayOf(evaluatedAt) - 366;
      expect(isWithinDays(day, evaluatedAt)).toBe(false);
    });

    it('should count future dates as recent', () => {
      const day = parseCalendarDay('2026-01-01');
      expect(day).toBeDefined();
      expect(isWithinDays(day ?? 0, evaluatedAt)).toBe(true);
    });
  });

  it('should format day numbers as ISO dates', () => {
    expect(formatCalendarDay(calendarDayOf(evaluatedAt))).toBe('2025-06-15');
  });

  it('should default to the year ending at the evaluation time', () => {
    expect(defaultWindow(evaluatedAt)).toEqual({ start: '2024-06-15', end: '2025-06-15' });
    expect(defaultWindow(evaluatedAt, 30)).toEqual({ start: '2025-05-16', end: '2025-06-15' });
  });
});
