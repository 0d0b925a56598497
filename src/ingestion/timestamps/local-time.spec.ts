import {
  parseLocalTimestamp,
  parseTimelogged,
  toEpochSeconds,
  zonedTimeToUtc,
} from './local-time';

describe('local-time', () => {
  describe('parseTimelogged', () => {
    it('should read a 12-hour timestamp', () => {
      expect(parseTimelogged('05/29/2025 01:15:30 PM')).toEqual({
        year: 2025,
        month: 5,
        day: 29,
        hour: 13,
        minute: 15,
        second: 30,
      });
    });

    it('should map 12 AM to hour 0 and 12 PM to hour 12', () => {
      expect(parseTimelogged('05/29/2025 12:00:00 AM')?.hour).toBe(0);
      expect(parseTimelogged('05/29/2025 12:00:00 PM')?.hour).toBe(12);
    });

    it('should accept single-digit month, day and hour', () => {
      expect(parseTimelogged('5/9/2025 7:05:00 am')).toEqual({
        year: 2025,
        month: 5,
        day: 9,
        hour: 7,
        minute: 5,
        second: 0,
      });
    });

    it.each([
      ['02/30/2025 10:00:00 AM'],
      ['13/01/2025 10:00:00 AM'],
      ['05/29/2025 00:10:00 AM'],
      ['05/29/2025 10:60:00 AM'],
      ['2025-05-29 10:00:00'],
      [''],
    ])('should reject "%s"', (value) => {
      expect(parseTimelogged(value)).toBeNull();
    });
  });

  describe('zonedTimeToUtc', () => {
    it('should apply a fixed half-hour offset', () => {
      const utc = zonedTimeToUtc(
        { year: 2025, month: 5, day: 29, hour: 0, minute: 0, second: 0 },
        'Asia/Kolkata',
      );
      expect(utc.toISOString()).toBe('2025-05-28T18:30:00.000Z');
    });

    it('should follow daylight saving time', () => {
      const summer = zonedTimeToUtc(
        { year: 2024, month: 7, day: 4, hour: 8, minute: 0, second: 0 },
        'America/New_York',
      );
      const winter = zonedTimeToUtc(
        { year: 2024, month: 1, day: 15, hour: 8, minute: 0, second: 0 },
        'America/New_York',
      );

      expect(summer.toISOString()).toBe('2024-07-04T12:00:00.000Z');
      expect(winter.toISOString()).toBe('2024-01-15T13:00:00.000Z');
    });

    it('should leave UTC wall times unchanged', () => {
      const utc = zonedTimeToUtc(
        { year: 2025, month: 12, day: 31, hour: 23, minute: 59, second: 59 },
        'UTC',
      );
      expect(utc.toISOString()).toBe('2025-12-31T23:59:59.000Z');
    });
  });

  describe('parseLocalTimestamp', () => {
    it('should localize and convert to UTC', () => {
      expect(
        parseLocalTimestamp('05/29/2025 12:00:00 AM', 'Asia/Kolkata')?.toISOString(),
      ).toBe('2025-05-28T18:30:00.000Z');
      expect(
        parseLocalTimestamp('05/29/2025 01:15:30 PM', 'Asia/Kolkata')?.toISOString(),
      ).toBe('2025-05-29T07:45:30.000Z');
    });

    it('should return null for an unparsable value', () => {
      expect(parseLocalTimestamp('yesterday', 'Asia/Kolkata')).toBeNull();
    });
  });

  describe('toEpochSeconds', () => {
    it('should truncate to whole seconds', () => {
      expect(toEpochSeconds(new Date('2025-05-28T18:30:00.999Z'))).toBe(
        1748457000,
      );
    });
  });
});
