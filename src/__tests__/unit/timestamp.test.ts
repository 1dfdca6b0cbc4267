import { formatTimestamp } from '../../utils/timestamp.util';

describe('formatTimestamp', () => {
  test('formats in India Standard Time by default', () => {
    expect(formatTimestamp(new Date('2024-01-15T10:00:00Z'))).toBe('2024-01-15 15:30:00');
  });

  test('rolls over the date when IST is already past midnight', () => {
    expect(formatTimestamp(new Date('2024-12-31T20:00:00Z'))).toBe('2025-01-01 01:30:00');
  });

  test('uses 00 for the midnight hour', () => {
    expect(formatTimestamp(new Date('2024-03-09T18:30:05Z'))).toBe('2024-03-10 00:00:05');
  });

  test('accepts another time zone', () => {
    expect(formatTimestamp(new Date('2024-01-15T10:00:00Z'), 'UTC')).toBe('2024-01-15 10:00:00');
  });
});
