import { isoWeekOf, isoWeekRange, previousIsoWeek, validateIsoWeek } from '../../utils/weeks';
import { ValidationError } from '../../utils/validation';

describe('ISO week helpers', () => {
  it('should bound a week by local Mondays', () => {
    const range = isoWeekRange(2024, 10);

    expect(range.start).toEqual(new Date(2024, 2, 4));
    expect(range.end).toEqual(new Date(2024, 2, 11));
  });

  it('should start week 1 in the previous calendar year when needed', () => {
    expect(isoWeekRange(2025, 1).start).toEqual(new Date(2024, 11, 30));
  });

  it('should accept week 53 only in long years', () => {
    expect(validateIsoWeek(2020, 53)).toEqual({ year: 2020, week: 53 });
    expect(() => validateIsoWeek(2021, 53)).toThrow('Week must be between 1 and 52 for 2021');
  });

  it('should reject malformed weeks', () => {
    expect(() => validateIsoWeek(2024, 0)).toThrow(ValidationError);
    expect(() => validateIsoWeek(2024, 1.5)).toThrow('Week must be an integer');
    expect(() => validateIsoWeek(1900, 1)).toThrow(ValidationError);
  });

  it('should report the ISO week-year of a date', () => {
    expect(isoWeekOf(new Date(2021, 0, 1))).toEqual({ year: 2020, week: 53 });
    expect(isoWeekOf(new Date(2024, 2, 6))).toEqual({ year: 2024, week: 10 });
  });

  it('should find the previous week across a year boundary', () => {
    expect(previousIsoWeek(new Date(2024, 0, 3))).toEqual({ year: 2023, week: 52 });
  });
});
