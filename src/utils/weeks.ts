import {
  addWeeks,
  getISOWeek,
  getISOWeekYear,
  getISOWeeksInYear,
  setISOWeek,
  startOfISOWeek,
  subWeeks,
} from 'date-fns';
import { ValidationError } from './validation.js';

export interface IsoWeek {
  year: number;
  week: number;
}

export interface WeekRange {
  /** Monday 00:00 local time */
  start: Date;
  /** the following Monday 00:00, exclusive */
  end: Date;
}

export function validateIsoWeek(year: unknown, week: unknown): IsoWeek {
  if (typeof year !== 'number' || !Number.isInteger(year) || year < 1970 || year > 9999) {
    throw new ValidationError('Year must be an integer between 1970 and 9999');
  }
  if (typeof week !== 'number' || !Number.isInteger(week)) {
    throw new ValidationError('Week must be an integer');
  }

  // January 4th always falls in ISO week 1
  const weeksInYear = getISOWeeksInYear(new Date(year, 0, 4));
  if (week < 1 || week > weeksInYear) {
    throw new ValidationError(`Week must be between 1 and ${weeksInYear} for ${year}`);
  }
  return { year, week };
}

export function isoWeekRange(year: number, week: number): WeekRange {
  const valid = validateIsoWeek(year, week);
  const start = startOfISOWeek(setISOWeek(new Date(valid.year, 0, 4), valid.week));
  return { start, end: addWeeks(start, 1) };
}

export function isoWeekOf(date: Date): IsoWeek {
  return { year: getISOWeekYear(date), week: getISOWeek(date) };
}

export function previousIsoWeek(date: Date): IsoWeek {
  return isoWeekOf(subWeeks(date, 1));
}
