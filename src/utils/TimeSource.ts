import { Duration } from '../types/Duration';
import { RetentionOffsets, RetentionThresholds } from '../interfaces/RetentionManager';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Clock and UTC calendar arithmetic used by the retention policy.
 * All calculations are done in UTC regardless of the host timezone.
 */
export class TimeSource {
  private clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  now(): Date {
    return new Date(this.clock().getTime());
  }

  /**
   * Subtract a calendar duration. Months and years go through the UTC setters,
   * so a day missing from the target month rolls over into the next one.
   */
  subtract(date: Date, duration: Duration): Date {
    const result = new Date(date.getTime());

    switch (duration.unit) {
      case 'days':
        result.setUTCDate(result.getUTCDate() - duration.amount);
        break;
      case 'weeks':
        result.setUTCDate(result.getUTCDate() - duration.amount * 7);
        break;
      case 'months':
        result.setUTCMonth(result.getUTCMonth() - duration.amount);
        break;
      case 'years':
        result.setUTCFullYear(result.getUTCFullYear() - duration.amount);
        break;
    }

    return result;
  }

  /**
   * ISO 8601 week number (1-53). Weeks start on Monday and week 1 contains
   * the first Thursday of the year.
   */
  isoWeekOfYear(date: Date): number {
    const d = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

    // Move to the Thursday of the same week; Sunday counts as day 7
    const dayNum = d.getUTCDay() || 7;
    d.setUTCDate(d.getUTCDate() + 4 - dayNum);

    const yearStart = Date.UTC(d.getUTCFullYear(), 0, 1);
    return Math.ceil(((d.getTime() - yearStart) / MS_PER_DAY + 1) / 7);
  }

  /** Calendar month, 1-12 */
  calendarMonth(date: Date): number {
    return date.getUTCMonth() + 1;
  }

  deriveThresholds(offsets: RetentionOffsets, now: Date = this.now()): RetentionThresholds {
    return {
      weeklyBoundary: this.subtract(now, offsets.weekly),
      monthlyBoundary: this.subtract(now, offsets.monthly),
      deleteBoundary: this.subtract(now, offsets.delete),
    };
  }

  thresholdsAreOrdered(thresholds: RetentionThresholds, now: Date): boolean {
    return (
      thresholds.deleteBoundary.getTime() < thresholds.monthlyBoundary.getTime() &&
      thresholds.monthlyBoundary.getTime() < thresholds.weeklyBoundary.getTime() &&
      thresholds.weeklyBoundary.getTime() <= now.getTime()
    );
  }

  /**
   * Format date as YYYYMMDD-HHMMSS (UTC), usable inside a resource name
   */
  formatBackupTimestamp(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    const hours = String(date.getUTCHours()).padStart(2, '0');
    const minutes = String(date.getUTCMinutes()).padStart(2, '0');
    const seconds = String(date.getUTCSeconds()).padStart(2, '0');

    return `${year}${month}${day}-${hours}${minutes}${seconds}`;
  }
}
