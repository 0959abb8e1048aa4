export type DurationUnit = 'days' | 'weeks' | 'months' | 'years';

/**
 * Calendar duration used for retention offsets
 */
export interface Duration {
  amount: number;
  unit: DurationUnit;
}

export function formatDuration(duration: Duration): string {
  const unit = duration.amount === 1 ? duration.unit.slice(0, -1) : duration.unit;
  return `${duration.amount} ${unit}`;
}
