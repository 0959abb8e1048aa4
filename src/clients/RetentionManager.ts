import {
  BucketMap,
  BucketReduction,
  Classification,
  RetentionDecision,
  RetentionManager as IRetentionManager,
  RetentionOffsets,
  RetentionPlan,
  RetentionThresholds,
  RetentionTier,
} from '../interfaces/RetentionManager';
import { BackupRecord } from '../types/BackupRecord';
import { formatDuration } from '../types/Duration';
import { ConfigurationError } from '../config/ConfigurationManager';
import { TimeSource } from '../utils/TimeSource';

/**
 * Newest first; equal timestamps fall back to the name, greatest first
 */
export function compareNewestFirst(a: BackupRecord, b: BackupRecord): number {
  const byTime = b.createdAt.getTime() - a.createdAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  if (a.name === b.name) {
    return 0;
  }
  return a.name < b.name ? 1 : -1;
}

/**
 * RetentionManager implementation for tiered backup retention
 *
 * Policy, per virtual machine:
 * - newer than the weekly boundary: keep everything
 * - between the weekly and monthly boundary: keep the newest backup of each ISO week
 * - between the monthly and delete boundary: keep the newest backup of each calendar month
 * - older than the delete boundary: delete
 *
 * Week and month keys carry no year, so the same week or month number from
 * different years shares a bucket.
 */
export class RetentionManager implements IRetentionManager {
  private offsets: RetentionOffsets;
  private timeSource: TimeSource;

  constructor(offsets: RetentionOffsets, timeSource: TimeSource = new TimeSource()) {
    this.offsets = offsets;
    this.timeSource = timeSource;
  }

  computeThresholds(now: Date = this.timeSource.now()): RetentionThresholds {
    const thresholds = this.timeSource.deriveThresholds(this.offsets, now);

    if (!this.timeSource.thresholdsAreOrdered(thresholds, now)) {
      throw new ConfigurationError(
        `Retention boundaries out of order: weekly ${formatDuration(this.offsets.weekly)}, ` +
          `monthly ${formatDuration(this.offsets.monthly)}, delete ${formatDuration(this.offsets.delete)}`,
        'RETENTION'
      );
    }

    return thresholds;
  }

  classify(records: readonly BackupRecord[], thresholds: RetentionThresholds): Classification {
    const result: Classification = {
      toDelete: [],
      weekBuckets: new Map(),
      monthBuckets: new Map(),
      recent: [],
    };

    const deleteBoundary = thresholds.deleteBoundary.getTime();
    const monthlyBoundary = thresholds.monthlyBoundary.getTime();
    const weeklyBoundary = thresholds.weeklyBoundary.getTime();

    for (const record of records) {
      const createdAt = record.createdAt.getTime();

      if (createdAt < deleteBoundary) {
        result.toDelete.push(record);
      } else if (createdAt < monthlyBoundary) {
        this.addToBucket(result.monthBuckets, this.timeSource.calendarMonth(record.createdAt), record);
      } else if (createdAt < weeklyBoundary) {
        this.addToBucket(result.weekBuckets, this.timeSource.isoWeekOfYear(record.createdAt), record);
      } else {
        result.recent.push(record);
      }
    }

    return result;
  }

  reduceBuckets(buckets: BucketMap): BucketReduction {
    const reduction: BucketReduction = { survivors: [], toDelete: [] };

    for (const members of buckets.values()) {
      if (members.length === 0) {
        continue;
      }

      const [survivor, ...rest] = [...members].sort(compareNewestFirst);
      reduction.survivors.push(survivor);
      reduction.toDelete.push(...rest);
    }

    return reduction;
  }

  planRetention(records: readonly BackupRecord[], thresholds: RetentionThresholds): RetentionPlan {
    const classification = this.classify(records, thresholds);
    const decisions: RetentionDecision[] = [];

    for (const record of classification.recent) {
      decisions.push(this.decide(record, 'keep', 'recent', 'newer than the weekly boundary'));
    }

    for (const record of classification.toDelete) {
      decisions.push(this.decide(record, 'delete', 'expired', 'older than the delete boundary'));
    }

    decisions.push(...this.decideBuckets(classification.weekBuckets, 'weekly', 'week'));
    decisions.push(...this.decideBuckets(classification.monthBuckets, 'monthly', 'month'));

    decisions.sort((a, b) => compareNewestFirst(a.record, b.record));

    return {
      keep: decisions.filter(d => d.action === 'keep').map(d => d.record),
      delete: decisions.filter(d => d.action === 'delete').map(d => d.record),
      decisions,
    };
  }

  private decideBuckets(buckets: BucketMap, tier: RetentionTier, label: string): RetentionDecision[] {
    const decisions: RetentionDecision[] = [];

    for (const [bucket, members] of buckets) {
      const { survivors, toDelete } = this.reduceBuckets(new Map([[bucket, members]]));

      for (const record of survivors) {
        decisions.push(this.decide(record, 'keep', tier, `newest in ${label} ${bucket}`, bucket));
      }

      for (const record of toDelete) {
        const reason = `superseded in ${label} ${bucket} by ${survivors[0].name}`;
        decisions.push(this.decide(record, 'delete', tier, reason, bucket));
      }
    }

    return decisions;
  }

  private decide(
    record: BackupRecord,
    action: RetentionDecision['action'],
    tier: RetentionTier,
    reason: string,
    bucket?: number
  ): RetentionDecision {
    const decision: RetentionDecision = { record, action, tier, reason };
    if (bucket !== undefined) {
      decision.bucket = bucket;
    }
    return decision;
  }

  private addToBucket(buckets: BucketMap, key: number, record: BackupRecord): void {
    const members = buckets.get(key);
    if (members) {
      members.push(record);
    } else {
      buckets.set(key, [record]);
    }
  }
}
