import { BackupRecord } from '../types/BackupRecord';
import { Duration } from '../types/Duration';

/**
 * How far back each retention tier reaches from "now"
 */
export interface RetentionOffsets {
  weekly: Duration;
  monthly: Duration;
  delete: Duration;
}

/**
 * Absolute boundaries derived once per run.
 * Must satisfy deleteBoundary < monthlyBoundary < weeklyBoundary <= now.
 */
export interface RetentionThresholds {
  weeklyBoundary: Date;
  monthlyBoundary: Date;
  deleteBoundary: Date;
}

/** Records grouped by week-of-year (1-53) or calendar month (1-12) */
export type BucketMap = Map<number, BackupRecord[]>;

export interface Classification {
  /** Older than the delete boundary */
  toDelete: BackupRecord[];
  weekBuckets: BucketMap;
  monthBuckets: BucketMap;
  /** Newer than the weekly boundary, always kept */
  recent: BackupRecord[];
}

export interface BucketReduction {
  survivors: BackupRecord[];
  toDelete: BackupRecord[];
}

export type RetentionTier = 'recent' | 'weekly' | 'monthly' | 'expired';

export interface RetentionDecision {
  record: BackupRecord;
  action: 'keep' | 'delete';
  tier: RetentionTier;
  /** Week or month number for bucketed tiers */
  bucket?: number;
  reason: string;
}

export interface RetentionPlan {
  keep: BackupRecord[];
  delete: BackupRecord[];
  /** One entry per input record, newest first */
  decisions: RetentionDecision[];
}

/**
 * Interface for tiered retention of a single VM's backups
 */
export interface RetentionManager {
  /** Derive the run's boundaries from the configured offsets */
  computeThresholds(now?: Date): RetentionThresholds;

  /** Partition records into the delete tier, week buckets, month buckets and recent */
  classify(records: readonly BackupRecord[], thresholds: RetentionThresholds): Classification;

  /** Keep the newest record of each bucket, mark the rest for deletion */
  reduceBuckets(buckets: BucketMap): BucketReduction;

  /** Classify and reduce, producing the final keep/delete split */
  planRetention(records: readonly BackupRecord[], thresholds: RetentionThresholds): RetentionPlan;
}
