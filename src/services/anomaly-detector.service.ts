/**
 * Anomaly Detector
 *
 * Counts raw rows that break the record rules, one entry per category in the
 * fixed report order. Never mutates the snapshot; a row may be counted under
 * several categories.
 */

import { Injectable, Logger } from '@nestjs/common';
import {
  ANOMALY_CATEGORY_ORDER,
  AnalysisWindow,
  AnomalyCategory,
  AnomalyCount,
  AnomalyReport,
  RawSnapshot,
  RawTransaction,
  RecordId,
  SnapshotEntity,
  Timestamp,
  TimestampIssue,
} from '../interfaces';
import { groupBy } from '../utils/ranking';
import { isMalformedTimestamp, isPresent } from '../utils/timestamps';
import {
  APP_EVENT_CHECKS,
  RowAnomalyCheck,
  RuleContext,
  TRANSACTION_CHECKS,
  USER_CHECKS,
  buildUserIndex,
  idKey,
  isAnomalous,
} from './record-rules';

const MAX_TIMESTAMP_SAMPLES = 5;

@Injectable()
export class AnomalyDetectorService {
  private readonly logger = new Logger(AnomalyDetectorService.name);

  detect(snapshot: RawSnapshot, window: AnalysisWindow): AnomalyReport {
    const context: RuleContext = { users: buildUserIndex(snapshot.users), window };
    const counts = new Map<AnomalyCategory, AnomalyCount>();

    for (const entry of [
      ...this.countRows(USER_CHECKS, snapshot.users, context),
      ...this.countRows(TRANSACTION_CHECKS, snapshot.transactions, context),
      ...this.countRows(APP_EVENT_CHECKS, snapshot.appEvents, context),
      this.countDuplicateTransactionIds(snapshot.transactions),
    ]) {
      counts.set(entry.category, entry);
    }

    const report = ANOMALY_CATEGORY_ORDER.map(
      (category) => counts.get(category) ?? { category, badRows: 0, distinctIds: null },
    );

    const flagged = report.filter((entry) => entry.badRows > 0).length;
    this.logger.log(`Detected anomalies in ${flagged}/${report.length} categories`);

    return report;
  }

  /**
   * Rows sharing a transaction_id. badRows sums the size of every duplicated
   * group, distinctIds counts the groups.
   */
  countDuplicateTransactionIds(transactions: readonly RawTransaction[]): AnomalyCount {
    const withId = transactions.filter(
      (tx): tx is RawTransaction & { transactionId: RecordId } => isPresent(tx.transactionId),
    );
    const groups = groupBy(withId, (tx) => idKey(tx.transactionId));

    let badRows = 0;
    let distinctIds = 0;
    for (const group of groups.values()) {
      if (group.length > 1) {
        badRows += group.length;
        distinctIds++;
      }
    }

    return {
      category: AnomalyCategory.TRANSACTIONS_DUPLICATE_TRANSACTION_ID,
      badRows,
      distinctIds,
    };
  }

  /**
   * Timestamps that are present but unparsable. Every rule treats them as
   * missing, so they are listed here rather than silently dropped.
   */
  scanTimestamps(snapshot: RawSnapshot): TimestampIssue[] {
    const issues = [
      this.scanField('users', 'signup_at', snapshot.users.map((u) => u.signupAt)),
      this.scanField('transactions', 'created_at', snapshot.transactions.map((t) => t.createdAt)),
      this.scanField('app_events', 'event_ts', snapshot.appEvents.map((e) => e.eventTs)),
    ].filter((issue): issue is TimestampIssue => issue !== null);

    for (const issue of issues) {
      this.logger.warn(
        `${issue.count} malformed ${issue.entity}.${issue.field} values treated as missing`,
      );
    }

    return issues;
  }

  private countRows<Row>(
    checks: ReadonlyArray<RowAnomalyCheck<Row>>,
    rows: readonly Row[],
    context: RuleContext,
  ): AnomalyCount[] {
    return checks.map((check) => ({
      category: check.category,
      badRows: rows.filter((row) => isAnomalous(check, row, context)).length,
      distinctIds: null,
    }));
  }

  private scanField(
    entity: SnapshotEntity,
    field: string,
    values: Array<Timestamp | null | undefined>,
  ): TimestampIssue | null {
    const malformed = values.filter(isMalformedTimestamp);
    if (malformed.length === 0) return null;

    return {
      entity,
      field,
      count: malformed.length,
      samples: malformed.slice(0, MAX_TIMESTAMP_SAMPLES).map((value) => String(value)),
    };
  }
}
