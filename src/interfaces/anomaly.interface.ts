/**
 * Anomaly report types.
 *
 * Category values are stable keys for downstream reporting and the report is
 * always ordered as ANOMALY_CATEGORY_ORDER. Consumers index by position.
 */

export enum AnomalyCategory {
  USERS_MISSING_EMAIL = 'users_missing_email',
  USERS_MISSING_SIGNUP_AT = 'users_missing_signup_at',
  TRANSACTIONS_BEFORE_SIGNUP_OR_UNKNOWN_SIGNUP = 'transactions_before_signup_or_unknown_signup',
  TRANSACTIONS_DUPLICATE_TRANSACTION_ID = 'transactions_duplicate_transaction_id',
  TRANSACTIONS_MISSING_AMOUNT = 'transactions_missing_amount',
  APP_EVENTS_ORPHAN_USER_ID = 'app_events_orphan_user_id',
  APP_EVENTS_MISSING_EVENT_TYPE = 'app_events_missing_event_type',
  APP_EVENTS_OUT_OF_INTENDED_MONTH_WINDOW = 'app_events_out_of_intended_month_window',
}

export const ANOMALY_CATEGORY_ORDER: readonly AnomalyCategory[] = [
  AnomalyCategory.USERS_MISSING_EMAIL,
  AnomalyCategory.USERS_MISSING_SIGNUP_AT,
  AnomalyCategory.TRANSACTIONS_BEFORE_SIGNUP_OR_UNKNOWN_SIGNUP,
  AnomalyCategory.TRANSACTIONS_DUPLICATE_TRANSACTION_ID,
  AnomalyCategory.TRANSACTIONS_MISSING_AMOUNT,
  AnomalyCategory.APP_EVENTS_ORPHAN_USER_ID,
  AnomalyCategory.APP_EVENTS_MISSING_EVENT_TYPE,
  AnomalyCategory.APP_EVENTS_OUT_OF_INTENDED_MONTH_WINDOW,
];

export interface AnomalyCount {
  category: AnomalyCategory;
  badRows: number;
  /** Only set where distinct identifiers are meaningful (duplicated ids) */
  distinctIds: number | null;
}

export type AnomalyReport = AnomalyCount[];

export type SnapshotEntity = 'users' | 'transactions' | 'app_events';

/**
 * Timestamps that were present but could not be parsed. They are treated as
 * missing by every rule and reported here instead of in the report.
 */
export interface TimestampIssue {
  entity: SnapshotEntity;
  field: string;
  count: number;
  samples: string[];
}
