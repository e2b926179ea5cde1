/**
 * Record rules shared by the anomaly detector and the cleaner.
 *
 * Each rule is defined once. The detector counts rows for which a rule does
 * not hold (optionally within a scope); the cleaner keeps rows for which it does.
 */

import {
  AnalysisWindow,
  AnomalyCategory,
  CleanAppEvent,
  CleanUser,
  RawAppEvent,
  RawTransaction,
  RawUser,
  RecordId,
  Timestamp,
  TransactionStatus,
} from '../interfaces';
import { isPresent, toInstant } from '../utils/timestamps';

export interface IndexedUser {
  userId: string;
  /** Parsed signup instant, null when missing or malformed */
  signupAt: number | null;
}

export type UserIndex = Map<string, IndexedUser>;

export interface RuleContext {
  users: UserIndex;
  window: AnalysisWindow;
}

export interface RecordRule<Row, Passing extends Row = Row> {
  readonly name: string;
  holds(row: Row, context: RuleContext): row is Passing;
}

export type CompleteTransaction = RawTransaction & {
  transactionId: RecordId;
  senderUserId: RecordId;
  receiverUserId: RecordId;
  amount: number;
  createdAt: Timestamp;
};

export const STATUS_RANK: Record<TransactionStatus, number> = {
  completed: 3,
  pending: 2,
  failed: 1,
};

export function statusRank(status: string | null | undefined): number {
  switch (status) {
    case 'completed':
    case 'pending':
    case 'failed':
      return STATUS_RANK[status];
    default:
      return 0;
  }
}

export function idKey(id: RecordId): string {
  return String(id).trim();
}

/**
 * Index users by id. The first row wins if an id repeats.
 */
export function buildUserIndex(users: readonly RawUser[]): UserIndex {
  const index: UserIndex = new Map();
  for (const user of users) {
    if (!isPresent(user.userId)) continue;
    const key = idKey(user.userId);
    if (!index.has(key)) {
      index.set(key, { userId: key, signupAt: toInstant(user.signupAt) });
    }
  }
  return index;
}

function signupOf(id: RecordId | null | undefined, users: UserIndex): number | null {
  if (!isPresent(id)) return null;
  return users.get(idKey(id))?.signupAt ?? null;
}

export function isWithinWindow(instant: number, window: AnalysisWindow): boolean {
  return instant >= window.windowStart.getTime() && instant < window.windowEnd.getTime();
}

// =============================================================================
// USER RULES
// =============================================================================

export const userHasEmail: RecordRule<RawUser> = {
  name: 'user_has_email',
  holds: (user): user is RawUser => isPresent(user.email),
};

export const userHasSignup: RecordRule<RawUser, CleanUser> = {
  name: 'user_has_signup_at',
  holds: (user): user is CleanUser => toInstant(user.signupAt) !== null,
};

// =============================================================================
// TRANSACTION RULES
// =============================================================================

export const transactionHasCreatedAt: RecordRule<RawTransaction> = {
  name: 'transaction_has_created_at',
  holds: (tx): tx is RawTransaction => toInstant(tx.createdAt) !== null,
};

export const transactionHasAmount: RecordRule<RawTransaction> = {
  name: 'transaction_has_amount',
  holds: (tx): tx is RawTransaction => isPresent(tx.amount),
};

export const transactionIsComplete: RecordRule<RawTransaction, CompleteTransaction> = {
  name: 'transaction_is_complete',
  holds: (tx): tx is CompleteTransaction =>
    isPresent(tx.transactionId) &&
    isPresent(tx.senderUserId) &&
    isPresent(tx.receiverUserId) &&
    isPresent(tx.amount) &&
    toInstant(tx.createdAt) !== null,
};

/**
 * Both parties are known users with a signup, and the transfer does not
 * predate either signup
 */
export const transactionRespectsLifecycle: RecordRule<RawTransaction> = {
  name: 'transaction_respects_lifecycle',
  holds: (tx, { users }): tx is RawTransaction => {
    const createdAt = toInstant(tx.createdAt);
    if (createdAt === null) return false;

    const senderSignup = signupOf(tx.senderUserId, users);
    const receiverSignup = signupOf(tx.receiverUserId, users);
    if (senderSignup === null || receiverSignup === null) return false;

    return createdAt >= senderSignup && createdAt >= receiverSignup;
  },
};

// =============================================================================
// APP EVENT RULES
// =============================================================================

export const eventHasUserId: RecordRule<RawAppEvent> = {
  name: 'event_has_user_id',
  holds: (event): event is RawAppEvent => isPresent(event.userId),
};

export const eventHasTimestamp: RecordRule<RawAppEvent> = {
  name: 'event_has_event_ts',
  holds: (event): event is RawAppEvent => toInstant(event.eventTs) !== null,
};

export const eventHasType: RecordRule<RawAppEvent> = {
  name: 'event_has_event_type',
  holds: (event): event is RawAppEvent => isPresent(event.eventType),
};

export const eventIsComplete: RecordRule<RawAppEvent, CleanAppEvent> = {
  name: 'event_is_complete',
  holds: (event): event is CleanAppEvent =>
    isPresent(event.userId) &&
    isPresent(event.eventType) &&
    toInstant(event.eventTs) !== null,
};

/** userId resolves to any raw user, with or without a signup */
export const eventUserExists: RecordRule<RawAppEvent> = {
  name: 'event_user_exists',
  holds: (event, { users }): event is RawAppEvent =>
    isPresent(event.userId) && users.has(idKey(event.userId)),
};

/** userId resolves to a user that survives cleaning */
export const eventUserIsClean: RecordRule<RawAppEvent> = {
  name: 'event_user_is_clean',
  holds: (event, { users }): event is RawAppEvent => signupOf(event.userId, users) !== null,
};

export const eventInWindow: RecordRule<RawAppEvent> = {
  name: 'event_in_window',
  holds: (event, { window }): event is RawAppEvent => {
    const ts = toInstant(event.eventTs);
    return ts !== null && isWithinWindow(ts, window);
  },
};

// =============================================================================
// ANOMALY CHECKS
// =============================================================================

/**
 * A row is anomalous when it is in scope and the rule does not hold for it
 */
export interface RowAnomalyCheck<Row> {
  category: AnomalyCategory;
  scope?: RecordRule<Row>;
  rule: RecordRule<Row>;
}

export function isAnomalous<Row>(
  check: RowAnomalyCheck<Row>,
  row: Row,
  context: RuleContext,
): boolean {
  if (check.scope && !check.scope.holds(row, context)) return false;
  return !check.rule.holds(row, context);
}

export const USER_CHECKS: ReadonlyArray<RowAnomalyCheck<RawUser>> = [
  { category: AnomalyCategory.USERS_MISSING_EMAIL, rule: userHasEmail },
  { category: AnomalyCategory.USERS_MISSING_SIGNUP_AT, rule: userHasSignup },
];

export const TRANSACTION_CHECKS: ReadonlyArray<RowAnomalyCheck<RawTransaction>> = [
  {
    category: AnomalyCategory.TRANSACTIONS_BEFORE_SIGNUP_OR_UNKNOWN_SIGNUP,
    scope: transactionHasCreatedAt,
    rule: transactionRespectsLifecycle,
  },
  { category: AnomalyCategory.TRANSACTIONS_MISSING_AMOUNT, rule: transactionHasAmount },
];

export const APP_EVENT_CHECKS: ReadonlyArray<RowAnomalyCheck<RawAppEvent>> = [
  {
    category: AnomalyCategory.APP_EVENTS_ORPHAN_USER_ID,
    scope: eventHasUserId,
    rule: eventUserExists,
  },
  { category: AnomalyCategory.APP_EVENTS_MISSING_EVENT_TYPE, rule: eventHasType },
  {
    category: AnomalyCategory.APP_EVENTS_OUT_OF_INTENDED_MONTH_WINDOW,
    scope: eventHasTimestamp,
    rule: eventInWindow,
  },
];
