/**
 * Raw and clean record shapes for the payments snapshot.
 *
 * Raw rows come straight from a record store and may carry any of the injected
 * anomalies. Clean rows are what the cleaner hands to downstream metrics.
 */

/** Identifiers compare by their trimmed string form, so `1` and `"1"` match */
export type RecordId = string | number;

/** ISO-8601-like string or a Date; strings without an offset are read as UTC */
export type Timestamp = string | Date;

export type TransactionStatus = 'completed' | 'pending' | 'failed';

export interface RawUser {
  userId: RecordId;
  email?: string | null;
  signupAt?: Timestamp | null;
  firstName?: string | null;
  lastName?: string | null;
  country?: string | null;
}

export interface RawTransaction {
  transactionId?: RecordId | null;
  senderUserId?: RecordId | null;
  receiverUserId?: RecordId | null;
  amount?: number | null;
  currency?: string | null;
  /** Usually a TransactionStatus, but unrecognised values do occur */
  status?: string | null;
  createdAt?: Timestamp | null;
}

export interface RawAppEvent {
  eventId?: RecordId | null;
  userId?: RecordId | null;
  eventTs?: Timestamp | null;
  eventType?: string | null;
  sessionId?: string | null;
  page?: string | null;
  buttonId?: string | null;
  device?: string | null;
  os?: string | null;
  ip?: string | null;
}

/**
 * One consistent read of the three raw tables
 */
export interface RawSnapshot {
  users: RawUser[];
  transactions: RawTransaction[];
  appEvents: RawAppEvent[];
}

export interface CleanUser extends RawUser {
  signupAt: Timestamp;
}

/**
 * Projection kept after deduplication; ranking fields are not part of it
 */
export interface CleanTransaction {
  transactionId: RecordId;
  senderUserId: RecordId;
  receiverUserId: RecordId;
  amount: number;
  currency: string | null;
  status: string | null;
  createdAt: Timestamp;
}

export interface CleanAppEvent extends RawAppEvent {
  userId: RecordId;
  eventTs: Timestamp;
  eventType: string;
}

/**
 * Source of raw snapshots. Implementations must return all three sets from a
 * single consistent read.
 */
export interface RecordStore {
  readonly name: string;
  loadSnapshot(): Promise<RawSnapshot>;
  /** Stores backed by a server report whether it answers */
  isReachable?(): Promise<boolean>;
}
