/**
 * Raw Records Repository
 *
 * Reads the users, transactions and app_events tables as one snapshot.
 * All three SELECTs run inside a single REPEATABLE READ, READ ONLY transaction
 * so the sets cannot skew against each other.
 *
 * Timestamps are selected as text: pg would otherwise read `timestamp without
 * time zone` columns in the process's local zone.
 */

import { PoolClient } from 'pg';
import { healthCheck, query, transaction } from './index';
import { RawAppEvent, RawSnapshot, RawTransaction, RawUser, RecordStore } from '../interfaces';

/**
 * Row shapes as selected
 */
export interface DbUserRow {
  user_id: string;
  first_name: string | null;
  last_name: string | null;
  email: string | null;
  country: string | null;
  signup_at: string | null;
}

export interface DbTransactionRow {
  transaction_id: string | null;
  sender_user_id: string | null;
  receiver_user_id: string | null;
  /** numeric columns come back as strings, real/double as numbers */
  amount: string | number | null;
  currency: string | null;
  status: string | null;
  created_at: string | null;
}

export interface DbAppEventRow {
  event_id: string | null;
  user_id: string | null;
  event_type: string | null;
  event_ts: string | null;
  session_id: string | null;
  page: string | null;
  button_id: string | null;
  device: string | null;
  os: string | null;
  ip: string | null;
}

export const SELECT_USERS = `
  SELECT user_id::text AS user_id, first_name, last_name, email, country,
         signup_at::text AS signup_at
  FROM users
  WHERE user_id IS NOT NULL
  ORDER BY ctid`;

export const SELECT_TRANSACTIONS = `
  SELECT transaction_id::text AS transaction_id,
         sender_user_id::text AS sender_user_id,
         receiver_user_id::text AS receiver_user_id,
         amount, currency, status,
         created_at::text AS created_at
  FROM transactions
  ORDER BY ctid`;

export const SELECT_APP_EVENTS = `
  SELECT event_id::text AS event_id, user_id::text AS user_id, event_type,
         event_ts::text AS event_ts,
         session_id, page, button_id, device, os, ip
  FROM app_events
  ORDER BY ctid`;

export function toRawUser(row: DbUserRow): RawUser {
  return {
    userId: row.user_id,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    country: row.country,
    signupAt: row.signup_at,
  };
}

export function toRawTransaction(row: DbTransactionRow): RawTransaction {
  return {
    transactionId: row.transaction_id,
    senderUserId: row.sender_user_id,
    receiverUserId: row.receiver_user_id,
    amount: toAmount(row.amount),
    currency: row.currency,
    status: row.status,
    createdAt: row.created_at,
  };
}

export function toRawAppEvent(row: DbAppEventRow): RawAppEvent {
  return {
    eventId: row.event_id,
    userId: row.user_id,
    eventType: row.event_type,
    eventTs: row.event_ts,
    sessionId: row.session_id,
    page: row.page,
    buttonId: row.button_id,
    device: row.device,
    os: row.os,
    ip: row.ip,
  };
}

function toAmount(value: string | number | null): number | null {
  if (value === null) return null;
  const amount = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(amount) ? amount : null;
}

/**
 * Read all three tables on one client
 */
export async function readSnapshot(client: PoolClient): Promise<RawSnapshot> {
  const users = await query<DbUserRow>(SELECT_USERS, [], client);
  const transactions = await query<DbTransactionRow>(SELECT_TRANSACTIONS, [], client);
  const appEvents = await query<DbAppEventRow>(SELECT_APP_EVENTS, [], client);

  return {
    users: users.rows.map(toRawUser),
    transactions: transactions.rows.map(toRawTransaction),
    appEvents: appEvents.rows.map(toRawAppEvent),
  };
}

export class PgRecordStore implements RecordStore {
  readonly name = 'postgres';

  async loadSnapshot(): Promise<RawSnapshot> {
    return transaction(readSnapshot, { isolationLevel: 'REPEATABLE READ', readOnly: true });
  }

  isReachable(): Promise<boolean> {
    return healthCheck();
  }
}
