/**
 * CSV Record Store
 *
 * Reads a snapshot from users.csv, transactions.csv and app_events.csv in one
 * directory. Blank cells become null; amounts are parsed to numbers.
 */

import { Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import * as Papa from 'papaparse';
import { RawAppEvent, RawSnapshot, RawTransaction, RawUser, RecordStore } from '../interfaces';

export const CSV_FILES = {
  users: 'users.csv',
  transactions: 'transactions.csv',
  appEvents: 'app_events.csv',
} as const;

type CsvRow = Record<string, string | undefined>;

export type ReadText = (filePath: string) => Promise<string>;

const readUtf8: ReadText = (filePath) => fs.promises.readFile(filePath, 'utf-8');

function cell(row: CsvRow, column: string): string | null {
  const value = row[column];
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

export class CsvRecordStore implements RecordStore {
  readonly name: string;
  private readonly logger = new Logger(CsvRecordStore.name);

  constructor(
    private readonly directory: string,
    private readonly readText: ReadText = readUtf8,
  ) {
    this.name = `csv:${directory}`;
  }

  async loadSnapshot(): Promise<RawSnapshot> {
    const [userRows, transactionRows, eventRows] = await Promise.all([
      this.readRows(CSV_FILES.users),
      this.readRows(CSV_FILES.transactions),
      this.readRows(CSV_FILES.appEvents),
    ]);

    return {
      users: this.toUsers(userRows),
      transactions: this.toTransactions(transactionRows),
      appEvents: eventRows.map(toAppEvent),
    };
  }

  private async readRows(fileName: string): Promise<CsvRow[]> {
    const filePath = path.join(this.directory, fileName);
    const text = await this.readText(filePath);

    const result = Papa.parse<CsvRow>(text, {
      header: true,
      skipEmptyLines: true,
    });

    if (result.errors.length > 0) {
      const first = result.errors[0];
      this.logger.warn(
        `${fileName}: ${result.errors.length} parse errors (first: row ${first.row ?? '?'} ${first.message})`,
      );
    }

    return result.data;
  }

  private toUsers(rows: CsvRow[]): RawUser[] {
    const users: RawUser[] = [];
    let skipped = 0;

    for (const row of rows) {
      const userId = cell(row, 'user_id');
      if (userId === null) {
        skipped++;
        continue;
      }
      users.push({
        userId,
        firstName: cell(row, 'first_name'),
        lastName: cell(row, 'last_name'),
        email: cell(row, 'email'),
        country: cell(row, 'country'),
        signupAt: cell(row, 'signup_at'),
      });
    }

    if (skipped > 0) {
      this.logger.warn(`${CSV_FILES.users}: skipped ${skipped} rows without user_id`);
    }
    return users;
  }

  private toTransactions(rows: CsvRow[]): RawTransaction[] {
    let unparsableAmounts = 0;

    const transactions = rows.map((row): RawTransaction => {
      const rawAmount = cell(row, 'amount');
      let amount: number | null = null;
      if (rawAmount !== null) {
        const parsed = Number(rawAmount);
        if (Number.isFinite(parsed)) {
          amount = parsed;
        } else {
          unparsableAmounts++;
        }
      }

      return {
        transactionId: cell(row, 'transaction_id'),
        senderUserId: cell(row, 'sender_user_id'),
        receiverUserId: cell(row, 'receiver_user_id'),
        amount,
        currency: cell(row, 'currency'),
        status: cell(row, 'status'),
        createdAt: cell(row, 'created_at'),
      };
    });

    if (unparsableAmounts > 0) {
      this.logger.warn(
        `${CSV_FILES.transactions}: ${unparsableAmounts} unparsable amounts read as missing`,
      );
    }
    return transactions;
  }
}

function toAppEvent(row: CsvRow): RawAppEvent {
  return {
    eventId: cell(row, 'event_id'),
    userId: cell(row, 'user_id'),
    eventType: cell(row, 'event_type'),
    eventTs: cell(row, 'event_ts'),
    sessionId: cell(row, 'session_id'),
    page: cell(row, 'page'),
    buttonId: cell(row, 'button_id'),
    device: cell(row, 'device'),
    os: cell(row, 'os'),
    ip: cell(row, 'ip'),
  };
}
