/**
 * Cleaner
 *
 * Derives the trusted record sets from a raw snapshot:
 * - users: signup_at known
 * - transactions: complete → lifecycle-valid → one row per transaction_id → projected
 * - app events: complete, owned by a clean user, inside the analysis window
 *
 * Empty inputs give empty sets. Nothing here throws for bad rows.
 */

import { Injectable, Logger } from '@nestjs/common';
import {
  AnalysisWindow,
  CleanAppEvent,
  CleanTransaction,
  CleanUser,
  CleaningResult,
  RawAppEvent,
  RawSnapshot,
  RawTransaction,
  RawUser,
} from '../interfaces';
import { pickBestPerKey, rankDescending } from '../utils/ranking';
import { toInstant } from '../utils/timestamps';
import {
  CompleteTransaction,
  RuleContext,
  buildUserIndex,
  eventInWindow,
  eventIsComplete,
  eventUserIsClean,
  idKey,
  statusRank,
  transactionIsComplete,
  transactionRespectsLifecycle,
  userHasSignup,
} from './record-rules';

/**
 * Lifecycle-valid transaction carrying its ranking fields until projection
 */
export interface RankedTransaction {
  row: CompleteTransaction;
  statusRank: number;
  createdAtMs: number;
}

const byStatusThenRecency = rankDescending<RankedTransaction>(
  (tx) => tx.statusRank,
  (tx) => tx.createdAtMs,
);

@Injectable()
export class CleanerService {
  private readonly logger = new Logger(CleanerService.name);

  clean(snapshot: RawSnapshot, window: AnalysisWindow): CleaningResult {
    const context: RuleContext = { users: buildUserIndex(snapshot.users), window };

    const users = this.cleanUsers(snapshot.users, context);

    const complete = this.filterComplete(snapshot.transactions, context);
    const lifecycleValid = this.filterLifecycle(complete, context);
    const transactions = this.deduplicate(lifecycleValid).map((tx) => this.project(tx.row));

    const appEvents = this.cleanAppEvents(snapshot.appEvents, context);

    const transactionStages = {
      raw: snapshot.transactions.length,
      complete: complete.length,
      lifecycleValid: lifecycleValid.length,
      deduplicated: transactions.length,
    };

    this.logger.log(
      `Clean sets: users ${users.length}/${snapshot.users.length}, ` +
        `transactions ${transactions.length}/${snapshot.transactions.length}, ` +
        `app events ${appEvents.length}/${snapshot.appEvents.length}`,
    );

    return { clean: { users, transactions, appEvents }, transactionStages };
  }

  cleanUsers(users: readonly RawUser[], context: RuleContext): CleanUser[] {
    return users.filter((user): user is CleanUser => userHasSignup.holds(user, context));
  }

  /**
   * Stage 1: transaction_id, created_at, amount, sender and receiver all present
   */
  filterComplete(
    transactions: readonly RawTransaction[],
    context: RuleContext,
  ): CompleteTransaction[] {
    return transactions.filter((tx): tx is CompleteTransaction =>
      transactionIsComplete.holds(tx, context),
    );
  }

  /**
   * Stage 2: both parties are clean users and the transfer does not predate
   * either signup. Attaches the ranking fields used by stage 3.
   */
  filterLifecycle(
    transactions: readonly CompleteTransaction[],
    context: RuleContext,
  ): RankedTransaction[] {
    const ranked: RankedTransaction[] = [];
    for (const row of transactions) {
      const createdAtMs = toInstant(row.createdAt);
      if (createdAtMs === null || !transactionRespectsLifecycle.holds(row, context)) continue;
      ranked.push({ row, statusRank: statusRank(row.status), createdAtMs });
    }
    return ranked;
  }

  /**
   * Stage 3: one row per transaction_id. Highest status rank wins, then the
   * most recent created_at, then the first row seen.
   */
  deduplicate(transactions: readonly RankedTransaction[]): RankedTransaction[] {
    return pickBestPerKey(transactions, (tx) => idKey(tx.row.transactionId), byStatusThenRecency);
  }

  cleanAppEvents(events: readonly RawAppEvent[], context: RuleContext): CleanAppEvent[] {
    return events.filter(
      (event): event is CleanAppEvent =>
        eventIsComplete.holds(event, context) &&
        eventUserIsClean.holds(event, context) &&
        eventInWindow.holds(event, context),
    );
  }

  /**
   * Stage 4: output columns only
   */
  private project(row: CompleteTransaction): CleanTransaction {
    return {
      transactionId: row.transactionId,
      senderUserId: row.senderUserId,
      receiverUserId: row.receiverUserId,
      amount: row.amount,
      currency: row.currency ?? null,
      status: row.status ?? null,
      createdAt: row.createdAt,
    };
  }
}
