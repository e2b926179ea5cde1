import { Injectable, Logger } from '@nestjs/common';
import { EmptyInputError } from '../errors';
import { AnalysisWindow, RawTransaction } from '../interfaces';
import { monthBounds, toInstant } from '../utils/timestamps';

/**
 * Infers the intended analysis month from raw transaction timestamps.
 *
 * The window is derived from the data rather than configured: the month that
 * holds the earliest usable created_at, as a half-open UTC interval.
 * Raw transactions are used on purpose so the window does not move with
 * cleaning outcomes.
 */
@Injectable()
export class WindowInferenceService {
  private readonly logger = new Logger(WindowInferenceService.name);

  /**
   * @throws EmptyInputError when no transaction has a usable created_at
   */
  infer(transactions: readonly RawTransaction[]): AnalysisWindow {
    let earliest: number | null = null;

    for (const tx of transactions) {
      const createdAt = toInstant(tx.createdAt);
      if (createdAt !== null && (earliest === null || createdAt < earliest)) {
        earliest = createdAt;
      }
    }

    if (earliest === null) {
      throw new EmptyInputError(
        'Cannot infer analysis window: no transaction has a usable created_at',
        { transactions: transactions.length },
      );
    }

    const { start, end } = monthBounds(earliest);
    this.logger.log(
      `Inferred window [${start.toISOString()}, ${end.toISOString()}) from ${transactions.length} transactions`,
    );

    return { windowStart: start, windowEnd: end };
  }
}
