import { CleanAppEvent, CleanTransaction, CleanUser } from './records.interface';

export interface CleanDataset {
  users: CleanUser[];
  transactions: CleanTransaction[];
  appEvents: CleanAppEvent[];
}

/**
 * Row counts after each transaction cleaning stage
 */
export interface TransactionStageCounts {
  raw: number;
  complete: number;
  lifecycleValid: number;
  deduplicated: number;
}

export interface CleaningResult {
  clean: CleanDataset;
  transactionStages: TransactionStageCounts;
}
