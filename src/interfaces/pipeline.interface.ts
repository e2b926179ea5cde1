import { AnomalyReport, TimestampIssue } from './anomaly.interface';
import { CleanDataset, TransactionStageCounts } from './cleaning.interface';
import { AnalysisWindow } from './window.interface';

export enum PipelineStage {
  LOAD_SNAPSHOT = 'load_snapshot',
  WINDOW_INFERENCE = 'window_inference',
  ANOMALY_DETECTION = 'anomaly_detection',
  CLEANING = 'cleaning',
}

/**
 * Individual stage result for observability
 */
export interface StageResult {
  stage: PipelineStage;
  success: boolean;
  duration: number;
  error?: string;
}

export interface PipelineResult {
  window: AnalysisWindow;
  anomalies: AnomalyReport;
  timestampIssues: TimestampIssue[];
  clean: CleanDataset;
  transactionStages: TransactionStageCounts;
  stages: StageResult[];
  processingTime: number;
}
