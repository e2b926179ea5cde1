import { Injectable, Logger } from '@nestjs/common';
import { AnomalyDetectorService } from './anomaly-detector.service';
import { CleanerService } from './cleaner.service';
import { WindowInferenceService } from './window-inference.service';
import {
  AnalysisWindow,
  AnomalyReport,
  CleaningResult,
  PipelineResult,
  PipelineStage,
  RawSnapshot,
  RecordStore,
  StageResult,
  TimestampIssue,
} from '../interfaces';

/**
 * PipelineService - runs one cleaning pass over one snapshot
 *
 * Pipeline: Load snapshot → Infer window → Detect anomalies → Clean
 *
 * The window is computed once and handed to both the detector and the cleaner.
 * Window inference failure is the only error surfaced to the caller.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private readonly windowInference: WindowInferenceService,
    private readonly anomalyDetector: AnomalyDetectorService,
    private readonly cleaner: CleanerService,
  ) {}

  /**
   * Read a snapshot from the store and run the pipeline over it
   */
  async run(store: RecordStore): Promise<PipelineResult> {
    const startTime = Date.now();
    const loadStart = Date.now();

    let snapshot: RawSnapshot;
    try {
      snapshot = await store.loadSnapshot();
    } catch (error) {
      this.logger.error(`Failed to load snapshot from ${store.name}: ${describe(error)}`);
      throw error;
    }

    this.logger.log(
      `Loaded snapshot from ${store.name}: ${snapshot.users.length} users, ` +
        `${snapshot.transactions.length} transactions, ${snapshot.appEvents.length} app events`,
    );

    const loadStage: StageResult = {
      stage: PipelineStage.LOAD_SNAPSHOT,
      success: true,
      duration: Date.now() - loadStart,
    };

    const result = this.runSnapshot(snapshot);
    return {
      ...result,
      stages: [loadStage, ...result.stages],
      processingTime: Date.now() - startTime,
    };
  }

  /**
   * Run the pipeline over an already materialized snapshot
   *
   * @throws EmptyInputError when no analysis window can be inferred
   */
  runSnapshot(snapshot: RawSnapshot): PipelineResult {
    const startTime = Date.now();
    const stages: StageResult[] = [];

    const window = this.timed(stages, PipelineStage.WINDOW_INFERENCE, () =>
      this.windowInference.infer(snapshot.transactions),
    );

    const { anomalies, timestampIssues } = this.timed(
      stages,
      PipelineStage.ANOMALY_DETECTION,
      (): { anomalies: AnomalyReport; timestampIssues: TimestampIssue[] } => ({
        anomalies: this.anomalyDetector.detect(snapshot, window),
        timestampIssues: this.anomalyDetector.scanTimestamps(snapshot),
      }),
    );

    const cleaning: CleaningResult = this.timed(stages, PipelineStage.CLEANING, () =>
      this.cleaner.clean(snapshot, window),
    );

    const processingTime = Date.now() - startTime;
    this.logger.log(`Pipeline completed in ${processingTime}ms`);

    return {
      window,
      anomalies,
      timestampIssues,
      clean: cleaning.clean,
      transactionStages: cleaning.transactionStages,
      stages,
      processingTime,
    };
  }

  /**
   * Infer the window only, for callers that need it without a full run
   */
  inferWindow(snapshot: RawSnapshot): AnalysisWindow {
    return this.windowInference.infer(snapshot.transactions);
  }

  private timed<T>(stages: StageResult[], stage: PipelineStage, fn: () => T): T {
    const start = Date.now();
    try {
      const value = fn();
      stages.push({ stage, success: true, duration: Date.now() - start });
      return value;
    } catch (error) {
      const message = describe(error);
      stages.push({ stage, success: false, duration: Date.now() - start, error: message });
      this.logger.error(`Stage ${stage} failed: ${message}`);
      throw error;
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
