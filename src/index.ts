// Cleanroom - anomaly detection and cleaning for P2P payment snapshots

// Interfaces
export * from './interfaces';

// Errors
export { CleanroomError, EmptyInputError, MalformedTimestampError, isCleanroomError } from './errors';

// Services
export { WindowInferenceService } from './services/window-inference.service';
export { AnomalyDetectorService } from './services/anomaly-detector.service';
export { CleanerService, RankedTransaction } from './services/cleaner.service';
export { PipelineService } from './services/pipeline.service';
export * from './services/record-rules';

// Record stores
export { InMemoryRecordStore } from './services/in-memory-record-store';
export { CsvRecordStore, CSV_FILES, ReadText } from './services/csv-record-store';
export { PgRecordStore } from './db/raw-records';
export { createRecordStore } from './services/record-store.factory';

// Utilities
export { groupBy, pickBestPerKey, rankDescending, Comparator } from './utils/ranking';
export { parseTimestamp, toInstant, isMissing, isPresent, monthBounds } from './utils/timestamps';

// Configuration
export { CleanroomConfig, loadConfig, validateConfig, getConfig, resetConfig } from './config';
