import { CleanroomConfig } from '../config';
import { PgRecordStore } from '../db/raw-records';
import { RecordStore } from '../interfaces';
import { CsvRecordStore } from './csv-record-store';

/**
 * Postgres when DATABASE_URL is configured, the CSV directory otherwise
 */
export function createRecordStore(config: CleanroomConfig): RecordStore {
  if (config.databaseUrl) {
    return new PgRecordStore();
  }
  return new CsvRecordStore(config.csvDir);
}
