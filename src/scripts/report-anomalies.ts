/**
 * Cleanroom Anomaly Report
 *
 * Runs the pipeline once over the configured store and prints the anomaly
 * report followed by the clean set sizes.
 * Run: npm run build && npm run report
 */

import 'reflect-metadata';
import { getConfig, validateConfig } from '../config';
import { closePool } from '../db';
import { PipelineResult } from '../interfaces';
import { AnomalyDetectorService } from '../services/anomaly-detector.service';
import { CleanerService } from '../services/cleaner.service';
import { PipelineService } from '../services/pipeline.service';
import { createRecordStore } from '../services/record-store.factory';
import { WindowInferenceService } from '../services/window-inference.service';

export function formatReport(result: PipelineResult): string[] {
  const lines: string[] = [];
  const { windowStart, windowEnd } = result.window;

  lines.push(`Window: ${windowStart.toISOString()} .. ${windowEnd.toISOString()} (end exclusive)`);
  lines.push('');
  lines.push('Anomalies:');
  for (const entry of result.anomalies) {
    const distinct = entry.distinctIds === null ? '' : ` (${entry.distinctIds} distinct ids)`;
    lines.push(`  ${entry.category.padEnd(48)} ${String(entry.badRows).padStart(6)}${distinct}`);
  }

  if (result.timestampIssues.length > 0) {
    lines.push('');
    lines.push('Malformed timestamps (treated as missing):');
    for (const issue of result.timestampIssues) {
      lines.push(`  ${issue.entity}.${issue.field}: ${issue.count} e.g. ${issue.samples.join(', ')}`);
    }
  }

  const stages = result.transactionStages;
  lines.push('');
  lines.push('Clean sets:');
  lines.push(`  users         ${result.clean.users.length}`);
  lines.push(
    `  transactions  ${result.clean.transactions.length}` +
      ` (raw ${stages.raw} → complete ${stages.complete} → lifecycle ${stages.lifecycleValid})`,
  );
  lines.push(`  app_events    ${result.clean.appEvents.length}`);

  return lines;
}

async function reportAnomalies(): Promise<void> {
  const config = getConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join('; ')}`);
  }

  const pipeline = new PipelineService(
    new WindowInferenceService(),
    new AnomalyDetectorService(),
    new CleanerService(),
  );
  const store = createRecordStore(config);

  console.log(`[Cleanroom] Reading snapshot from ${store.name}...`);
  const result = await pipeline.run(store);

  console.log('');
  for (const line of formatReport(result)) {
    console.log(line);
  }
}

if (require.main === module) {
  reportAnomalies()
    .then(() => closePool())
    .catch((error: unknown) => {
      console.error('[Cleanroom] Anomaly report failed:', error);
      process.exit(1);
    });
}
