import { writeFileSync } from 'node:fs';
import type { FunctionKey, OrphanReport } from './types.js';

/** Build the orphan report from an analysis result */
export function buildOrphanReport(
  orphans: FunctionKey[],
  meta: Omit<OrphanReport, 'orphans' | 'generatedAt'>
): OrphanReport {
  return {
    generatedAt: new Date().toISOString(),
    ...meta,
    orphans,
  };
}

/** Write the report to a JSON file */
export function writeReport(report: OrphanReport, outputPath: string): void {
  const json = JSON.stringify(report, null, 2);
  writeFileSync(outputPath, json, 'utf-8');
}
