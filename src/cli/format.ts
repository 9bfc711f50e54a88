import { isAbsolute, relative } from 'node:path';
import chalk from 'chalk';
import { perCall, sortObservations, summarizeObservations, SORT_KEY_LABELS } from '../analyzer/trace-stats.js';
import type { FunctionKey, SortKey, TableRow, TraceArtifact } from '../analyzer/types.js';

/** Path relative to cwd when the file lies beneath it, absolute otherwise */
export function relativeToCwd(path: string, cwd: string = process.cwd()): string {
  const rel = relative(cwd, path);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return path;
  return rel.split('\\').join('/');
}

export interface TableOptions {
  colWidth?: number;
  indent?: number;
  cwd?: string;
}

/** Shorten names wider than the column, for display only */
export function truncateName(name: string, colWidth = 28): string {
  if (name.length > colWidth) {
    return `${name.slice(0, colWidth - 3)}...`;
  }
  return name;
}

export function tableRow(key: FunctionKey, options: TableOptions = {}): TableRow {
  const { colWidth = 28, cwd } = options;
  return [truncateName(key.name, colWidth), `${relativeToCwd(key.path, cwd)}:${key.line}`];
}

export function tableRows(keys: FunctionKey[], options: TableOptions = {}): TableRow[] {
  return keys.map(key => tableRow(key, options));
}

export function tableLine(row: TableRow, options: TableOptions = {}): string {
  const { colWidth = 28, indent = 2 } = options;
  const [name, location] = row;
  return `${' '.repeat(indent)}${name.padEnd(colWidth)} ${location}`;
}

/** Table of function keys, one per line, in the given order */
export function formatKeyTable(keys: FunctionKey[], options: TableOptions = {}): string[] {
  return tableRows(keys, options).map(row => tableLine(row, options));
}

export interface StatsOptions {
  sortBy: SortKey;
  limit: number;
  cwd?: string;
}

function ms(microseconds: number): string {
  return (microseconds / 1000).toFixed(3).padStart(9);
}

/** Human-readable per-function statistics of one trace */
export function formatTraceStats(artifact: TraceArtifact, options: StatsOptions): string {
  const { sortBy, limit, cwd } = options;
  const summary = summarizeObservations(artifact.functions);
  const rows = sortObservations(artifact.functions, sortBy).slice(0, limit);
  const exit = artifact.exitCode === null ? 'killed' : `exit code ${artifact.exitCode}`;

  const lines = [
    `${relativeToCwd(artifact.script, cwd)} (${exit}, ${artifact.durationMs} ms)`,
    `  ${summary.functions} functions, ${summary.calls} calls recorded`,
    '',
    `  Ordered by: ${SORT_KEY_LABELS[sortBy]}`,
  ];
  if (rows.length < summary.functions) {
    lines.push(`  List reduced from ${summary.functions} to ${rows.length} due to restriction <${limit}>`);
  }
  lines.push('', '   ncalls  tottime  percall  cumtime  percall  filename:lineno(function)');

  for (const o of rows) {
    const location = `${relativeToCwd(o.path, cwd)}:${o.line}(${o.name || '<anonymous>'})`;
    lines.push(
      [
        String(o.calls).padStart(9),
        ms(o.selfTime),
        ms(perCall(o.selfTime, o.calls)),
        ms(o.totalTime),
        ms(perCall(o.totalTime, o.calls)),
        `  ${chalk.dim(location)}`,
      ].join('')
    );
  }

  return lines.join('\n');
}
