import ts from 'typescript';
import { z } from 'zod';
import { compareKeys, normalizePath, serializeKey } from '../analyzer/function-key.js';
import type { CallObservation } from '../analyzer/types.js';

// Raw V8 output formats. Only the fields read below are declared.

const coverageRangeSchema = z.object({
  startOffset: z.number(),
  endOffset: z.number(),
  count: z.number(),
});

const functionCoverageSchema = z.object({
  functionName: z.string(),
  ranges: z.array(coverageRangeSchema),
  isBlockCoverage: z.boolean().optional(),
});

const scriptCoverageSchema = z.object({
  url: z.string(),
  functions: z.array(functionCoverageSchema),
});

/** One file written to the NODE_V8_COVERAGE directory */
export const coverageFileSchema = z.object({
  result: z.array(scriptCoverageSchema),
});

const callFrameSchema = z.object({
  functionName: z.string(),
  url: z.string(),
  /** 0-based */
  lineNumber: z.number(),
  /** 0-based */
  columnNumber: z.number(),
});

const profileNodeSchema = z.object({
  id: z.number(),
  callFrame: callFrameSchema,
  children: z.array(z.number()).optional(),
});

/** A .cpuprofile written by --cpu-prof */
export const cpuProfileSchema = z.object({
  nodes: z.array(profileNodeSchema),
  startTime: z.number(),
  endTime: z.number(),
  samples: z.array(z.number()).optional(),
  timeDeltas: z.array(z.number()).optional(),
});

export type CoverageFile = z.infer<typeof coverageFileSchema>;
export type CpuProfile = z.infer<typeof cpuProfileSchema>;
export type CallFrame = z.infer<typeof callFrameSchema>;

/** Everything one traced execution left behind */
export interface RawTrace {
  coverage: CoverageFile[];
  profiles: CpuProfile[];
}

/** Returns the current text of a source file, or null when it cannot be read */
export type SourceReader = (path: string) => string | null;

export interface FrameTimes {
  frame: CallFrame;
  /** microseconds */
  selfTime: number;
  /** microseconds, counted once per frame even under recursion */
  totalTime: number;
}

/**
 * Reduce raw V8 coverage and CPU profiles to one observation per function
 * that ran. Call counts come from coverage; times come from the profiles.
 * Scripts that are not files on disk (node: internals, eval) are dropped.
 */
export function decodeV8Trace(raw: RawTrace, readSource: SourceReader): CallObservation[] {
  const observations = new Map<string, CallObservation>();
  const lineIndexes = new Map<string, LineIndex | null>();

  const lineIndexFor = (path: string): LineIndex | null => {
    if (!lineIndexes.has(path)) {
      const source = readSource(path);
      lineIndexes.set(path, source === null ? null : new LineIndex(source));
    }
    return lineIndexes.get(path) ?? null;
  };

  for (const file of raw.coverage) {
    for (const script of file.result) {
      const path = sourcePath(script.url);
      if (!path) continue;
      const index = lineIndexFor(path);
      if (!index) continue;

      for (const fn of script.functions) {
        const [range] = fn.ranges;
        if (!range || range.count === 0) continue;

        const { line, column } = index.locate(range.startOffset);
        const observation = upsert(observations, {
          path,
          line,
          column,
          name: fn.functionName,
        });
        observation.calls += range.count;
      }
    }
  }

  for (const profile of raw.profiles) {
    for (const { frame, selfTime, totalTime } of profileFrameTimes(profile)) {
      const path = sourcePath(frame.url);
      if (!path) continue;

      const observation = upsert(observations, {
        path,
        line: frame.lineNumber + 1,
        column: frame.columnNumber + 1,
        name: frame.functionName,
      });
      observation.selfTime += selfTime;
      observation.totalTime += totalTime;
    }
  }

  return [...observations.values()].sort(compareKeys);
}

function upsert(
  observations: Map<string, CallObservation>,
  location: Pick<CallObservation, 'path' | 'line' | 'column' | 'name'>
): CallObservation {
  const id = serializeKey(location);
  let observation = observations.get(id);
  if (!observation) {
    observation = { ...location, calls: 0, selfTime: 0, totalTime: 0 };
    observations.set(id, observation);
  }
  return observation;
}

/** Absolute path for file-backed script URLs, null for everything else */
export function sourcePath(url: string): string | null {
  if (url.startsWith('file:')) return normalizePath(url);
  if (url.startsWith('/')) return normalizePath(url);
  if (/^[A-Za-z]:[\\/]/.test(url)) return normalizePath(url);
  return null;
}

/**
 * Maps UTF-16 offsets to 1-based line and column. Line breaks are those of
 * the TypeScript scanner (\n, \r\n, lone \r, U+2028, U+2029), the same
 * ones V8 and the declaration extractor count.
 */
export class LineIndex {
  private source: ts.SourceFileLike;

  constructor(text: string) {
    this.source = { text };
  }

  locate(offset: number): { line: number; column: number } {
    const { line, character } = ts.getLineAndCharacterOfPosition(this.source, offset);
    return { line: line + 1, column: character + 1 };
  }
}

function frameId(frame: CallFrame): string {
  return `${frame.url}:${frame.lineNumber}:${frame.columnNumber}:${frame.functionName}`;
}

/**
 * Self and cumulative time per call frame. A sample lasts until the next
 * one; the last sample lasts until the profile's end time.
 */
export function profileFrameTimes(profile: CpuProfile): FrameTimes[] {
  const nodes = new Map(profile.nodes.map(node => [node.id, node]));
  const selfById = new Map<number, number>();

  const samples = profile.samples ?? [];
  const deltas = profile.timeDeltas ?? [];
  const stamps: number[] = [];
  let clock = profile.startTime;
  for (let i = 0; i < samples.length; i++) {
    clock += deltas[i] ?? 0;
    stamps.push(clock);
  }
  for (let i = 0; i < samples.length; i++) {
    const end = i + 1 < samples.length ? stamps[i + 1] : profile.endTime;
    const duration = Math.max(0, end - stamps[i]);
    selfById.set(samples[i], (selfById.get(samples[i]) ?? 0) + duration);
  }

  const childIds = new Set(profile.nodes.flatMap(node => node.children ?? []));
  const roots = profile.nodes.filter(node => !childIds.has(node.id)).map(node => node.id);

  // Pre-order walk; totals are then summed bottom-up over the reversed order.
  const order: number[] = [];
  const seen = new Set<number>();
  const pending = [...roots].reverse();
  while (pending.length > 0) {
    const id = pending.pop();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    order.push(id);
    const children = nodes.get(id)?.children ?? [];
    for (let i = children.length - 1; i >= 0; i--) {
      pending.push(children[i]);
    }
  }

  const totalById = new Map<number, number>();
  for (let i = order.length - 1; i >= 0; i--) {
    const id = order[i];
    let total = selfById.get(id) ?? 0;
    for (const child of nodes.get(id)?.children ?? []) {
      total += totalById.get(child) ?? 0;
    }
    totalById.set(id, total);
  }

  const times = new Map<string, FrameTimes>();
  for (const id of order) {
    const node = nodes.get(id);
    if (!node) continue;
    const key = frameId(node.callFrame);
    const entry = times.get(key) ?? { frame: node.callFrame, selfTime: 0, totalTime: 0 };
    entry.selfTime += selfById.get(id) ?? 0;
    times.set(key, entry);
  }

  // Cumulative time is added only at the outermost activation of a frame,
  // so recursive calls are not counted twice.
  const active = new Map<string, number>();
  const stack: Array<{ id: number; exit: boolean }> = [...roots].reverse().map(id => ({ id, exit: false }));
  const visited = new Set<number>();
  while (stack.length > 0) {
    const item = stack.pop();
    if (!item) break;
    const node = nodes.get(item.id);
    if (!node) continue;
    const key = frameId(node.callFrame);

    if (item.exit) {
      active.set(key, (active.get(key) ?? 1) - 1);
      continue;
    }
    if (visited.has(item.id)) continue;
    visited.add(item.id);

    const depth = active.get(key) ?? 0;
    if (depth === 0) {
      const entry = times.get(key);
      if (entry) entry.totalTime += totalById.get(item.id) ?? 0;
    }
    active.set(key, depth + 1);

    stack.push({ id: item.id, exit: true });
    const children = node.children ?? [];
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ id: children[i], exit: false });
    }
  }

  return [...times.values()];
}
