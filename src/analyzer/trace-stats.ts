import { ConfigError } from './errors.js';
import { compareKeys } from './function-key.js';
import { SORT_KEYS, type CallObservation, type SortKey } from './types.js';

export const SORT_KEY_LABELS: Record<SortKey, string> = {
  ncalls: 'call count',
  tottime: 'internal time',
  percall: 'internal time per call',
  cumtime: 'cumulative time',
  filename: 'file name',
};

function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some(key => key === value);
}

/** Parse a sort key, case-insensitively */
export function parseSortKey(value: string): SortKey {
  const key = value.toLowerCase();
  if (!isSortKey(key)) {
    throw new ConfigError(`Invalid sort key "${value}". Expected one of: ${SORT_KEYS.join(', ')}`);
  }
  return key;
}

/** Internal time per call, 0 for functions seen only by the sampler */
export function perCall(time: number, calls: number): number {
  return calls > 0 ? time / calls : 0;
}

const RANKINGS: Record<Exclude<SortKey, 'filename'>, (o: CallObservation) => number> = {
  ncalls: o => o.calls,
  tottime: o => o.selfTime,
  percall: o => perCall(o.selfTime, o.calls),
  cumtime: o => o.totalTime,
};

/**
 * Order observations for the stats listing. Numeric rankings are
 * descending; ties and the `filename` key fall back to location order.
 */
export function sortObservations(observations: CallObservation[], sortBy: SortKey): CallObservation[] {
  if (sortBy === 'filename') {
    return [...observations].sort(compareKeys);
  }
  const rank = RANKINGS[sortBy];
  return [...observations].sort((a, b) => rank(b) - rank(a) || compareKeys(a, b));
}

export interface TraceSummary {
  functions: number;
  calls: number;
  /** microseconds */
  selfTime: number;
}

export function summarizeObservations(observations: CallObservation[]): TraceSummary {
  return observations.reduce<TraceSummary>(
    (summary, o) => ({
      functions: summary.functions + 1,
      calls: summary.calls + o.calls,
      selfTime: summary.selfTime + o.selfTime,
    }),
    { functions: 0, calls: 0, selfTime: 0 }
  );
}
