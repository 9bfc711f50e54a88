/** Identity of a function occurrence, shared by the static and dynamic views */
export interface FunctionKey {
  /** Absolute source path, forward slashes */
  path: string;
  /** 1-based line on which the function's runtime range begins */
  line: number;
  name: string;
}

/** A function observed running during a traced execution */
export interface CallObservation extends FunctionKey {
  /** 1-based column of the function start */
  column: number;
  /** Invocation count from precise coverage (0 when only sampled) */
  calls: number;
  /** Time spent in the function itself, in microseconds */
  selfTime: number;
  /** Time spent in the function and everything it called, in microseconds */
  totalTime: number;
}

/** The persisted record of one traced execution */
export interface TraceArtifact {
  version: 1;
  /** Absolute path of the traced script */
  script: string;
  recordedAt: string;
  /** Exit code of the script, null when it was killed by a signal */
  exitCode: number | null;
  durationMs: number;
  functions: CallObservation[];
}

/** Rankings available for the trace statistics listing */
export type SortKey = 'ncalls' | 'tottime' | 'percall' | 'cumtime' | 'filename';

export const SORT_KEYS: readonly SortKey[] = ['ncalls', 'tottime', 'percall', 'cumtime', 'filename'];

/** Row of the orphan/declaration table */
export type TableRow = [name: string, location: string];

/** Configuration file schema */
export interface DeadrunConfig {
  traceDir: string;
  exclude: string[];
  numlines: number;
  sortBy: SortKey;
  nameWidth: number;
  nodeArgs: string[];
}

/** Resolved config (with defaults applied) */
export interface ResolvedConfig extends DeadrunConfig {
  cwd: string;
}

/** JSON report written by `orphans --output` */
export interface OrphanReport {
  generatedAt: string;
  cwd: string;
  patterns: string[];
  tracedScripts: string[];
  totalDeclared: number;
  totalCalled: number;
  orphans: FunctionKey[];
}
