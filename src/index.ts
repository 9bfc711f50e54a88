export type {
  FunctionKey,
  CallObservation,
  TraceArtifact,
  SortKey,
  TableRow,
  DeadrunConfig,
  ResolvedConfig,
  OrphanReport,
} from './analyzer/types.js';
export { SORT_KEYS } from './analyzer/types.js';
export {
  DeadrunError,
  SourceParseError,
  EmptyTraceCacheError,
  TraceFormatError,
  ConfigError,
} from './analyzer/errors.js';
export { FunctionKeySet, compareKeys, serializeKey, normalizePath } from './analyzer/function-key.js';
export { DeclarationExtractor, declaredFunctions, declarationsIn } from './analyzer/declarations.js';
export type { DeclarationOptions } from './analyzer/declarations.js';
export { calledFunctions, calledFunctionsFrom, calledFunctionsFromTrace } from './analyzer/call-set.js';
export { resolveOrphans, findOrphans } from './analyzer/orphans.js';
export type { OrphanAnalysis } from './analyzer/orphans.js';
export { sortObservations, parseSortKey } from './analyzer/trace-stats.js';
export { buildOrphanReport, writeReport } from './analyzer/output.js';
export { TraceStore, traceHash } from './trace/store.js';
export type { TraceStoreOptions, RecordOptions, RecordResult, Catalog } from './trace/store.js';
export { NodeTraceRunner } from './trace/runner.js';
export type { TraceRunner, TraceRunRequest, TraceRunResult } from './trace/runner.js';
export { decodeV8Trace } from './trace/v8-decoder.js';
export { readArtifact, readCallObservations, writeArtifact } from './trace/artifact.js';
export { createCli } from './cli/index.js';
