import { readCallObservations } from '../trace/artifact.js';
import type { TraceStore } from '../trace/store.js';
import { FunctionKeySet, normalizePath } from './function-key.js';
import type { CallObservation } from './types.js';

/** Keys of every function that ran, given the decoded observations of one trace */
export function calledFunctionsFrom(observations: Iterable<CallObservation>): FunctionKeySet {
  const called = new FunctionKeySet();
  for (const { path, line, name, calls } of observations) {
    if (calls === 0) continue;
    called.add({ path: normalizePath(path), line, name });
  }
  return called;
}

/** Functions called in one stored trace artifact */
export function calledFunctionsFromTrace(artifactPath: string): FunctionKeySet {
  return calledFunctionsFrom(readCallObservations(artifactPath));
}

/**
 * Union of the functions called in every artifact on disk. Artifacts the
 * catalog no longer references are included.
 */
export function calledFunctions(store: TraceStore): FunctionKeySet {
  const called = new FunctionKeySet();
  for (const artifactPath of store.artifactFiles()) {
    called.addAll(calledFunctionsFromTrace(artifactPath));
  }
  return called;
}
