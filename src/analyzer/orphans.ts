import type { TraceStore } from '../trace/store.js';
import { calledFunctions } from './call-set.js';
import { DeclarationExtractor, type DeclarationOptions } from './declarations.js';
import { EmptyTraceCacheError } from './errors.js';
import type { FunctionKeySet } from './function-key.js';
import type { FunctionKey } from './types.js';

/** Declared functions never called, in (path, line, name) order */
export function resolveOrphans(declared: FunctionKeySet, called: FunctionKeySet): FunctionKey[] {
  return declared.difference(called).sorted();
}

export interface OrphanAnalysis {
  orphans: FunctionKey[];
  declared: FunctionKeySet;
  called: FunctionKeySet;
  tracedScripts: string[];
}

/**
 * Compare the functions declared in files matching `patterns` against every
 * stored trace. Throws EmptyTraceCacheError when nothing has been traced.
 */
export async function findOrphans(
  store: TraceStore,
  patterns: string[],
  options: DeclarationOptions = {}
): Promise<OrphanAnalysis> {
  const tracedScripts = store.listEntries();
  if (tracedScripts.length === 0) {
    throw new EmptyTraceCacheError();
  }

  const declared = await new DeclarationExtractor(options).declaredFunctions(patterns);
  const called = calledFunctions(store);

  return {
    orphans: resolveOrphans(declared, called),
    declared,
    called,
    tracedScripts,
  };
}
