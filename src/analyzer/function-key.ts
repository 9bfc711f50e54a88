import { resolve, sep } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { FunctionKey } from './types.js';

/**
 * Normalize a source location to the absolute, forward-slash form used by
 * every FunctionKey. Accepts plain paths (relative to `cwd`) and file: URLs.
 */
export function normalizePath(path: string, cwd: string = process.cwd()): string {
  const plain = path.startsWith('file:') ? fileURLToPath(path) : path;
  const absolute = resolve(cwd, plain);
  return sep === '/' ? absolute : absolute.split(sep).join('/');
}

/** Serialized form used as the join key between declared and called sets */
export function serializeKey(key: FunctionKey): string {
  return `${key.path}:${key.line}:${key.name}`;
}

export function createKey(path: string, line: number, name: string): FunctionKey {
  return { path, line, name };
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Total order over keys: path, then line, then name */
export function compareKeys(a: FunctionKey, b: FunctionKey): number {
  return compareStrings(a.path, b.path) || a.line - b.line || compareStrings(a.name, b.name);
}

/** A set of function keys compared by value */
export class FunctionKeySet implements Iterable<FunctionKey> {
  private entries = new Map<string, FunctionKey>();

  constructor(keys: Iterable<FunctionKey> = []) {
    for (const key of keys) {
      this.add(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  add(key: FunctionKey): this {
    const id = serializeKey(key);
    if (!this.entries.has(id)) {
      this.entries.set(id, { path: key.path, line: key.line, name: key.name });
    }
    return this;
  }

  has(key: FunctionKey): boolean {
    return this.entries.has(serializeKey(key));
  }

  /** Add every key of `other` to this set */
  addAll(other: Iterable<FunctionKey>): this {
    for (const key of other) {
      this.add(key);
    }
    return this;
  }

  /** Keys of this set absent from `other`, as a new set */
  difference(other: FunctionKeySet): FunctionKeySet {
    const result = new FunctionKeySet();
    for (const key of this) {
      if (!other.has(key)) result.add(key);
    }
    return result;
  }

  /** Keys in total order */
  sorted(): FunctionKey[] {
    return [...this.entries.values()].map(key => ({ ...key })).sort(compareKeys);
  }

  *[Symbol.iterator](): Iterator<FunctionKey> {
    for (const key of this.entries.values()) {
      yield { ...key };
    }
  }
}
