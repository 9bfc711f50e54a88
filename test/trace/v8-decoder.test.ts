import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { decodeV8Trace, LineIndex, profileFrameTimes, sourcePath } from '../../src/trace/v8-decoder.js';
import type { CpuProfile } from '../../src/trace/v8-decoder.js';
import { coverageOf } from '../helpers/fake-runner.js';

const MATH = resolve(__dirname, '../fixtures/sample-app/src/math.js');
const MATH_SOURCE = readFileSync(MATH, 'utf-8');
const readSource = (path: string): string | null => (path === MATH ? MATH_SOURCE : null);

function frame(functionName: string, url: string, lineNumber: number) {
  return { functionName, url, lineNumber, columnNumber: 0 };
}

// root -> main -> fib -> fib (recursion)
//              -> helper
const PROFILE: CpuProfile = {
  nodes: [
    { id: 1, callFrame: frame('(root)', '', -1), children: [2] },
    { id: 2, callFrame: frame('main', 'file:///app/main.js', 0), children: [3, 4] },
    { id: 3, callFrame: frame('fib', 'file:///app/main.js', 4), children: [5] },
    { id: 5, callFrame: frame('fib', 'file:///app/main.js', 4), children: [] },
    { id: 4, callFrame: frame('helper', 'file:///app/main.js', 10) },
  ],
  startTime: 0,
  endTime: 100,
  samples: [2, 3, 5, 4],
  timeDeltas: [10, 20, 30, 25],
};

describe('V8 trace decoding', () => {
  describe('LineIndex', () => {
    it('should map offsets to 1-based lines and columns', () => {
      const index = new LineIndex('a\nbc\n');
      expect(index.locate(0)).toEqual({ line: 1, column: 1 });
      expect(index.locate(2)).toEqual({ line: 2, column: 1 });
      expect(index.locate(3)).toEqual({ line: 2, column: 2 });
      expect(index.locate(5)).toEqual({ line: 3, column: 1 });
    });

    it('should count every line terminator JavaScript knows', () => {
      const index = new LineIndex('a\u2028b\u2029c\rd\r\ne');
      expect(index.locate(2)).toEqual({ line: 2, column: 1 });
      expect(index.locate(4)).toEqual({ line: 3, column: 1 });
      expect(index.locate(6)).toEqual({ line: 4, column: 1 });
      expect(index.locate(9)).toEqual({ line: 5, column: 1 });
    });
  });

  describe('sourcePath', () => {
    it('should accept file URLs and absolute paths', () => {
      expect(sourcePath('file:///app/main.js')).toBe('/app/main.js');
      expect(sourcePath('/app/lib.cjs')).toBe('/app/lib.cjs');
    });

    it('should reject scripts that are not files', () => {
      expect(sourcePath('node:internal/main/run_main_module')).toBeNull();
      expect(sourcePath('')).toBeNull();
      expect(sourcePath('evalmachine.<anonymous>')).toBeNull();
    });
  });

  describe('profileFrameTimes', () => {
    const times = profileFrameTimes(PROFILE);
    const byName = (name: string) => times.find(t => t.frame.functionName === name);

    it('should attribute each sample until the next one', () => {
      expect(byName('main')?.selfTime).toBe(20);
      expect(byName('fib')?.selfTime).toBe(55);
      expect(byName('helper')?.selfTime).toBe(15);
    });

    it('should count cumulative time once under recursion', () => {
      expect(byName('fib')?.totalTime).toBe(55);
      expect(byName('main')?.totalTime).toBe(90);
      expect(byName('(root)')?.totalTime).toBe(90);
    });

    it('should tolerate a profile without samples', () => {
      const idle = profileFrameTimes({ ...PROFILE, samples: [], timeDeltas: [] });
      expect(idle.every(t => t.selfTime === 0 && t.totalTime === 0)).toBe(true);
    });
  });

  describe('decodeV8Trace', () => {
    const coverage = coverageOf(MATH, MATH_SOURCE, [
      { snippet: 'function add', name: 'add', count: 2 },
      { snippet: 'function subtract', name: 'subtract', count: 0 },
      { snippet: '(a, b) => a * b', name: 'multiply', count: 1 },
    ]);

    it('should keep only functions that ran, located by line', () => {
      const observations = decodeV8Trace({ coverage: [coverage], profiles: [] }, readSource);
      expect(observations.map(o => [o.line, o.column, o.name, o.calls])).toEqual([
        [1, 1, '', 1],
        [1, 8, 'add', 2],
        [9, 25, 'multiply', 1],
      ]);
      expect(observations.every(o => o.path === MATH)).toBe(true);
    });

    it('should sum call counts across processes', () => {
      const observations = decodeV8Trace({ coverage: [coverage, coverage], profiles: [] }, readSource);
      expect(observations.find(o => o.name === 'add')?.calls).toBe(4);
    });

    it('should skip scripts whose source cannot be read', () => {
      const missing = coverageOf('/gone/away.js', MATH_SOURCE, [{ snippet: 'function add', name: 'add', count: 1 }]);
      expect(decodeV8Trace({ coverage: [missing], profiles: [] }, readSource)).toEqual([]);
    });

    it('should join profile times onto covered functions', () => {
      const profile: CpuProfile = {
        nodes: [{ id: 1, callFrame: { functionName: 'add', url: pathToFileURL(MATH).href, lineNumber: 0, columnNumber: 7 } }],
        startTime: 0,
        endTime: 40,
        samples: [1],
        timeDeltas: [0],
      };
      const observations = decodeV8Trace({ coverage: [coverage], profiles: [profile] }, readSource);
      const add = observations.find(o => o.name === 'add');
      expect(add).toMatchObject({ calls: 2, selfTime: 40, totalTime: 40 });
      expect(observations).toHaveLength(3);
    });

    it('should keep functions seen only by the profiler', () => {
      const observations = decodeV8Trace({ coverage: [], profiles: [PROFILE] }, () => null);
      expect(observations.map(o => [o.path, o.line, o.name, o.calls])).toEqual([
        ['/app/main.js', 1, 'main', 0],
        ['/app/main.js', 5, 'fib', 0],
        ['/app/main.js', 11, 'helper', 0],
      ]);
    });
  });
});
