import { describe, it, expect } from 'vitest';
import { compareKeys, FunctionKeySet, normalizePath, serializeKey } from '../src/analyzer/function-key.js';
import type { FunctionKey } from '../src/analyzer/types.js';

function key(path: string, line: number, name: string): FunctionKey {
  return { path, line, name };
}

describe('Function keys', () => {
  describe('normalizePath', () => {
    it('should resolve relative paths against the given directory', () => {
      expect(normalizePath('src/a.js', '/project')).toBe('/project/src/a.js');
    });

    it('should convert file URLs to paths', () => {
      expect(normalizePath('file:///project/src/a.js')).toBe('/project/src/a.js');
    });

    it('should leave absolute paths alone', () => {
      expect(normalizePath('/project/src/../lib/a.js', '/elsewhere')).toBe('/project/lib/a.js');
    });
  });

  it('should serialize as path:line:name', () => {
    expect(serializeKey(key('/a.js', 3, 'foo'))).toBe('/a.js:3:foo');
  });

  describe('compareKeys', () => {
    it('should order by path, then line, then name', () => {
      const keys = [
        key('/b.js', 1, 'a'),
        key('/a.js', 10, 'a'),
        key('/a.js', 9, 'z'),
        key('/a.js', 9, 'b'),
      ];
      expect(keys.sort(compareKeys)).toEqual([
        key('/a.js', 9, 'b'),
        key('/a.js', 9, 'z'),
        key('/a.js', 10, 'a'),
        key('/b.js', 1, 'a'),
      ]);
    });

    it('should compare lines numerically', () => {
      expect(compareKeys(key('/a.js', 9, 'x'), key('/a.js', 10, 'x'))).toBeLessThan(0);
    });
  });

  describe('FunctionKeySet', () => {
    it('should treat keys with equal fields as one element', () => {
      const set = new FunctionKeySet([key('/a.js', 3, 'foo'), { path: '/a.js', line: 3, name: 'foo' }]);
      expect(set.size).toBe(1);
      expect(set.has(key('/a.js', 3, 'foo'))).toBe(true);
    });

    it('should keep keys differing in any field apart', () => {
      const set = new FunctionKeySet([key('/a.js', 3, 'foo'), key('/b.js', 3, 'foo'), key('/a.js', 4, 'foo'), key('/a.js', 3, 'bar')]);
      expect(set.size).toBe(4);
    });

    it('should compute the difference without touching either operand', () => {
      const declared = new FunctionKeySet([key('/a.js', 3, 'foo'), key('/a.js', 9, 'bar')]);
      const called = new FunctionKeySet([key('/a.js', 3, 'foo'), key('/c.js', 1, 'other')]);

      expect(declared.difference(called).sorted()).toEqual([key('/a.js', 9, 'bar')]);
      expect(declared.size).toBe(2);
      expect(called.size).toBe(2);
    });

    it('should not alias the keys it stores', () => {
      const original = key('/a.js', 1, 'foo');
      const set = new FunctionKeySet([original]);
      original.name = 'renamed';
      expect(set.sorted()).toEqual([key('/a.js', 1, 'foo')]);
    });

    it('should hand out copies that callers can change freely', () => {
      const set = new FunctionKeySet([key('/a.js', 1, 'foo')]);
      set.sorted()[0].name = 'renamed';
      [...set][0].line = 99;

      expect(set.has(key('/a.js', 1, 'foo'))).toBe(true);
      expect(set.sorted()).toEqual([key('/a.js', 1, 'foo')]);
    });
  });
});
