import { describe, it, expect } from 'vitest';
import { FormatError, parseCompactPairs, parseMountPoints, parseVolumes } from '../src/index.js';

describe('parseCompactPairs', () => {
  it('decodes pairs in input order', () => {
    expect(parseCompactPairs('a:b,c:d', 'volume')).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
  });

  it('returns an empty list for blank or missing input', () => {
    expect(parseCompactPairs(undefined, 'volume')).toEqual([]);
    expect(parseCompactPairs('', 'volume')).toEqual([]);
    expect(parseCompactPairs('   ', 'volume')).toEqual([]);
  });

  it('trims whitespace around segments and components', () => {
    expect(parseCompactPairs('data : /var/data, cache:/var/cache ', 'mount point')).toEqual([
      ['data', '/var/data'],
      ['cache', '/var/cache'],
    ]);
  });

  it.each([
    ['no separator', 'data'],
    ['two separators', 'data:/var:extra'],
    ['empty name', ':/var/data'],
    ['empty path', 'data:'],
    ['trailing comma', 'data:/var/data,'],
  ])('rejects %s', (_case, spec) => {
    expect(() => parseCompactPairs(spec, 'volume')).toThrow(FormatError);
  });

  it('reports the offending segment and its position', () => {
    let caught: unknown;
    try {
      parseCompactPairs('a:b,c:d:e', 'volume');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FormatError);
    if (caught instanceof FormatError) {
      expect(caught.message).toBe('Malformed volume entry #2 "c:d:e": expected name:path');
      expect(caught.segment).toBe('c:d:e');
      expect(caught.position).toBe(1);
      expect(caught.name).toBe('FormatError');
    }
  });
});

describe('parseMountPoints', () => {
  it('lifts pairs into mount points', () => {
    expect(parseMountPoints('data:/var/data,cache:/cache')).toEqual([
      { sourceVolume: 'data', containerPath: '/var/data' },
      { sourceVolume: 'cache', containerPath: '/cache' },
    ]);
  });

  it('names the list kind in errors', () => {
    expect(() => parseMountPoints('data')).toThrow('Malformed mount point entry #1 "data"');
  });
});

describe('parseVolumes', () => {
  it('lifts pairs into host volumes', () => {
    expect(parseVolumes('data:/host/data')).toEqual([
      { name: 'data', host: { sourcePath: '/host/data' } },
    ]);
  });

  it('returns an empty list when no volumes are declared', () => {
    expect(parseVolumes(undefined)).toEqual([]);
  });
});
