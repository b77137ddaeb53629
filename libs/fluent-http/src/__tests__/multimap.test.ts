import { describe, expect, it } from 'vitest';
import { HeaderMap, ParamMap } from '../multimap';

describe('HeaderMap', () => {
  it('looks names up case-insensitively and keeps the first casing', () => {
    const headers = new HeaderMap();
    headers.set('Content-Type', 'text/plain');
    headers.add('content-type', 'charset=utf-8');

    expect(headers.get('CONTENT-TYPE')).toBe('text/plain');
    expect(headers.values('content-type')).toEqual(['text/plain', 'charset=utf-8']);
    expect(headers.toRecord()).toEqual({ 'Content-Type': 'text/plain, charset=utf-8' });
  });

  it('replaces every value on set', () => {
    const headers = new HeaderMap({ Accept: ['a', 'b'] });
    headers.set('accept', 'c');
    expect(headers.entries()).toEqual([['accept', 'c']]);
  });

  it('clones without sharing storage', () => {
    const headers = new HeaderMap({ 'X-Trace': 'a' });
    const copy = headers.clone();
    copy.add('X-Trace', 'b');
    copy.set('X-New', 'c');

    expect(headers.values('x-trace')).toEqual(['a']);
    expect(headers.has('x-new')).toBe(false);
  });
});

describe('ParamMap', () => {
  it('is case-sensitive and keeps repeated values in order', () => {
    const params = new ParamMap();
    params.add('a', '1').add('A', '2').add('a', '3');

    expect(params.values('a')).toEqual(['1', '3']);
    expect(params.entries()).toEqual([
      ['a', '1'],
      ['a', '3'],
      ['A', '2'],
    ]);
  });

  it('merges pairs of both maps without deduplication', () => {
    const merged = ParamMap.merge(new ParamMap([['lang', 'en']]), new ParamMap([['lang', 'fr']]));
    expect(merged.toSearchParams().toString()).toBe('lang=en&lang=fr');
  });
});
