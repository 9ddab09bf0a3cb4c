import { describe, it, expect } from 'vitest';
import { Entry, FieldError } from './bibtex-entry';
import { InputError } from './bibtex-messages';
import { Parser } from './bibtex-parser';
import { thrownBy } from './test-helpers';

function entryWith(fields: [string, string][]): Entry {
  return new Entry(fields, 'misc', 'K');
}

describe('Entry', () => {
  it('keeps the first slot and the last value of a repeated field', () => {
    const entry = new Entry([['title', 'A'], ['year', '2001'], ['title', 'B']], 'article', 'K');
    expect([...entry.fields]).toEqual([['title', 'B'], ['year', '2001']]);
  });

  it('reports a missing field through lookup and require', () => {
    const entry = entryWith([['title', 'T']]);
    expect(entry.lookup('title')).toEqual({ found: true, value: 'T' });

    const missing = entry.lookup('year');
    expect(missing.found).toBe(false);
    if (!missing.found) {
      expect(missing.error.field).toBe('year');
      expect(missing.error.entry).toBe(entry);
    }

    const err = thrownBy(() => entry.require('year'));
    expect(err).toBeInstanceOf(FieldError);
    expect(err).toHaveProperty('message', '"K": missing field "year"');
    expect(entry.get('year')).toBeUndefined();
  });

  it('compares fields in order, type and key, ignoring positions', () => {
    const a = new Entry([['title', 'T'], ['year', '2001']], 'misc', 'K');
    const parsed = new Parser().parse('@misc{K, title = {T}, year = 2001}').finalize().get('k')!;
    expect(a.equals(parsed)).toBe(true);
    expect(a.equals(new Entry([['year', '2001'], ['title', 'T']], 'misc', 'K'))).toBe(false);
    expect(a.equals(new Entry([['title', 'T'], ['year', '2001']], 'book', 'K'))).toBe(false);
    expect(a.equals(new Entry([['title', 'T'], ['year', '2001']], 'misc', 'k'))).toBe(false);
  });

  it('describes itself by key and position', () => {
    const parsed = new Parser().parse('\n@misc{Key}').finalize().get('key')!;
    expect(String(parsed)).toBe('"Key" at <string>:2:1');
    expect(String(entryWith([]))).toBe('"K"');
  });

  describe('resolveCrossref', () => {
    const input = [
      '@inproceedings{A, title = {Paper}, crossref = {b}}',
      '@proceedings{B, title = {Proc}, journal = "X"}',
    ].join('\n');

    it('fills in fields the entry does not define and drops crossref', () => {
      const db = new Parser().parse(input).finalize();
      const a = db.get('a')!;
      const resolved = a.resolveCrossref(db);

      expect(resolved).not.toBe(a);
      expect([...resolved.fields]).toEqual([['title', 'Paper'], ['journal', 'X']]);
      expect(resolved.fieldPos.get('journal')).toBe(db.get('b')!.fieldPos.get('journal'));
      expect(resolved.fieldPos.has('crossref')).toBe(false);
      expect(resolved.type).toBe('inproceedings');
      expect(resolved.key).toBe('A');
    });

    it('leaves the referring entry unchanged', () => {
      const db = new Parser().parse(input).finalize();
      const a = db.get('a')!;
      a.resolveCrossref(db);

      expect([...a.fields]).toEqual([['title', 'Paper'], ['crossref', 'b']]);
      expect([...a.fieldPos.keys()]).toEqual(['title', 'crossref']);
    });

    it('returns an entry without crossref as is', () => {
      const db = new Parser().parse(input).finalize();
      const b = db.get('b')!;
      expect(b.resolveCrossref(db)).toBe(b);
    });

    it('throws when the target is not in the database', () => {
      const entry = entryWith([['crossref', 'nowhere']]);
      expect(() => entry.resolveCrossref(new Map())).toThrow('crossref target "nowhere" of "K" is not in the database');
    });
  });

  describe('dateKey', () => {
    it('is empty without year or month', () => {
      expect(entryWith([['title', 'T']]).dateKey()).toEqual([]);
    });

    it('has the year alone', () => {
      expect(entryWith([['year', '2001']]).dateKey()).toEqual([2001]);
    });

    it('has year and month', () => {
      expect(entryWith([['year', '2001'], ['month', 'March']]).dateKey()).toEqual([2001, 3]);
    });

    it('rejects a year that is not a number, at the field position', () => {
      const entry = new Parser().parse('@misc{k, year = {MMXX}}').finalize().get('k')!;
      const err = thrownBy(() => entry.dateKey());
      expect(err).toBeInstanceOf(InputError);
      expect(err).toHaveProperty('message', '<string>:1:10: invalid year "MMXX"');
    });

    it('rejects a year too large to hold exactly', () => {
      const err = thrownBy(() => entryWith([['year', '99999999999999999999']]).dateKey());
      expect(err).toBeInstanceOf(InputError);
      expect(err).toHaveProperty('message', 'invalid year "99999999999999999999"');
      expect(entryWith([['year', '0002001']]).dateKey()).toEqual([2001]);
    });

    it('rejects a month without a year', () => {
      const err = thrownBy(() => entryWith([['month', 'May']]).dateKey());
      expect(err).toBeInstanceOf(InputError);
      expect(err).toHaveProperty('message', 'month without year');
    });

    it('rejects a month it cannot read', () => {
      expect(() => entryWith([['year', '2001'], ['month', 'Spring']]).dateKey()).toThrow('invalid month "Spring"');
    });
  });

  describe('monthNum', () => {
    it.each(['Jan', 'jan.', 'January', 'JANUARY', ' jan '])('reads %s as January', (value) => {
      expect(entryWith([['month', value]]).monthNum()).toBe(1);
    });

    it('reads other styles', () => {
      expect(entryWith([['month', 'Sept.']]).monthNum()).toBe(9);
      expect(entryWith([['month', 'jun']]).monthNum()).toBe(6);
      expect(entryWith([['month', 'Dec']]).monthNum()).toBe(12);
      expect(entryWith([['issued', 'may']]).monthNum('issued')).toBe(5);
    });

    it.each(['Ja', 'Foo', 'jan..', ''])('rejects "%s"', (value) => {
      expect(() => entryWith([['month', value]]).monthNum()).toThrow(InputError);
    });

    it('throws FieldError when the field is missing', () => {
      expect(() => entryWith([]).monthNum()).toThrow(FieldError);
    });
  });
});
