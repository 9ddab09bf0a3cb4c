import { InputError, Pos } from './bibtex-messages';

/** Lower-cased database key → entry, in the order entries were read. */
export type Database = ReadonlyMap<string, Entry>;

/** Sort key by date: [], [year] or [year, month]. */
export type DateKey = [] | [number] | [number, number];

export type FieldLookup =
  | { found: true; value: string }
  | { found: false; error: FieldError };

export const MONTHS: readonly string[] = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

export class FieldError extends Error {
  constructor(readonly field: string, readonly entry?: Entry) {
    super(entry ? `${entry}: missing field "${field}"` : `missing field "${field}"`);
    this.name = 'FieldError';
  }
}

/**
 * One entry of a BibTeX database.
 *
 * Field values are what a .bst style would see: white space is cleaned up
 * and macros are expanded, but TeX markup and accents are left as written.
 * Field names and the type are lower case; the key keeps its case but should
 * be compared case-insensitively.
 */
export class Entry {
  private readonly fieldMap: Map<string, string>;
  private readonly fieldPosMap: Map<string, Pos>;

  /**
   * A field name given twice keeps the slot of its first occurrence and the
   * value of its last.
   */
  constructor(
    fields: Iterable<readonly [string, string]>,
    readonly type: string,
    readonly key: string,
    readonly pos?: Pos,
    fieldPos: Iterable<readonly [string, Pos]> = [],
  ) {
    this.fieldMap = new Map(fields);
    this.fieldPosMap = new Map(fieldPos);
  }

  get fields(): ReadonlyMap<string, string> {
    return this.fieldMap;
  }

  get fieldPos(): ReadonlyMap<string, Pos> {
    return this.fieldPosMap;
  }

  has(field: string): boolean {
    return this.fieldMap.has(field);
  }

  get(field: string): string | undefined {
    return this.fieldMap.get(field);
  }

  lookup(field: string): FieldLookup {
    const value = this.fieldMap.get(field);
    if (value === undefined) {
      return { found: false, error: new FieldError(field, this) };
    }
    return { found: true, value };
  }

  /** Like get, but a missing field throws FieldError. */
  require(field: string): string {
    const result = this.lookup(field);
    if (!result.found) {
      throw result.error;
    }
    return result.value;
  }

  copy(): Entry {
    return new Entry(this.fieldMap, this.type, this.key, this.pos, this.fieldPosMap);
  }

  /** Same fields in the same order, same type and same key. Positions are ignored. */
  equals(other: Entry): boolean {
    if (this.type !== other.type || this.key !== other.key) return false;
    if (this.fieldMap.size !== other.fieldMap.size) return false;
    const theirs = [...other.fieldMap];
    let i = 0;
    for (const [name, value] of this.fieldMap) {
      const [otherName, otherValue] = theirs[i++];
      if (name !== otherName || value !== otherValue) return false;
    }
    return true;
  }

  toString(): string {
    return this.pos ? `"${this.key}" at ${this.pos}` : `"${this.key}"`;
  }

  /**
   * Return a new entry with the fields of its crossref target filled in.
   *
   * Fields this entry defines win over the target's, and the crossref field
   * itself is dropped. An entry without crossref is returned as is. The target
   * must exist in database; Parser.finalize checks that for parsed input.
   */
  resolveCrossref(database: Database): Entry {
    const crossref = this.fieldMap.get('crossref');
    if (crossref === undefined) {
      return this;
    }
    const source = database.get(crossref.toLowerCase());
    if (!source) {
      throw new Error(`crossref target "${crossref}" of ${this} is not in the database`);
    }
    const merged = this.copy();
    for (const [field, value] of source.fieldMap) {
      if (merged.fieldMap.has(field)) continue;
      merged.fieldMap.set(field, value);
      const pos = source.fieldPosMap.get(field);
      if (pos) merged.fieldPosMap.set(field, pos);
    }
    merged.fieldMap.delete('crossref');
    merged.fieldPosMap.delete('crossref');
    return merged;
  }

  /**
   * Sort key for ordering entries by date.
   *
   * Throws InputError when year is not a plain number or is too large to
   * hold exactly, when month appears without year, or when month cannot be
   * read.
   */
  dateKey(): DateKey {
    const year = this.fieldMap.get('year');
    const month = this.fieldMap.get('month');
    if (year === undefined) {
      if (month !== undefined) this.fail('month', 'month without year');
      return [];
    }
    const yearNum = Number(year);
    if (!/^[0-9]+$/.test(year) || !Number.isSafeInteger(yearNum)) {
      this.fail('year', `invalid year "${year}"`);
    }
    if (month === undefined) {
      return [yearNum];
    }
    return [yearNum, this.monthNum()];
  }

  /**
   * Month number in [1, 12] for field.
   *
   * Accepts full names, three-letter abbreviations and anything in between,
   * with or without a trailing period, in any case.
   */
  monthNum(field = 'month'): number {
    const raw = this.require(field);
    let value = raw.trim();
    if (value.endsWith('.')) value = value.slice(0, -1);
    value = value.toLowerCase();
    if (value.length >= 3) {
      const index = MONTHS.findIndex(name => name.startsWith(value));
      if (index !== -1) return index + 1;
    }
    return this.fail(field, `invalid month "${raw}"`);
  }

  private fail(field: string, message: string): never {
    const pos = this.fieldPosMap.get(field);
    if (pos) {
      return pos.raiseError(message);
    }
    throw new InputError(message);
  }
}
