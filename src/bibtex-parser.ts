import * as fs from 'fs';
import { Database, Entry } from './bibtex-entry';
import { InputError, InputErrorCollector, Logger, Pos, PosFactory } from './bibtex-messages';
import { BibScanner } from './bibtex-scanner';

// --- Implementation notes ---
// - The grammar follows BibTeX's own database reader, quirks included: @comment
//   consumes only its type, so its body is skipped as inter-entry noise and any
//   @entry{...} inside it is read as a real entry.
// - Trailing spaces and tabs are stripped from every line before scanning, so
//   balanced text that spans lines loses them too.
// - All token patterns are sticky; see BibScanner.tryToken.

/** How month macros (jan, feb, ...) are predefined. null predefines none. */
export type MonthStyle = 'full' | 'abbrv' | null;

export interface ParserOptions {
  monthStyle?: MonthStyle;
}

export interface ParseOptions {
  /** File name used in diagnostics. */
  name?: string;
  /** Receives warnings and errors; warnings go to the console without one. */
  logger?: Logger;
}

const FULL_MONTHS: Readonly<Record<string, string>> = {
  jan: 'January', feb: 'February', mar: 'March', apr: 'April',
  may: 'May', jun: 'June', jul: 'July', aug: 'August',
  sep: 'September', oct: 'October', nov: 'November', dec: 'December',
};

// abbrv.bst conventions
const ABBRV_MONTHS: Readonly<Record<string, string>> = {
  jan: 'Jan.', feb: 'Feb.', mar: 'Mar.', apr: 'Apr.',
  may: 'May', jun: 'June', jul: 'July', aug: 'Aug.',
  sep: 'Sept.', oct: 'Oct.', nov: 'Nov.', dec: 'Dec.',
};

// Printable ASCII except the characters BibTeX reserves; no leading digit.
const IDENTIFIER_RE = /(?![0-9])(?:(?![ \t"#%'(),={}])[\x20-\x7f])+/y;
const SKIP_TO_AT_RE = /[^@]*/y;
const AT_RE = /@/y;
const OPEN_RE = /[{(]/y;
const CLOSE_BRACE_RE = /\}/y;
const CLOSE_PAREN_RE = /\)/y;
const EQUALS_RE = /=/y;
const COMMA_RE = /,/y;
const CONCAT_RE = /#/y;
const DIGITS_RE = /[0-9]+/y;
const OPEN_BRACE_RE = /\{/y;
const QUOTE_RE = /"/y;
// A key in (...) may be empty and may contain a close paren.
const PAREN_KEY_RE = /[^, \t\n]*/y;
const BRACE_KEY_RE = /[^, \t}\n]*/y;

// The lookbehind anchors each match at the start of a run.
const TRAILING_LINE_SPACE_RE = /(?<![ \t])[ \t]+(?=\n|$)/g;
const SPACE_RUN_RE = /[ \t\n]+/g;

function monthMacros(style: MonthStyle): Map<string, string> {
  switch (style) {
    case 'full':
      return new Map(Object.entries(FULL_MONTHS));
    case 'abbrv':
      return new Map(Object.entries(ABBRV_MONTHS));
    case null:
      return new Map();
    default:
      throw new Error(`Unknown month style "${String(style)}"`);
  }
}

/**
 * Reader for .bib databases.
 *
 * Call parse (or parseFile) once per input, in order; later inputs see the
 * macros and entries of earlier ones. Then call finalize to check
 * cross-references and get the database.
 *
 *   const db = new Parser({ monthStyle: 'abbrv' })
 *     .parseFile('refs.bib')
 *     .finalize();
 */
export class Parser {
  private readonly macros: Map<string, string>;
  private readonly entries = new Map<string, Entry>();
  private finalized = false;

  constructor(options: ParserOptions = {}) {
    this.macros = monthMacros(options.monthStyle === undefined ? 'full' : options.monthStyle);
  }

  /** Entries read so far, including those read before a failed parse. */
  get database(): Database {
    return this.entries;
  }

  /** Declare a macro, as an @string command would (without the redefinition warning). */
  string(name: string, value: string): void {
    this.macros.set(name.toLowerCase(), value);
  }

  macro(name: string): string | undefined {
    return this.macros.get(name.toLowerCase());
  }

  /**
   * Read one .bib source into the database.
   *
   * A malformed command or entry is skipped and reading resumes at the next
   * `@`. Errors from the whole source are thrown together as a
   * BundledInputError once it has been read.
   */
  parse(text: string, options: ParseOptions = {}): this {
    this.assertOpen();
    const data = text.replace(TRAILING_LINE_SPACE_RE, '');
    const scanner = new BibScanner(data, new PosFactory(options.name ?? '<string>', data, options.logger));
    const errors = new InputErrorCollector();
    while (!scanner.atEnd) {
      errors.capture(() => this.scanCommandOrEntry(scanner));
    }
    errors.rethrow();
    return this;
  }

  parseFile(path: string, options: ParseOptions = {}): this {
    const text = fs.readFileSync(path, 'utf8');
    return this.parse(text, { ...options, name: options.name ?? path });
  }

  /**
   * Check that every crossref names an entry in the database and return it.
   * Unknown targets are thrown together as a BundledInputError.
   */
  finalize(): Database {
    this.assertOpen();
    this.finalized = true;
    const errors = new InputErrorCollector();
    for (const entry of this.entries.values()) {
      const crossref = entry.get('crossref');
      if (crossref !== undefined && !this.entries.has(crossref.toLowerCase())) {
        errors.capture(() => this.raiseAt(entry.pos, `unknown crossref "${crossref}"`));
      }
    }
    errors.rethrow();
    return this.entries;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new Error('Parser has already been finalized');
    }
  }

  private raiseAt(pos: Pos | undefined, message: string): never {
    if (pos) {
      return pos.raiseError(message);
    }
    throw new InputError(message);
  }

  private scanCommandOrEntry(scanner: BibScanner): void {
    scanner.tryToken(SKIP_TO_AT_RE);
    const pos = scanner.posAt();
    if (scanner.tryToken(AT_RE) === undefined) {
      return;
    }

    const type = this.scanIdentifier(scanner).toLowerCase();
    if (type === 'comment') {
      // Whatever follows is skipped with the next run of inter-entry text.
      return;
    }

    const left = scanner.token(OPEN_RE, 'expected { or ( after entry type');
    const [right, rightRe]: [string, RegExp] = left === '(' ? [')', CLOSE_PAREN_RE] : ['}', CLOSE_BRACE_RE];

    if (type === 'preamble') {
      this.scanFieldValue(scanner);
      scanner.token(rightRe, `expected ${right}`);
      return;
    }

    if (type === 'string') {
      const name = this.scanIdentifier(scanner).toLowerCase();
      if (this.macros.has(name)) {
        scanner.warn(`macro "${name}" redefined`);
      }
      scanner.token(EQUALS_RE, 'expected = after string name');
      const value = this.scanFieldValue(scanner);
      scanner.token(rightRe, `expected ${right}`);
      this.macros.set(name, value);
      return;
    }

    const key = scanner.token(left === '(' ? PAREN_KEY_RE : BRACE_KEY_RE, 'expected key');

    const fields: [string, string][] = [];
    const fieldPos: [string, Pos][] = [];
    for (;;) {
      if (scanner.tryToken(rightRe) !== undefined) break;
      scanner.token(COMMA_RE, `expected ${right} or ,`);
      if (scanner.tryToken(rightRe) !== undefined) break;

      const fieldOffset = scanner.position;
      const field = this.scanIdentifier(scanner).toLowerCase();
      scanner.token(EQUALS_RE, 'expected = after field name');
      const value = this.scanFieldValue(scanner);
      fields.push([field, value]);
      fieldPos.push([field, scanner.posAt(fieldOffset)]);
    }

    if (this.entries.has(key.toLowerCase())) {
      scanner.fail('repeated entry');
    }
    this.entries.set(key.toLowerCase(), new Entry(fields, type, key, pos, fieldPos));
  }

  private scanIdentifier(scanner: BibScanner): string {
    return scanner.token(IDENTIFIER_RE, 'expected identifier');
  }

  /** Pieces joined by #, with white space runs collapsed and outer spaces trimmed. */
  private scanFieldValue(scanner: BibScanner): string {
    let value = this.scanFieldPiece(scanner);
    while (scanner.tryToken(CONCAT_RE) !== undefined) {
      value += this.scanFieldPiece(scanner);
    }
    // Trim literal spaces only, not other white space.
    return trimSpaces(value.replace(SPACE_RUN_RE, ' '));
  }

  private scanFieldPiece(scanner: BibScanner): string {
    const digits = scanner.tryToken(DIGITS_RE);
    if (digits !== undefined) {
      return digits;
    }
    if (scanner.tryToken(OPEN_BRACE_RE, false) !== undefined) {
      return scanner.scanBalancedText('}');
    }
    if (scanner.tryToken(QUOTE_RE, false) !== undefined) {
      return scanner.scanBalancedText('"');
    }
    const macroOffset = scanner.position;
    const name = scanner.tryToken(IDENTIFIER_RE);
    if (name !== undefined) {
      const value = this.macros.get(name.toLowerCase());
      if (value === undefined) {
        scanner.warn(`unknown macro "${name}"`, macroOffset);
        return '';
      }
      return value;
    }
    return scanner.fail('expected string, number, or macro name');
  }
}

function trimSpaces(s: string): string {
  let start = 0;
  let end = s.length;
  while (start < end && s[start] === ' ') start++;
  while (end > start && s[end - 1] === ' ') end--;
  return s.slice(start, end);
}
