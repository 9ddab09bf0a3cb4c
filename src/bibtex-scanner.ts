import { Pos, PosFactory } from './bibtex-messages';

// BibTeX treats only space, tab and newline as white space.
const SPACE_RE = /[ \t\n]*/y;

/**
 * Cursor over one normalized .bib source.
 *
 * Token patterns must be sticky (`y`) so they only match at the cursor.
 */
export class BibScanner {
  private offset = 0;

  constructor(readonly text: string, private readonly positions: PosFactory) {}

  get position(): number {
    return this.offset;
  }

  get atEnd(): boolean {
    return this.offset >= this.text.length;
  }

  posAt(offset: number = this.offset): Pos {
    return this.positions.offsetToPos(offset);
  }

  /** Match pattern at the cursor and step past it (and past white space unless skipSpace is false). */
  tryToken(pattern: RegExp, skipSpace = true): string | undefined {
    pattern.lastIndex = this.offset;
    const match = pattern.exec(this.text);
    if (match === null) {
      return undefined;
    }
    this.offset = pattern.lastIndex;
    if (skipSpace) {
      this.skipSpace();
    }
    return match[0];
  }

  token(pattern: RegExp, failMessage: string): string {
    const text = this.tryToken(pattern);
    if (text === undefined) {
      return this.fail(failMessage);
    }
    return text;
  }

  /**
   * Scan brace-balanced text up to an unnested term character, which is
   * consumed along with any white space after it. The cursor must be just
   * past the opening delimiter.
   */
  scanBalancedText(term: string): string {
    const start = this.offset;
    let level = 0;
    while (this.offset < this.text.length) {
      const char = this.text[this.offset];
      if (level === 0 && char === term) {
        const text = this.text.slice(start, this.offset);
        this.offset++;
        this.skipSpace();
        return text;
      } else if (char === '{') {
        level++;
      } else if (char === '}') {
        level--;
        if (level < 0) {
          this.fail('unexpected }');
        }
      }
      this.offset++;
    }
    return this.fail('unterminated string');
  }

  skipSpace(): void {
    SPACE_RE.lastIndex = this.offset;
    if (SPACE_RE.exec(this.text) !== null) {
      this.offset = SPACE_RE.lastIndex;
    }
  }

  fail(message: string, offset: number = this.offset): never {
    return this.posAt(offset).raiseError(message);
  }

  warn(message: string, offset: number = this.offset): void {
    this.posAt(offset).warn(message);
  }
}
