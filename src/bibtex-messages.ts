import { TextDocument } from 'vscode-languageserver-textdocument';

/** Sink for diagnostics produced while reading a .bib file. */
export interface Logger {
  warn(message: string): void;
  error(message: string): void;
}

const consoleLogger: Logger = {
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

/** An error in the input, optionally tagged with where it happened. */
export class InputError extends Error {
  constructor(message: string, readonly pos?: Pos) {
    super(pos ? `${pos}: ${message}` : message);
    this.name = 'InputError';
  }
}

/** One or more InputErrors collected over a parse or finalize pass. */
export class BundledInputError extends InputError {
  readonly errors: readonly InputError[];

  constructor(errors: readonly InputError[]) {
    super(errors.map(e => e.message).join('\n'));
    this.name = 'BundledInputError';
    this.errors = errors;
  }
}

/** A resolved location in a named source. Line and column are 1-based. */
export class Pos {
  constructor(
    readonly fileName: string,
    readonly line: number,
    readonly column: number,
    private readonly logger?: Logger,
  ) {}

  toString(): string {
    return `${this.fileName}:${this.line}:${this.column}`;
  }

  /** Log the error (when a logger was given) and throw it. */
  raiseError(message: string): never {
    const err = new InputError(message, this);
    this.logger?.error(err.message);
    throw err;
  }

  warn(message: string): void {
    (this.logger ?? consoleLogger).warn(`${this}: warning: ${message}`);
  }
}

/** Resolves offsets in one source text to Pos values. */
export class PosFactory {
  private readonly document: TextDocument;

  constructor(readonly fileName: string, text: string, private readonly logger?: Logger) {
    this.document = TextDocument.create(fileName, 'bibtex', 0, text);
  }

  offsetToPos(offset: number): Pos {
    const { line, character } = this.document.positionAt(offset);
    return new Pos(this.fileName, line + 1, character + 1, this.logger);
  }
}

/** Collects InputErrors so that one bad construct does not stop the rest. */
export class InputErrorCollector {
  private readonly errors: InputError[] = [];

  get count(): number {
    return this.errors.length;
  }

  /** Run fn, recording an InputError it throws. Anything else propagates. */
  capture<T>(fn: () => T): T | undefined {
    try {
      return fn();
    } catch (e) {
      if (e instanceof BundledInputError) {
        this.errors.push(...e.errors);
        return undefined;
      }
      if (e instanceof InputError) {
        this.errors.push(e);
        return undefined;
      }
      throw e;
    }
  }

  rethrow(): void {
    if (this.errors.length > 0) {
      throw new BundledInputError([...this.errors]);
    }
  }
}
