import { BundledInputError, Logger } from './bibtex-messages';

/** A Logger that keeps what it is given. */
export interface RecordingLogger extends Logger {
  warnings: string[];
  errors: string[];
}

export function recordingLogger(): RecordingLogger {
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    warnings,
    errors,
    warn: (message) => { warnings.push(message); },
    error: (message) => { errors.push(message); },
  };
}

/** Run fn and return what it threw, or fail if it returned normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected function to throw');
}

/** Messages of the individual errors in a bundled error. */
export function errorMessages(e: unknown): string[] {
  if (e instanceof BundledInputError) {
    return e.errors.map(err => err.message);
  }
  return e instanceof Error ? [e.message] : [String(e)];
}
