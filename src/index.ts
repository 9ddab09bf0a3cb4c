export { Parser } from './bibtex-parser';
export type { MonthStyle, ParserOptions, ParseOptions } from './bibtex-parser';
export { Entry, FieldError, MONTHS } from './bibtex-entry';
export type { Database, DateKey, FieldLookup } from './bibtex-entry';
export { BundledInputError, InputError, InputErrorCollector, Pos, PosFactory } from './bibtex-messages';
export type { Logger } from './bibtex-messages';
