/**
 * Parser capability used by the configuration file loader.
 */

export interface DocumentParser {
  /** Format name accepted by the loader's explicit `format` argument. */
  readonly format: string;
  /** File extensions, with the leading dot, that select this parser. */
  readonly extensions: readonly string[];
  /** Parse document text. `source` names the document in error messages. */
  parse(text: string, source: string): unknown;
}
