/**
 * Types for include-directory resolution.
 *
 * @packageDocumentation
 */

/**
 * An include directory ready for embedding into generated configuration.
 * Its position in an array is its search precedence.
 */
export interface IncludeDirectory {
  /** Canonical path: root-relative beneath the execution root, absolute otherwise. */
  readonly path: string;
  /** `path` escaped for a double-quoted literal; see `escapeLiteral`. */
  readonly literal: string;
}

/**
 * Options shared by normalization and injection.
 */
export interface NormalizeOptions {
  /** Absolute directory build actions run in. */
  executionRoot?: string;
}

/**
 * Which search-list delimiter could not be located.
 */
export type MissingDelimiter = 'begin' | 'end';

/**
 * Error thrown when diagnostic output has no bounded search-list block.
 * Usually a compiler whose output format is not recognized.
 */
export class DelimiterNotFoundError extends Error {
  /** The marker that was not found. */
  public readonly missing: MissingDelimiter;
  /** The marker text that was searched for. */
  public readonly marker: string;
  /** The raw diagnostic output. */
  public readonly output: string;

  constructor(missing: MissingDelimiter, marker: string, output: string) {
    super(
      `Search-list ${missing} marker '${marker}' not found in compiler output:\n` +
        output.slice(0, 500)
    );
    this.name = 'DelimiterNotFoundError';
    this.missing = missing;
    this.marker = marker;
    this.output = output;
  }
}

/**
 * Error thrown when a string is not a well-formed escaped literal.
 */
export class LiteralSyntaxError extends Error {
  /** The literal that failed to parse. */
  public readonly literal: string;
  /** Offset of the offending character. */
  public readonly offset: number;

  constructor(message: string, literal: string, offset: number) {
    super(`Invalid literal at offset ${String(offset)}: ${message}`);
    this.name = 'LiteralSyntaxError';
    this.literal = literal;
    this.offset = offset;
  }
}
