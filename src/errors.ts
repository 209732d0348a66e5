/**
 * Error types
 * Input and decoding problems are result objects; these cover the rest
 */

/**
 * Input the parser cannot read at all (not text)
 */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

/**
 * Bad command-line flags or values (exit code 2)
 */
export class CliUsageError extends Error {
  readonly exitCode = 2;

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}
