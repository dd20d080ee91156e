/**
 * Input file missing, unreadable or not a JSON array of project objects.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "ParseError";
  }
}

/**
 * Output file could not be written.
 */
export class IOError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "IOError";
  }
}
