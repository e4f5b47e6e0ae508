/**
 * Abstract base parser with shared interrupt and warning handling
 *
 * Gives every record-stream parser the same AbortSignal support and the
 * same default warning sink without imposing a parsing implementation.
 */

import { ParseError } from "../errors";
import type { OpenOptions, ParserOptions, WarningHandler } from "../types";

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly onWarning: WarningHandler;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    this.onWarning =
      options.onWarning ??
      ((warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber ?? "?"}): ${warning}`);
      });
    this.interruptHandler = new InterruptHandler(options.signal);
  }

  /**
   * Check abortion with format context
   * Call this in parsing loops to allow cancellation
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(this.getFormatName(), context);
  }

  /**
   * Parse records from an in-memory string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file, closing it when iteration ends
   */
  abstract parseFile(filePath: string, options?: OpenOptions): AsyncIterable<T>;

  /**
   * Parse records from an async sequence of lines
   */
  abstract parseLines(lines: AsyncIterable<string>): AsyncIterable<T>;

  /**
   * Format identifier for errors and warnings (e.g. "FASTA")
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal integration for parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If the signal has been aborted
   */
  throwIfAborted(format: string, context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${format} ${context}`, format);
    }
  }
}
