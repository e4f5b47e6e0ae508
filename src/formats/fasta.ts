/**
 * FASTA-style record stream parser and writer
 *
 * Record framing only: a line starting with `>` opens a record whose label
 * is the rest of that line, and every following non-blank line up to the
 * next marker is body. Sequence alphabets are not checked.
 */

import { type } from "arktype";
import { InvalidArgumentError, MalformedInputError, StreamExhaustedError } from "../errors";
import { openMaybeGzip } from "../io/file-opener";
import { isComment, splitLines, toAsyncLines } from "../io/stream-utils";
import type {
  FastaRecord,
  FramerState,
  OpenOptions,
  ParserOptions,
  ParseStep,
  StreamHandle,
} from "../types";
import { AbstractParser } from "./abstract-parser";

const FORMAT = "FASTA";
const RECORD_SIGIL = ">";
const END_STEP: ParseStep = { kind: "end" };

/**
 * Line-level framing options
 */
export interface RecordFramerOptions {
  /** Treat lines starting with `#` as comments outside of marker lines (default: false) */
  readonly skipComments?: boolean;
  /** Longest accepted line, in characters (default: unlimited) */
  readonly maxLineLength?: number;
}

/**
 * FASTA parser options
 */
export interface FastaParserOptions extends ParserOptions, RecordFramerOptions {
  /** Fail when the input holds no records at all (default: false) */
  readonly requireRecords?: boolean;
}

const FastaParserOptionsSchema = type({
  "skipComments?": "boolean",
  "requireRecords?": "boolean",
  "maxLineLength?": "number>0",
});

/**
 * Whether a line opens a new record
 */
export function isRecordMarker(line: string): boolean {
  return line.startsWith(RECORD_SIGIL);
}

/**
 * Record framing state machine
 *
 * Starts in `seeking`, moves to `accumulating` at the first marker line and
 * to `exhausted` on `finish()`. Body lines seen before any marker are
 * rejected as soon as they are pushed, with their line number.
 *
 * @example
 * ```typescript
 * const framer = new RecordFramer();
 * framer.push(">chr1");          // undefined
 * framer.push("ACGT");           // undefined
 * framer.push(">chr2");          // { label: "chr1", body: "ACGT" }
 * framer.finish();               // { label: "chr2", body: "" }
 * ```
 */
export class RecordFramer {
  private pendingLabel: string | undefined;
  private pendingLine = 0;
  private bodyLines: string[] = [];
  private finished = false;
  private lineNumber = 0;
  private emittedLine = 0;
  private readonly skipComments: boolean;
  private readonly maxLineLength: number;

  constructor(options: RecordFramerOptions = {}) {
    this.skipComments = options.skipComments ?? false;
    this.maxLineLength = options.maxLineLength ?? Number.POSITIVE_INFINITY;
  }

  get state(): FramerState {
    if (this.finished) return "exhausted";
    return this.pendingLabel === undefined ? "seeking" : "accumulating";
  }

  /** Lines pushed so far */
  get linesSeen(): number {
    return this.lineNumber;
  }

  /** Line number of the marker of the most recently emitted record */
  get lastRecordLine(): number {
    return this.emittedLine;
  }

  /**
   * Feed one line (without its terminator)
   *
   * @returns The record completed by this line, if any
   * @throws {MalformedInputError} On body before the first marker, an empty label, or an over-long line
   * @throws {StreamExhaustedError} If called after `finish()`
   */
  push(line: string): FastaRecord | undefined {
    if (this.finished) {
      throw new StreamExhaustedError(FORMAT);
    }
    this.lineNumber++;

    if (line.length > this.maxLineLength) {
      throw new MalformedInputError(
        `Line too long (${line.length} > ${this.maxLineLength})`,
        FORMAT,
        this.lineNumber
      );
    }

    if (isRecordMarker(line)) {
      return this.startRecord(line);
    }
    if (this.skipComments && isComment(line)) {
      return undefined;
    }

    const stripped = line.trimEnd();
    if (stripped.length === 0) {
      return undefined;
    }
    if (this.pendingLabel === undefined) {
      throw new MalformedInputError(
        `Body line found before the first "${RECORD_SIGIL}" marker`,
        FORMAT,
        this.lineNumber,
        line
      );
    }

    this.bodyLines.push(stripped);
    return undefined;
  }

  /**
   * Signal end of input
   *
   * @returns The final record if a label was pending; undefined otherwise or when already finished
   */
  finish(): FastaRecord | undefined {
    if (this.finished) return undefined;
    this.finished = true;

    const label = this.pendingLabel;
    this.pendingLabel = undefined;
    return label === undefined ? undefined : this.takeRecord(label);
  }

  private startRecord(line: string): FastaRecord | undefined {
    const label = line.slice(RECORD_SIGIL.length).trim();
    if (label.length === 0) {
      throw new MalformedInputError("Record marker without a label", FORMAT, this.lineNumber, line);
    }

    const completed = this.pendingLabel === undefined ? undefined : this.takeRecord(this.pendingLabel);
    this.pendingLabel = label;
    this.pendingLine = this.lineNumber;
    return completed;
  }

  private takeRecord(label: string): FastaRecord {
    const record: FastaRecord = { label, body: this.bodyLines.join("") };
    this.bodyLines = [];
    this.emittedLine = this.pendingLine;
    return record;
  }
}

/**
 * Forward-only record cursor over synchronous lines
 *
 * `advance()` yields one record per call, then a single `end` step; any
 * further `advance()` throws StreamExhaustedError. `next()` follows the
 * iterator protocol and keeps reporting `done` instead.
 *
 * @example
 * ```typescript
 * const cursor = new RecordCursor([">a", "AC", "GT", ">b", "TT"]);
 * cursor.advance(); // { kind: "record", record: { label: "a", body: "ACGT" } }
 * cursor.advance(); // { kind: "record", record: { label: "b", body: "TT" } }
 * cursor.advance(); // { kind: "end" }
 * ```
 */
export class RecordCursor implements IterableIterator<FastaRecord> {
  private readonly framer: RecordFramer;
  private readonly lines: Iterator<string>;
  private ended = false;

  constructor(lines: Iterable<string>, options: RecordFramerOptions = {}) {
    this.framer = new RecordFramer(options);
    this.lines = lines[Symbol.iterator]();
  }

  get done(): boolean {
    return this.ended;
  }

  advance(): ParseStep {
    if (this.ended) {
      throw new StreamExhaustedError(FORMAT);
    }

    for (let next = this.lines.next(); next.done !== true; next = this.lines.next()) {
      const record = this.framer.push(next.value);
      if (record !== undefined) return { kind: "record", record };
    }

    const last = this.framer.finish();
    if (last !== undefined) return { kind: "record", record: last };

    this.ended = true;
    return END_STEP;
  }

  next(): IteratorResult<FastaRecord> {
    if (this.ended) return { done: true, value: undefined };
    const step = this.advance();
    return step.kind === "record" ? { done: false, value: step.record } : { done: true, value: undefined };
  }

  return(): IteratorResult<FastaRecord> {
    this.ended = true;
    this.lines.return?.();
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): RecordCursor {
    return this;
  }
}

/**
 * Forward-only record cursor over asynchronous lines (e.g. a file handle)
 *
 * Same stepping contract as RecordCursor.
 */
export class AsyncRecordCursor implements AsyncIterableIterator<FastaRecord> {
  private readonly framer: RecordFramer;
  private readonly lines: AsyncIterator<string>;
  private ended = false;

  constructor(lines: AsyncIterable<string>, options: RecordFramerOptions = {}) {
    this.framer = new RecordFramer(options);
    this.lines = lines[Symbol.asyncIterator]();
  }

  get done(): boolean {
    return this.ended;
  }

  /** Line number of the marker of the record most recently returned */
  get recordLine(): number {
    return this.framer.lastRecordLine;
  }

  async advance(): Promise<ParseStep> {
    if (this.ended) {
      throw new StreamExhaustedError(FORMAT);
    }

    for (let next = await this.lines.next(); next.done !== true; next = await this.lines.next()) {
      const record = this.framer.push(next.value);
      if (record !== undefined) return { kind: "record", record };
    }

    const last = this.framer.finish();
    if (last !== undefined) return { kind: "record", record: last };

    this.ended = true;
    return END_STEP;
  }

  async next(): Promise<IteratorResult<FastaRecord>> {
    if (this.ended) return { done: true, value: undefined };
    const step = await this.advance();
    return step.kind === "record" ? { done: false, value: step.record } : { done: true, value: undefined };
  }

  async return(): Promise<IteratorResult<FastaRecord>> {
    this.ended = true;
    await this.lines.return?.();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): AsyncRecordCursor {
    return this;
  }
}

/**
 * Parse records synchronously from in-memory text
 */
export function parseRecords(data: string, options: RecordFramerOptions = {}): RecordCursor {
  return new RecordCursor(splitLines(data), options);
}

/**
 * Streaming FASTA parser
 *
 * @example
 * ```typescript
 * const parser = new FastaParser({ requireRecords: true });
 * for await (const record of parser.parseFile("/data/hg38.fa.gz")) {
 *   console.log(`${record.label}: ${record.body.length} bp`);
 * }
 * ```
 */
export class FastaParser extends AbstractParser<FastaRecord, FastaParserOptions> {
  private readonly framerOptions: RecordFramerOptions;
  private readonly requireRecords: boolean;

  constructor(options: FastaParserOptions = {}) {
    const validationResult = FastaParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new InvalidArgumentError(`Invalid FASTA parser options: ${validationResult.summary}`);
    }

    super(options);
    this.framerOptions = {
      skipComments: options.skipComments ?? false,
      maxLineLength: options.maxLineLength,
    };
    this.requireRecords = options.requireRecords ?? false;
  }

  protected getFormatName(): string {
    return FORMAT;
  }

  async *parseString(data: string): AsyncIterable<FastaRecord> {
    yield* this.parseLines(toAsyncLines(splitLines(data)));
  }

  async *parseFile(filePath: string, options?: OpenOptions): AsyncIterable<FastaRecord> {
    const handle = await openMaybeGzip(filePath, "r", options);
    try {
      yield* this.parseLines(handle.lines());
    } finally {
      await handle.close();
    }
  }

  async *parseLines(lines: AsyncIterable<string>): AsyncIterable<FastaRecord> {
    const cursor = new AsyncRecordCursor(lines, this.framerOptions);
    let recordCount = 0;

    while (true) {
      this.throwIfAborted("record parsing");
      const step = await cursor.advance();
      if (step.kind === "end") break;

      recordCount++;
      if (step.record.body.length === 0) {
        this.onWarning(`Record '${step.record.label}' has an empty body`, cursor.recordLine);
      }
      yield step.record;
    }

    if (recordCount === 0 && this.requireRecords) {
      throw new MalformedInputError("No records found in input", FORMAT);
    }
  }
}

/**
 * FASTA writer with fixed-width body wrapping
 */
export class FastaWriter {
  private readonly lineWidth: number;

  constructor(options: { lineWidth?: number } = {}) {
    this.lineWidth = options.lineWidth ?? 60;
  }

  /**
   * Format one record, terminated by a newline
   */
  formatRecord(record: FastaRecord): string {
    const lines = [`${RECORD_SIGIL}${record.label}`];
    if (this.lineWidth <= 0) {
      if (record.body.length > 0) lines.push(record.body);
    } else {
      for (let i = 0; i < record.body.length; i += this.lineWidth) {
        lines.push(record.body.slice(i, i + this.lineWidth));
      }
    }
    return `${lines.join("\n")}\n`;
  }

  /**
   * Write records to an open handle
   */
  async writeToHandle(
    records: Iterable<FastaRecord> | AsyncIterable<FastaRecord>,
    handle: StreamHandle
  ): Promise<void> {
    for await (const record of records) {
      await handle.write(this.formatRecord(record));
    }
  }
}
