import { errorMessage } from "../core/errors.js";
import type { Logger } from "../logging/logger.js";
import { FullDataCsvWriter } from "./fullDataCsvWriter.js";
import type { PublishFailure } from "./publish.js";

export const FULL_DATA_SINK = "full-data";

export interface RecordWriter {
  readonly path: string;
  writeRecord(raw: unknown): Promise<void>;
  close(): Promise<void>;
}

export type RecordWriterFactory = (
  outputDir: string,
  fieldNames: readonly string[],
) => Promise<RecordWriter>;

/**
 * Optional raw dump that never takes the statistics down with it: the first
 * open, write or close failure is logged, the writer is dropped, and the
 * failure is reported alongside the section failures.
 */
export class FullDataDump {
  private readonly outputDir: string;
  private readonly logger: Logger;
  private readonly openWriter: RecordWriterFactory;
  private writer: RecordWriter | null = null;
  private started = false;
  private writtenPath: string | null = null;
  private failure: PublishFailure | null = null;

  constructor(
    outputDir: string,
    logger: Logger,
    openWriter: RecordWriterFactory = FullDataCsvWriter.open,
  ) {
    this.outputDir = outputDir;
    this.logger = logger;
    this.openWriter = openWriter;
  }

  /** Set once the dump has been closed without a failure. */
  get path(): string | null {
    return this.writtenPath;
  }

  get failures(): PublishFailure[] {
    return this.failure ? [this.failure] : [];
  }

  async writeRecord(raw: unknown, fieldNames: readonly string[]): Promise<void> {
    const writer = await this.ensureOpen(fieldNames);
    if (!writer) {
      return;
    }
    try {
      await writer.writeRecord(raw);
    } catch (error) {
      this.fail(error);
      await this.abandon(writer);
    }
  }

  /** Closes the dump, opening it first so an export without records still gets its header. */
  async close(fieldNames: readonly string[]): Promise<void> {
    const writer = await this.ensureOpen(fieldNames);
    if (!writer) {
      return;
    }
    this.writer = null;
    try {
      await writer.close();
      this.writtenPath = writer.path;
    } catch (error) {
      this.fail(error);
    }
  }

  /** Closes a writer that is already open without creating the dump. */
  async release(): Promise<void> {
    if (this.writer) {
      await this.abandon(this.writer);
    }
  }

  private async ensureOpen(fieldNames: readonly string[]): Promise<RecordWriter | null> {
    if (this.started) {
      return this.writer;
    }
    this.started = true;
    try {
      this.writer = await this.openWriter(this.outputDir, fieldNames);
    } catch (error) {
      this.fail(error);
    }
    return this.writer;
  }

  private async abandon(writer: RecordWriter): Promise<void> {
    this.writer = null;
    try {
      await writer.close();
    } catch (error) {
      this.logger.warn({ sink: FULL_DATA_SINK }, errorMessage(error));
    }
  }

  private fail(error: unknown): void {
    const message = errorMessage(error);
    this.logger.error({ sink: FULL_DATA_SINK }, message);
    if (!this.failure) {
      this.failure = { sink: FULL_DATA_SINK, sectionId: null, message };
    }
  }
}
