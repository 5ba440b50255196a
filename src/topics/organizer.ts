/**
 * Topic organizers.
 *
 * An organizer owns one pipeline's run: it discovers the source files,
 * orders them newest first, extracts and deduplicates each one, and keeps
 * the aggregated records in memory for querying and export.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * FAILURE HANDLING
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   Directory missing/unreadable   → TopicSourceError (the run stops)
 *   File unreadable / bad JSON      → FileFailure, file skipped
 *   Top level not { topics: {} }    → FileFailure, file skipped
 *   Malformed entry                 → EntryIssue, entry skipped
 *   Boilerplate / too short         → Rejection, entry skipped
 *   Unrecognized filename date      → file sorted last
 *
 * Everything but the first is collected on the LoadResult and logged.
 *
 * @example
 *   const organizer = new OralTopicOrganizer({ inputDir: "output" });
 *   const result = organizer.loadAllTopics();
 *   organizer.displaySampleTopics(5);
 *   organizer.exportOrganizedTopics();
 */

import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { formatFileDate, resolveFileDate, sortFilesByDate } from "./dates.js";
import { dedupeRecords, oralGroupKey, writtenGroupKey } from "./dedupe.js";
import {
  DocumentShapeError,
  extractTopics,
  type EntryIssue,
  type ExtractionResult,
  type Rejection,
} from "./extractor.js";
import {
  countKey,
  topicsKey,
  writeJsonAtomic,
  type CountKey,
  type ExportedOralTopic,
  type ExportedWrittenTopic,
  type ExportSummary,
  type OrganizedTopicsDocument,
} from "./export.js";
import { ORAL_PIPELINE, WRITTEN_PIPELINE } from "./pipelines.js";
import type { BoilerplateRules } from "./boilerplate.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type { PipelineDefinition, PipelineKind, TaskDefinitionBase } from "../types/pipeline.js";
import type {
  OralTaskId,
  OralTopicRecord,
  TaskId,
  TopicRecordBase,
  WrittenTaskId,
  WrittenTopicRecord,
} from "../types/topic.js";

/**
 * The topics directory cannot be listed.
 */
export class TopicSourceError extends Error {
  public readonly directory: string;

  constructor(message: string, directory: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TopicSourceError";
    this.directory = directory;
  }
}

/**
 * A source file that was skipped as a whole.
 */
export interface FileFailure {
  file: string;
  stage: "read" | "parse" | "shape";
  message: string;
}

export interface LoadResult<R, T extends TaskId> {
  /** Records per task, newest file first, then in extraction order */
  topics: ReadonlyMap<T, readonly R[]>;
  filesProcessed: readonly string[];
  fileFailures: readonly FileFailure[];
  entryIssues: readonly EntryIssue[];
  rejections: readonly Rejection[];
  /** Records dropped as in-file duplicates */
  duplicates: number;
}

export interface OrganizerOptions {
  /** Directory holding the scraped JSON files */
  inputDir: string;
  /** Export path (defaults to the pipeline's file name in the working directory) */
  outputFile?: string;
  logger?: Logger;
  /** Cleaning rules (defaults to the pipeline's own) */
  rules?: BoilerplateRules;
}

const RULE = "═".repeat(60);
const THIN_RULE = "─".repeat(50);
const SAMPLE_CONTENT_CHARS = 200;

/**
 * Cut text to `max` code points, marking the cut with "...".
 */
export function truncate(text: string, max: number): string {
  const chars = [...text];
  return chars.length > max ? `${chars.slice(0, max).join("")}...` : text;
}

/**
 * Shared organizer machinery. Subclasses supply the pipeline, the
 * extraction call, the dedupe key and the export/display shape of a record.
 */
export abstract class TopicOrganizer<R extends TopicRecordBase<T>, T extends TaskId, E> {
  readonly inputDir: string;
  readonly outputFile: string;
  protected readonly logger: Logger;
  protected readonly rules: BoilerplateRules;

  private topicsByTask = new Map<T, R[]>();
  private filesProcessed: string[] = [];
  private fileFailures: FileFailure[] = [];
  private entryIssues: EntryIssue[] = [];
  private rejections: Rejection[] = [];
  private duplicates = 0;

  protected constructor(
    protected readonly pipeline: PipelineDefinition<PipelineKind, TaskDefinitionBase<T>>,
    options: OrganizerOptions
  ) {
    this.inputDir = options.inputDir;
    this.outputFile = options.outputFile ?? pipeline.defaultOutputFile;
    this.rules = options.rules ?? pipeline.defaultRules;
    this.logger = (options.logger ?? createSilentLogger()).child({ pipeline: pipeline.kind });
    this.reset();
  }

  protected abstract extract(document: unknown, sourceFile: string): ExtractionResult<R>;
  protected abstract groupKey(record: R): string;
  protected abstract serializeRecord(record: R): E;
  /** Bracketed heading and extra lines shown for a record in samples */
  protected abstract describeRecord(record: R): { heading: string; extra: string[] };

  private reset(): void {
    this.topicsByTask = new Map(this.pipeline.tasks.map((task): [T, R[]] => [task.id, []]));
    this.filesProcessed = [];
    this.fileFailures = [];
    this.entryIssues = [];
    this.rejections = [];
    this.duplicates = 0;
  }

  /**
   * List source files of this pipeline, in name order.
   *
   * @throws TopicSourceError if the directory cannot be read
   */
  discoverFiles(): string[] {
    const suffix = `-${this.pipeline.fileSuffix}.json`;
    try {
      return readdirSync(this.inputDir, { withFileTypes: true })
        // Links are followed when read; a dangling one fails as a read
        .filter(
          (entry) => (entry.isFile() || entry.isSymbolicLink()) && entry.name.endsWith(suffix)
        )
        .map((entry) => entry.name)
        .sort();
    } catch (err) {
      throw new TopicSourceError(
        `Cannot read topics directory ${this.inputDir}: ${err instanceof Error ? err.message : String(err)}`,
        this.inputDir,
        { cause: err }
      );
    }
  }

  /**
   * Process every source file from scratch.
   *
   * @throws TopicSourceError if the directory cannot be read
   */
  loadAllTopics(): LoadResult<R, T> {
    this.reset();
    this.logger.info("Scanning topics directory", { directory: this.inputDir });

    const files = sortFilesByDate(this.discoverFiles());
    if (files.length === 0) {
      this.logger.warn("No source files found", {
        directory: this.inputDir,
        pattern: `*-${this.pipeline.fileSuffix}.json`,
      });
      return this.result();
    }

    this.logger.info("Source files ordered newest first", { count: files.length });
    files.forEach((file, index) => {
      this.logger.debug(`${index + 1}. ${file}`, { date: formatFileDate(resolveFileDate(file)) });
    });

    for (const file of files) {
      this.processFile(file);
    }

    this.logger.info("Load complete", {
      filesProcessed: this.filesProcessed.length,
      filesSkipped: this.fileFailures.length,
      totalTopics: this.totalTopics(),
    });

    return this.result();
  }

  private skipFile(failure: FileFailure): void {
    this.fileFailures.push(failure);
    this.logger.warn("Skipping source file", { ...failure });
  }

  private processFile(file: string): void {
    let raw: string;
    try {
      raw = readFileSync(join(this.inputDir, file), "utf-8");
    } catch (err) {
      this.skipFile({ file, stage: "read", message: err instanceof Error ? err.message : String(err) });
      return;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (err) {
      this.skipFile({ file, stage: "parse", message: err instanceof Error ? err.message : String(err) });
      return;
    }

    let extraction: ExtractionResult<R>;
    try {
      extraction = this.extract(document, file);
    } catch (err) {
      if (err instanceof DocumentShapeError) {
        this.skipFile({ file, stage: "shape", message: err.message });
        return;
      }
      throw err;
    }

    const { records, duplicates } = dedupeRecords(extraction.records, (record) =>
      this.groupKey(record)
    );

    for (const record of records) {
      let bucket = this.topicsByTask.get(record.task);
      if (!bucket) {
        bucket = [];
        this.topicsByTask.set(record.task, bucket);
      }
      bucket.push(record);
    }

    for (const issue of extraction.issues) {
      this.logger.warn("Skipping malformed entry", { ...issue });
    }
    for (const rejection of extraction.rejections) {
      this.logger.debug("Rejected candidate", { ...rejection });
    }

    this.entryIssues.push(...extraction.issues);
    this.rejections.push(...extraction.rejections);
    this.duplicates += duplicates.length;
    this.filesProcessed.push(file);

    this.logger.info(`Processed ${file}`, {
      extracted: records.length,
      duplicates: duplicates.length,
      rejected: extraction.rejections.length,
      malformed: extraction.issues.length,
    });
  }

  private result(): LoadResult<R, T> {
    return {
      topics: new Map(this.topicsByTask),
      filesProcessed: [...this.filesProcessed],
      fileFailures: [...this.fileFailures],
      entryIssues: [...this.entryIssues],
      rejections: [...this.rejections],
      duplicates: this.duplicates,
    };
  }

  totalTopics(): number {
    let total = 0;
    for (const records of this.topicsByTask.values()) {
      total += records.length;
    }
    return total;
  }

  getFilesProcessed(): readonly string[] {
    return [...this.filesProcessed];
  }

  /**
   * All records of one task.
   */
  getTopics(task: T): readonly R[] {
    return [...(this.topicsByTask.get(task) ?? [])];
  }

  /**
   * Records per task that came from one source file. Unknown files give
   * empty lists.
   */
  getTopicsBySource(sourceFile: string): ReadonlyMap<T, readonly R[]> {
    return new Map(
      this.pipeline.tasks.map((task): [T, readonly R[]] => [
        task.id,
        this.getTopics(task.id).filter((record) => record.sourceFile === sourceFile),
      ])
    );
  }

  /**
   * The export document for the current state.
   */
  buildExport(): OrganizedTopicsDocument<E> {
    const counts: Partial<Record<CountKey, number>> = {};
    for (const task of this.pipeline.tasks) {
      counts[countKey(task.id)] = this.getTopics(task.id).length;
    }

    const summary: ExportSummary = {
      total_files_processed: this.filesProcessed.length,
      total_topics: this.totalTopics(),
      ...counts,
      files_processed: [...this.filesProcessed],
    };

    const document: OrganizedTopicsDocument<E> = { summary };
    for (const task of this.pipeline.tasks) {
      document[topicsKey(task.id)] = this.getTopics(task.id).map((record) =>
        this.serializeRecord(record)
      );
    }
    return document;
  }

  /**
   * Write the export document, replacing the target file atomically.
   *
   * @returns The path written
   * @throws TopicExportError if the file cannot be written
   */
  exportOrganizedTopics(outputFile: string = this.outputFile): string {
    writeJsonAtomic(outputFile, this.buildExport());
    this.logger.info("Exported organized topics", {
      outputFile,
      totalTopics: this.totalTopics(),
    });
    return outputFile;
  }

  /**
   * Text listing the first `sampleSize` records of each task.
   */
  formatSampleTopics(sampleSize = 3): string {
    const lines = [
      RULE,
      `SAMPLE TOPICS - ${this.pipeline.label} (showing first ${sampleSize} from each task)`,
      RULE,
    ];

    for (const task of this.pipeline.tasks) {
      const records = this.getTopics(task.id);
      lines.push("", `${task.title} (${records.length} total):`, THIN_RULE);

      records.slice(0, sampleSize).forEach((record, index) => {
        const { heading, extra } = this.describeRecord(record);
        lines.push("", `${index + 1}. [${heading}]`);
        lines.push(`   ${truncate(record.content, SAMPLE_CONTENT_CHARS)}`);
        lines.push(...extra.map((line) => `   ${line}`));
      });
    }

    return lines.join("\n");
  }

  /**
   * Print formatSampleTopics() output. Does not change any state.
   */
  displaySampleTopics(sampleSize = 3, print: (text: string) => void = console.log): void {
    print(this.formatSampleTopics(sampleSize));
  }

  /**
   * Text summary of the last load.
   */
  formatLoadSummary(): string {
    const lines = [
      RULE,
      `PARSING SUMMARY - ${this.pipeline.label}`,
      RULE,
      `Files processed:      ${this.filesProcessed.length}`,
      `Files skipped:        ${this.fileFailures.length}`,
      `Total topics:         ${this.totalTopics()}`,
    ];

    for (const task of this.pipeline.tasks) {
      lines.push(`${task.title}: ${this.getTopics(task.id).length}`);
    }

    lines.push(
      `Malformed entries:    ${this.entryIssues.length}`,
      `Rejected candidates:  ${this.rejections.length}`,
      `Duplicates removed:   ${this.duplicates}`
    );

    if (this.filesProcessed.length > 0) {
      lines.push("", "Files processed:");
      for (const file of this.filesProcessed) {
        lines.push(`  - ${file} (${formatFileDate(resolveFileDate(file))})`);
      }
    }

    if (this.fileFailures.length > 0) {
      lines.push("", "Files skipped:");
      for (const failure of this.fileFailures) {
        lines.push(`  - ${failure.file} [${failure.stage}] ${failure.message}`);
      }
    }

    return lines.join("\n");
  }
}

/**
 * Organizer for the oral expression section (tasks 2 and 3, split into
 * parts).
 */
export class OralTopicOrganizer extends TopicOrganizer<
  OralTopicRecord,
  OralTaskId,
  ExportedOralTopic
> {
  constructor(options: OrganizerOptions) {
    super(ORAL_PIPELINE, options);
  }

  protected extract(document: unknown, sourceFile: string): ExtractionResult<OralTopicRecord> {
    return extractTopics(document, sourceFile, ORAL_PIPELINE, this.rules);
  }

  protected groupKey(record: OralTopicRecord): string {
    return oralGroupKey(record);
  }

  protected serializeRecord(record: OralTopicRecord): ExportedOralTopic {
    return {
      content: record.content,
      source_url: record.sourceUrl,
      source_file: record.sourceFile,
      task: record.task,
      part: record.part,
      part_number: record.partNumber,
    };
  }

  protected describeRecord(record: OralTopicRecord): { heading: string; extra: string[] } {
    return { heading: `${record.sourceFile} - ${record.part}`, extra: [] };
  }

  /**
   * Records of one task whose part number matches.
   */
  getTopicsByPart(task: OralTaskId, partNumber: number): readonly OralTopicRecord[] {
    return this.getTopics(task).filter((record) => record.partNumber === partNumber);
  }
}

export interface WrittenStatistics {
  totalFiles: number;
  totalTopics: number;
  task1Count: number;
  task2Count: number;
  task3Count: number;
  task3WithDocuments: number;
}

/**
 * Organizer for the written expression section (tasks 1 to 3).
 */
export class WrittenTopicOrganizer extends TopicOrganizer<
  WrittenTopicRecord,
  WrittenTaskId,
  ExportedWrittenTopic
> {
  constructor(options: OrganizerOptions) {
    super(WRITTEN_PIPELINE, options);
  }

  protected extract(document: unknown, sourceFile: string): ExtractionResult<WrittenTopicRecord> {
    return extractTopics(document, sourceFile, WRITTEN_PIPELINE, this.rules);
  }

  protected groupKey(record: WrittenTopicRecord): string {
    return writtenGroupKey(record);
  }

  protected serializeRecord(record: WrittenTopicRecord): ExportedWrittenTopic {
    return {
      content: record.content,
      source_url: record.sourceUrl,
      source_file: record.sourceFile,
      task: record.task,
      word_count: record.wordCount,
      type_label: record.typeLabel,
      ...(record.documents ? { documents: [...record.documents] } : {}),
      ...(record.combination !== undefined ? { combination: record.combination } : {}),
    };
  }

  protected describeRecord(record: WrittenTopicRecord): { heading: string; extra: string[] } {
    const extra: string[] = [];
    if (record.documents) {
      extra.push(`Documents: ${record.documents.length} document(s)`);
      record.documents.slice(0, 2).forEach((doc, index) => {
        extra.push(`   Doc ${index + 1}: ${truncate(doc, 100)}`);
      });
    }
    if (record.combination !== undefined) {
      extra.push(`Source: ${record.combination}`);
    }
    return { heading: `${record.sourceFile} - ${record.wordCount} mots`, extra };
  }

  /**
   * All records of one task.
   */
  getTopicsByTask(task: WrittenTaskId): readonly WrittenTopicRecord[] {
    return this.getTopics(task);
  }

  getStatistics(): WrittenStatistics {
    return {
      totalFiles: this.getFilesProcessed().length,
      totalTopics: this.totalTopics(),
      task1Count: this.getTopics("task1").length,
      task2Count: this.getTopics("task2").length,
      task3Count: this.getTopics("task3").length,
      task3WithDocuments: this.getTopics("task3").filter((record) => record.documents).length,
    };
  }
}
