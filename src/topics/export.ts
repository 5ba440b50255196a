/**
 * Export document format and file I/O.
 *
 * Field names are snake_case, as consumed by downstream generators:
 *
 *   {
 *     "summary": {
 *       "total_files_processed": 2,
 *       "total_topics": 14,
 *       "task2_topics_count": 9,
 *       "task3_topics_count": 5,
 *       "files_processed": ["mars-2025-expression-orale.json", ...]
 *     },
 *     "task2_topics": [{ "content": "...", "source_file": "...", ... }],
 *     "task3_topics": [...]
 *   }
 *
 * Files are written to a temporary sibling and renamed into place, so a
 * failed export leaves any previous file untouched.
 */

import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { z } from "zod";
import type { TaskId } from "../types/topic.js";

export class TopicExportError extends Error {
  public readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TopicExportError";
    this.filePath = filePath;
  }
}

const TaskIdSchema = z.enum(["task1", "task2", "task3"]);

export const ExportedOralTopicSchema = z.object({
  content: z.string().min(1),
  source_url: z.string(),
  source_file: z.string().min(1),
  task: TaskIdSchema,
  part: z.string(),
  part_number: z.number().int().nonnegative(),
});
export type ExportedOralTopic = z.infer<typeof ExportedOralTopicSchema>;

export const ExportedWrittenTopicSchema = z.object({
  content: z.string().min(1),
  source_url: z.string(),
  source_file: z.string().min(1),
  task: TaskIdSchema,
  word_count: z.string(),
  type_label: z.string(),
  documents: z.array(z.string()).optional(),
  combination: z.string().optional(),
});
export type ExportedWrittenTopic = z.infer<typeof ExportedWrittenTopicSchema>;

export type CountKey = `${TaskId}_topics_count`;
export type TopicsKey = `${TaskId}_topics`;

export function countKey(task: TaskId): CountKey {
  return `${task}_topics_count`;
}

export function topicsKey(task: TaskId): TopicsKey {
  return `${task}_topics`;
}

const Count = z.number().int().nonnegative();

const ExportSummarySchema = z.object({
  total_files_processed: Count,
  total_topics: Count,
  task1_topics_count: Count.optional(),
  task2_topics_count: Count.optional(),
  task3_topics_count: Count.optional(),
  files_processed: z.array(z.string()),
});
export type ExportSummary = z.infer<typeof ExportSummarySchema>;

export type OrganizedTopicsDocument<E> = {
  summary: ExportSummary;
} & Partial<Record<TopicsKey, E[]>>;

const OralDocumentSchema = z.object({
  summary: ExportSummarySchema,
  task2_topics: z.array(ExportedOralTopicSchema).optional(),
  task3_topics: z.array(ExportedOralTopicSchema).optional(),
});

const WrittenDocumentSchema = z.object({
  summary: ExportSummarySchema,
  task1_topics: z.array(ExportedWrittenTopicSchema).optional(),
  task2_topics: z.array(ExportedWrittenTopicSchema).optional(),
  task3_topics: z.array(ExportedWrittenTopicSchema).optional(),
});

function validateExport<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  filePath: string
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new TopicExportError(`Invalid export ${filePath}: ${issues}`, filePath);
  }
  return result.data;
}

/**
 * Write a JSON document atomically (temp file + rename).
 *
 * @throws TopicExportError if the file cannot be written
 */
export function writeJsonAtomic(filePath: string, data: unknown): void {
  const directory = dirname(filePath);
  const tempPath = join(directory, `.${basename(filePath)}.${process.pid}.tmp`);

  let directoryReady = false;
  try {
    mkdirSync(directory, { recursive: true });
    directoryReady = true;
    writeFileSync(tempPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
    renameSync(tempPath, filePath);
  } catch (err) {
    if (directoryReady) {
      rmSync(tempPath, { force: true });
    }
    throw new TopicExportError(
      `Failed to export topics to ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      { cause: err }
    );
  }
}

/**
 * Read back an exported document and validate it.
 *
 * @param filePath - Path of an export file
 * @param kind - Which record shape the arrays hold
 * @throws TopicExportError if the file is unreadable or malformed
 */
export function readOrganizedTopics(
  filePath: string,
  kind: "oral"
): OrganizedTopicsDocument<ExportedOralTopic>;
export function readOrganizedTopics(
  filePath: string,
  kind: "written"
): OrganizedTopicsDocument<ExportedWrittenTopic>;
export function readOrganizedTopics(
  filePath: string,
  kind: "oral" | "written"
): OrganizedTopicsDocument<ExportedOralTopic> | OrganizedTopicsDocument<ExportedWrittenTopic> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new TopicExportError(
      `Failed to read export ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      { cause: err }
    );
  }

  return kind === "oral"
    ? validateExport(OralDocumentSchema, parsed, filePath)
    : validateExport(WrittenDocumentSchema, parsed, filePath);
}
