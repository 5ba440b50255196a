/**
 * Record extraction.
 *
 * Turns one parsed source document into topic records, one task
 * definition at a time:
 *
 *   { "source_url": "...",
 *     "topics": {
 *       "tache_2": { "partie_1": ["...", "..."] },          // parts shape
 *       "tache_3": [{ "content": "...", "documents": [] }]  // entries shape
 *     } }
 *
 * Only the top level has to be well formed. Below it, a value of the
 * wrong type becomes an EntryIssue and extraction moves on; text the
 * cleaner refuses becomes a Rejection.
 */

import { z } from "zod";
import { cleanTopicContent, type RejectionReason } from "./cleaner.js";
import type { BoilerplateRules } from "./boilerplate.js";
import type {
  EntriesTaskDefinition,
  OralPipelineDefinition,
  PartsTaskDefinition,
  WrittenPipelineDefinition,
} from "../types/pipeline.js";
import type {
  OralTopicRecord,
  TaskId,
  TopicRecord,
  WrittenTaskId,
  WrittenTopicRecord,
} from "../types/topic.js";

/**
 * A value in a source file that could not be read as a topic entry.
 */
export interface EntryIssue {
  file: string;
  task: TaskId;
  /** Path inside `topics`, e.g. "tache_2.partie_1[3]" */
  location: string;
  message: string;
}

/**
 * A candidate string the cleaner refused.
 */
export interface Rejection {
  file: string;
  task: TaskId;
  location: string;
  reason: RejectionReason;
  detail?: string;
}

export interface ExtractionResult<R> {
  records: R[];
  issues: EntryIssue[];
  rejections: Rejection[];
}

/**
 * The document's top level is not `{ source_url?, topics? }`.
 */
export class DocumentShapeError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = "DocumentShapeError";
    this.issues = issues;
  }
}

const SourceDocumentSchema = z.object({
  source_url: z.string().optional().catch(undefined),
  topics: z.record(z.string(), z.unknown()).optional(),
});
type SourceDocument = z.infer<typeof SourceDocumentSchema>;

const WrittenEntrySchema = z.object({
  content: z.unknown(),
  combination: z.unknown(),
  word_count: z.unknown(),
  documents: z.unknown(),
});

type WrittenEntry = z.infer<typeof WrittenEntrySchema>;

/**
 * Read one written entry. A bare string is an entry with only content.
 */
function readEntry(item: unknown): WrittenEntry | undefined {
  if (typeof item === "string") {
    return { content: item };
  }
  const parsed = WrittenEntrySchema.safeParse(item);
  return parsed.success ? parsed.data : undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Numeric part of a part label: trailing digits, else 0.
 *
 * @example
 *   partNumberOf("partie_3")  // 3
 *   partNumberOf("Partie 12") // 12
 *   partNumberOf("bonus")     // 0
 */
export function partNumberOf(label: string): number {
  const match = /(\d+)\s*$/.exec(label);
  return match?.[1] !== undefined ? parseInt(match[1], 10) : 0;
}

/**
 * Validate a document's top level.
 *
 * @throws DocumentShapeError
 */
export function parseSourceDocument(document: unknown): SourceDocument {
  const result = SourceDocumentSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new DocumentShapeError(`Unexpected document shape: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

interface TaskContext {
  file: string;
  sourceUrl: string;
  rules: BoilerplateRules;
}

function extractParts(
  value: unknown,
  task: PartsTaskDefinition,
  ctx: TaskContext,
  out: ExtractionResult<OralTopicRecord>
): void {
  if (!isPlainObject(value)) {
    out.issues.push({
      file: ctx.file,
      task: task.id,
      location: task.sourceKey,
      message: `expected an object of parts, got ${describeType(value)}`,
    });
    return;
  }

  for (const [part, items] of Object.entries(value)) {
    const partLocation = `${task.sourceKey}.${part}`;
    if (!Array.isArray(items)) {
      out.issues.push({
        file: ctx.file,
        task: task.id,
        location: partLocation,
        message: `expected a list of prompts, got ${describeType(items)}`,
      });
      continue;
    }

    const partNumber = partNumberOf(part);
    items.forEach((item: unknown, index) => {
      const location = `${partLocation}[${index}]`;
      const cleaned = cleanTopicContent(item, ctx.rules);
      if (!cleaned.ok) {
        if (cleaned.reason === "not_string") {
          out.issues.push({
            file: ctx.file,
            task: task.id,
            location,
            message: `expected a string, got ${describeType(item)}`,
          });
        } else {
          out.rejections.push({
            file: ctx.file,
            task: task.id,
            location,
            reason: cleaned.reason,
            detail: cleaned.detail,
          });
        }
        return;
      }

      out.records.push({
        kind: "oral",
        content: cleaned.content,
        sourceUrl: ctx.sourceUrl,
        sourceFile: ctx.file,
        task: task.id,
        part,
        partNumber,
      });
    });
  }
}

function extractEntries(
  value: unknown,
  task: EntriesTaskDefinition,
  ctx: TaskContext,
  out: ExtractionResult<WrittenTopicRecord>
): void {
  if (!Array.isArray(value)) {
    out.issues.push({
      file: ctx.file,
      task: task.id,
      location: task.sourceKey,
      message: `expected a list of entries, got ${describeType(value)}`,
    });
    return;
  }

  value.forEach((item: unknown, index) => {
    const location = `${task.sourceKey}[${index}]`;

    const entry = readEntry(item);
    if (entry === undefined) {
      out.issues.push({
        file: ctx.file,
        task: task.id,
        location,
        message: `expected an entry object or string, got ${describeType(item)}`,
      });
      return;
    }

    if (typeof entry.content !== "string") {
      out.issues.push({
        file: ctx.file,
        task: task.id,
        location: `${location}.content`,
        message:
          entry.content === undefined
            ? "missing content"
            : `expected a string, got ${describeType(entry.content)}`,
      });
      return;
    }

    const cleaned = cleanTopicContent(entry.content, ctx.rules);
    if (!cleaned.ok) {
      out.rejections.push({
        file: ctx.file,
        task: task.id,
        location: `${location}.content`,
        reason: cleaned.reason,
        detail: cleaned.detail,
      });
      return;
    }

    const fields = { file: ctx.file, task: task.id, location, out };
    const wordCount = readTextField(entry.word_count, "word_count", fields);
    const combination = readTextField(entry.combination, "combination", fields);
    const documents = task.acceptsDocuments ? readDocuments(entry.documents, fields) : [];

    const record: WrittenTopicRecord = {
      kind: "written",
      content: cleaned.content,
      sourceUrl: ctx.sourceUrl,
      sourceFile: ctx.file,
      task: task.id,
      wordCount: wordCount || task.defaultWordCount,
      typeLabel: task.typeLabel,
    };

    out.records.push({
      ...record,
      ...(documents.length > 0 ? { documents } : {}),
      ...(combination ? { combination } : {}),
    });
  });
}

interface FieldContext {
  file: string;
  task: WrittenTaskId;
  /** Location of the entry the field belongs to */
  location: string;
  out: ExtractionResult<WrittenTopicRecord>;
}

/**
 * Optional pass-through text. Numbers are written out; any other type is
 * an issue and the field is left out.
 */
function readTextField(value: unknown, field: string, ctx: FieldContext): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string" || typeof value === "number") {
    return String(value).trim();
  }
  ctx.out.issues.push({
    file: ctx.file,
    task: ctx.task,
    location: `${ctx.location}.${field}`,
    message: `expected a string or number, got ${describeType(value)}`,
  });
  return undefined;
}

/**
 * Supporting documents, copied as given and never cleaned. Values that
 * are not strings are reported and left out.
 */
function readDocuments(value: unknown, ctx: FieldContext): string[] {
  if (value === undefined || value === null) {
    return [];
  }

  const location = `${ctx.location}.documents`;
  if (!Array.isArray(value)) {
    ctx.out.issues.push({
      file: ctx.file,
      task: ctx.task,
      location,
      message: `expected a list of documents, got ${describeType(value)}`,
    });
    return [];
  }

  const documents: string[] = [];
  value.forEach((doc: unknown, index) => {
    if (typeof doc === "string") {
      documents.push(doc);
    } else {
      ctx.out.issues.push({
        file: ctx.file,
        task: ctx.task,
        location: `${location}[${index}]`,
        message: `expected a string, got ${describeType(doc)}`,
      });
    }
  });
  return documents;
}

/**
 * Extract every task of a pipeline from one parsed document.
 *
 * @param document - Parsed JSON of one source file
 * @param sourceFile - File name recorded on every record
 * @param pipeline - Task table to read the document with
 * @param rules - Cleaning rules (defaults to the pipeline's own)
 * @throws DocumentShapeError when the top level is malformed
 */
export function extractTopics(
  document: unknown,
  sourceFile: string,
  pipeline: OralPipelineDefinition,
  rules?: BoilerplateRules
): ExtractionResult<OralTopicRecord>;
export function extractTopics(
  document: unknown,
  sourceFile: string,
  pipeline: WrittenPipelineDefinition,
  rules?: BoilerplateRules
): ExtractionResult<WrittenTopicRecord>;
export function extractTopics(
  document: unknown,
  sourceFile: string,
  pipeline: OralPipelineDefinition | WrittenPipelineDefinition,
  rules: BoilerplateRules = pipeline.defaultRules
): ExtractionResult<TopicRecord> {
  const parsed = parseSourceDocument(document);
  const topics = parsed.topics ?? {};
  const ctx: TaskContext = { file: sourceFile, sourceUrl: parsed.source_url ?? "", rules };

  if (pipeline.kind === "oral") {
    const out: ExtractionResult<OralTopicRecord> = { records: [], issues: [], rejections: [] };
    for (const task of pipeline.tasks) {
      if (topics[task.sourceKey] !== undefined) {
        extractParts(topics[task.sourceKey], task, ctx, out);
      }
    }
    return out;
  }

  const out: ExtractionResult<WrittenTopicRecord> = { records: [], issues: [], rejections: [] };
  for (const task of pipeline.tasks) {
    if (topics[task.sourceKey] !== undefined) {
      extractEntries(topics[task.sourceKey], task, ctx, out);
    }
  }
  return out;
}
