/**
 * Topic organization module.
 *
 * Reads scraped exam topic files, keeps the genuine prompts, and exports
 * them per task in one JSON document per exam section.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * DATA FLOW
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. DISCOVERY: files named `{mois}-{année}-{suffix}.json` are listed and
 *    sorted newest first from the French month in their name (dates.ts).
 *
 * 2. EXTRACTION: each file is read with its pipeline's task table
 *    (pipelines.ts); every candidate string goes through the cleaner
 *    (cleaner.ts, boilerplate.ts).
 *
 * 3. DEDUPLICATION: repeated prompts within one file and one task/part are
 *    dropped (dedupe.ts).
 *
 * 4. AGGREGATION & EXPORT: the organizer (organizer.ts) keeps records per
 *    task and writes the export document (export.ts).
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * EXAMPLE USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   import { WrittenTopicOrganizer } from "./topics/index.js";
 *
 *   const organizer = new WrittenTopicOrganizer({ inputDir: "output" });
 *   const result = organizer.loadAllTopics();
 *   for (const failure of result.fileFailures) {
 *     console.warn(`${failure.file}: ${failure.message}`);
 *   }
 *   organizer.exportOrganizedTopics("organized_ee_topics.json");
 */

// Filename dates
export {
  FRENCH_MONTHS,
  UNKNOWN_FILE_DATE,
  resolveMonth,
  resolveFileDate,
  compareFileDatesDesc,
  sortFilesByDate,
  formatFileDate,
  type FileDateKey,
} from "./dates.js";

// Cleaning
export {
  cleanTopicContent,
  findBoilerplate,
  normalizeWhitespace,
  type CleanResult,
  type RejectionReason,
} from "./cleaner.js";
export {
  MIN_TOPIC_LENGTH,
  DEFAULT_ORAL_RULES,
  DEFAULT_WRITTEN_RULES,
  BoilerplateExtensionSchema,
  BoilerplateRulesError,
  parseBoilerplateExtension,
  loadBoilerplateExtension,
  mergeBoilerplateRules,
  type BoilerplateRules,
  type BoilerplateExtension,
  type BoilerplateIssue,
} from "./boilerplate.js";

// Pipelines and extraction
export { ORAL_PIPELINE, WRITTEN_PIPELINE, type PipelineName } from "./pipelines.js";
export {
  extractTopics,
  parseSourceDocument,
  partNumberOf,
  DocumentShapeError,
  type EntryIssue,
  type Rejection,
  type ExtractionResult,
} from "./extractor.js";
export { dedupeRecords, oralGroupKey, writtenGroupKey, type DedupeResult } from "./dedupe.js";

// Organizers and export
export {
  TopicOrganizer,
  OralTopicOrganizer,
  WrittenTopicOrganizer,
  TopicSourceError,
  truncate,
  type FileFailure,
  type LoadResult,
  type OrganizerOptions,
  type WrittenStatistics,
} from "./organizer.js";
export {
  TopicExportError,
  writeJsonAtomic,
  readOrganizedTopics,
  countKey,
  topicsKey,
  ExportedOralTopicSchema,
  ExportedWrittenTopicSchema,
  type ExportedOralTopic,
  type ExportedWrittenTopic,
  type ExportSummary,
  type OrganizedTopicsDocument,
} from "./export.js";
