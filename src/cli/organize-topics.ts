#!/usr/bin/env node
/**
 * Organize scraped exam topics into per-task export files.
 *
 * Usage:
 *   npm run organize -- [--pipeline oral|written|all] [--input <dir>]
 *                       [--output <file>] [--boilerplate <file>]
 *                       [--sample <n>] [--json] [--no-color]
 *
 * Options:
 *   --pipeline <name>      Which section to organize (default: all)
 *   --input <dir>          Directory of scraped files (default: TOPICS_DIR)
 *   --output <file>        Export path; only valid with a single pipeline
 *   --boilerplate <file>   JSON file of extra boilerplate rules
 *   --sample <n>           Records shown per task (default: SAMPLE_SIZE)
 *   --json                 Print the load summaries as JSON
 *   --no-color             Disable colored output
 *   --help, -h             Show help
 *
 * Exit codes:
 *   0  every selected pipeline was exported (skipped files are reported)
 *   1  configuration, rules, source directory or export failure
 */

import { parseArgs } from "node:util";
import {
  ConfigError,
  loadConfig,
  validateConfig,
  type AppConfig,
} from "../config/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import {
  BoilerplateRulesError,
  DEFAULT_ORAL_RULES,
  DEFAULT_WRITTEN_RULES,
  loadBoilerplateExtension,
  mergeBoilerplateRules,
  OralTopicOrganizer,
  TopicExportError,
  TopicSourceError,
  WrittenTopicOrganizer,
  type BoilerplateRules,
  type PipelineName,
} from "../topics/index.js";

// ============================================================
// Terminal colors
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
} as const;

let useColors = true;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

// ============================================================
// Arguments
// ============================================================

export const PIPELINE_CHOICES = ["oral", "written", "all"] as const;
export type PipelineChoice = (typeof PIPELINE_CHOICES)[number];

export interface CliOptions {
  pipeline: PipelineChoice;
  input?: string;
  output?: string;
  boilerplate?: string;
  sample?: number;
  json: boolean;
  noColor: boolean;
  help: boolean;
}

/**
 * Thrown for arguments that parse but make no sense together.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isPipelineChoice(value: string): value is PipelineChoice {
  return PIPELINE_CHOICES.some((choice) => choice === value);
}

/**
 * Parse command-line arguments.
 *
 * @throws UsageError for unknown pipelines, bad sample sizes or an
 *   --output given with --pipeline all
 */
export function parseCliArgs(argv: string[] = process.argv.slice(2)): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      pipeline: { type: "string", default: "all" },
      input: { type: "string" },
      output: { type: "string" },
      boilerplate: { type: "string" },
      sample: { type: "string" },
      json: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  const pipeline = values.pipeline ?? "all";
  if (!isPipelineChoice(pipeline)) {
    throw new UsageError(
      `Unknown pipeline "${pipeline}". Expected one of: ${PIPELINE_CHOICES.join(", ")}`
    );
  }

  let sample: number | undefined;
  if (values.sample !== undefined) {
    if (!/^\d+$/.test(values.sample)) {
      throw new UsageError(`--sample must be a non-negative integer, got "${values.sample}"`);
    }
    sample = parseInt(values.sample, 10);
  }

  if (values.output !== undefined && pipeline === "all") {
    throw new UsageError("--output needs --pipeline oral or --pipeline written");
  }

  return {
    pipeline,
    input: values.input,
    output: values.output,
    boilerplate: values.boilerplate,
    sample,
    json: values.json ?? false,
    noColor: values["no-color"] ?? false,
    help: values.help ?? false,
  };
}

function printHelp(): void {
  console.log(`
${c("bold", "organize-topics")} - Organize scraped exam topics by task

${c("cyan", "Usage:")}
  npm run organize -- [options]

${c("cyan", "Options:")}
  --pipeline <name>     oral, written or all (default: all)
  --input <dir>         Directory of scraped files (default: $TOPICS_DIR)
  --output <file>       Export path for a single pipeline
  --boilerplate <file>  JSON file of extra boilerplate rules
  --sample <n>          Records shown per task (default: $SAMPLE_SIZE)
  --json                Print load summaries as JSON
  --no-color            Disable colored output
  --help, -h            Show this help

${c("cyan", "Examples:")}
  npm run organize
  npm run organize -- --pipeline written --input ./scraped --sample 5
  npm run organize -- --pipeline oral --output ./exports/oral.json --json
`);
}

// ============================================================
// Run
// ============================================================

export interface RunPlan {
  pipelines: readonly PipelineName[];
  inputDir: string;
  outputFiles: Readonly<Record<PipelineName, string>>;
  rules: Readonly<Record<PipelineName, BoilerplateRules>>;
  sampleSize: number;
  /** Print samples and summaries as text */
  showText: boolean;
}

export interface PipelineReport {
  pipeline: PipelineName;
  outputFile: string;
  filesProcessed: number;
  filesSkipped: number;
  totalTopics: number;
  topicsPerTask: Record<string, number>;
  malformedEntries: number;
  rejectedCandidates: number;
  duplicatesRemoved: number;
}

/**
 * Resolve CLI options against configuration. Explicit options win.
 *
 * @throws BoilerplateRulesError if the rules file cannot be used
 */
export function buildRunPlan(options: CliOptions, config: AppConfig): RunPlan {
  const pipelines: PipelineName[] =
    options.pipeline === "all" ? ["oral", "written"] : [options.pipeline];

  const rulesFile = options.boilerplate ?? config.boilerplateFile;
  const extension = rulesFile !== undefined ? loadBoilerplateExtension(rulesFile) : undefined;

  return {
    pipelines,
    inputDir: options.input ?? config.topicsDir,
    outputFiles: {
      oral: (options.pipeline === "oral" ? options.output : undefined) ?? config.oralOutputFile,
      written:
        (options.pipeline === "written" ? options.output : undefined) ?? config.writtenOutputFile,
    },
    rules: {
      oral: extension ? mergeBoilerplateRules(DEFAULT_ORAL_RULES, extension) : DEFAULT_ORAL_RULES,
      written: extension
        ? mergeBoilerplateRules(DEFAULT_WRITTEN_RULES, extension)
        : DEFAULT_WRITTEN_RULES,
    },
    sampleSize: options.sample ?? config.sampleSize,
    showText: !options.json,
  };
}

function createOrganizer(
  pipeline: PipelineName,
  plan: RunPlan,
  logger: Logger
): OralTopicOrganizer | WrittenTopicOrganizer {
  const options = {
    inputDir: plan.inputDir,
    outputFile: plan.outputFiles[pipeline],
    rules: plan.rules[pipeline],
    logger,
  };
  return pipeline === "oral" ? new OralTopicOrganizer(options) : new WrittenTopicOrganizer(options);
}

/**
 * Load, display and export every pipeline of a plan, in order.
 *
 * @param print - Receives the text output (samples and summaries)
 * @throws TopicSourceError if the input directory cannot be read
 * @throws TopicExportError if an export file cannot be written
 */
export function runPipelines(
  plan: RunPlan,
  logger: Logger,
  print: (text: string) => void = console.log
): PipelineReport[] {
  const reports: PipelineReport[] = [];

  for (const pipeline of plan.pipelines) {
    const organizer = createOrganizer(pipeline, plan, logger);
    const result = organizer.loadAllTopics();

    if (plan.showText) {
      organizer.displaySampleTopics(plan.sampleSize, print);
    }

    const outputFile = organizer.exportOrganizedTopics();

    if (plan.showText) {
      print("");
      print(organizer.formatLoadSummary());
      print("");
    }

    const topicsPerTask: Record<string, number> = {};
    for (const [task, records] of result.topics) {
      topicsPerTask[task] = records.length;
    }

    reports.push({
      pipeline,
      outputFile,
      filesProcessed: result.filesProcessed.length,
      filesSkipped: result.fileFailures.length,
      totalTopics: organizer.totalTopics(),
      topicsPerTask,
      malformedEntries: result.entryIssues.length,
      rejectedCandidates: result.rejections.length,
      duplicatesRemoved: result.duplicates,
    });
  }

  return reports;
}

// ============================================================
// Main
// ============================================================

function isFatal(
  err: unknown
): err is ConfigError | BoilerplateRulesError | TopicSourceError | TopicExportError | UsageError {
  return (
    err instanceof ConfigError ||
    err instanceof BoilerplateRulesError ||
    err instanceof TopicSourceError ||
    err instanceof TopicExportError ||
    err instanceof UsageError
  );
}

/**
 * Run the command and return its exit code.
 */
export function main(argv: string[] = process.argv.slice(2)): number {
  initRunId();

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Error: ${message}`));
    console.error("  Run with --help for usage.");
    return 1;
  }

  if (options.noColor) {
    useColors = false;
  }

  if (options.help) {
    printHelp();
    return 0;
  }

  let config: AppConfig;
  try {
    config = loadConfig();
    validateConfig(config);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(c("red", `Configuration error: ${err.message}`));
      return 1;
    }
    throw err;
  }

  const logger = createLogger({
    level: config.logLevel,
    logDir: config.logDir,
    file: config.logToFile,
    console: !options.json,
  });

  try {
    const plan = buildRunPlan(options, config);
    logger.info("Organizer starting", {
      pipelines: plan.pipelines,
      inputDir: plan.inputDir,
      env: config.env,
    });

    const reports = runPipelines(plan, logger);

    if (options.json) {
      console.log(JSON.stringify(reports, null, 2));
    } else {
      for (const report of reports) {
        console.log(
          `${c("green", "✓")} ${report.pipeline}: ${report.totalTopics} topics → ${c("cyan", report.outputFile)}`
        );
        if (report.filesSkipped > 0) {
          console.log(c("yellow", `  ${report.filesSkipped} file(s) skipped, see the summary above`));
        }
      }
    }
    return 0;
  } catch (err) {
    if (!isFatal(err)) {
      throw err;
    }
    logger.error(err.message, { error: err.name });
    console.error(c("red", err instanceof BoilerplateRulesError ? err.format() : `Error: ${err.message}`));
    return 1;
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("organize-topics.ts") ||
    process.argv[1].endsWith("organize-topics.js") ||
    process.argv[1].endsWith("organize-topics"));

if (isDirectExecution) {
  try {
    process.exitCode = main();
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Unexpected error: ${message}`));
    process.exitCode = 1;
  }
}
