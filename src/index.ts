/**
 * Entry point: organize both exam sections with configuration defaults.
 */

import { ConfigError, loadConfig, validateConfig, type AppConfig } from "./config/index.js";
import { createLogger, initRunId } from "./logging/index.js";
import { BoilerplateRulesError } from "./topics/boilerplate.js";
import { TopicExportError } from "./topics/export.js";
import { TopicSourceError } from "./topics/organizer.js";
import { buildRunPlan, runPipelines } from "./cli/organize-topics.js";

function main(): void {
  // Initialize run ID first
  const runId = initRunId();

  let config: AppConfig;
  try {
    config = loadConfig();
    validateConfig(config);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger({
    level: config.logLevel,
    logDir: config.logDir,
    file: config.logToFile,
  });

  logger.info("Application starting", { runId, env: config.env, topicsDir: config.topicsDir });

  try {
    const plan = buildRunPlan({ pipeline: "all", json: false, noColor: false, help: false }, config);
    const reports = runPipelines(plan, logger);
    logger.info("Application finished", {
      totalTopics: reports.reduce((sum, report) => sum + report.totalTopics, 0),
    });
  } catch (err) {
    if (
      err instanceof BoilerplateRulesError ||
      err instanceof TopicSourceError ||
      err instanceof TopicExportError
    ) {
      logger.error(err.message, { error: err.name });
      process.exit(1);
    }
    throw err;
  }
}

main();
