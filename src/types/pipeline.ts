/**
 * Pipeline definitions.
 * A pipeline is a table of task definitions plus the file naming and
 * cleaning rules of one exam section.
 */

import type { BoilerplateRules } from "../topics/boilerplate.js";
import type { OralTaskId, TaskId, WrittenTaskId } from "./topic.js";

export type PipelineKind = "oral" | "written";

export interface TaskDefinitionBase<T extends TaskId = TaskId> {
  readonly id: T;
  /** Key of the task under `topics` in a source file, e.g. "tache_2" */
  readonly sourceKey: string;
  /** Display title */
  readonly title: string;
}

/** Task stored as `{ partLabel: [prompt, ...] }` */
export interface PartsTaskDefinition extends TaskDefinitionBase<OralTaskId> {
  readonly shape: "parts";
}

/** Task stored as `[{ content, combination?, word_count?, documents? }, ...]` */
export interface EntriesTaskDefinition extends TaskDefinitionBase<WrittenTaskId> {
  readonly shape: "entries";
  readonly typeLabel: string;
  readonly defaultWordCount: string;
  /** Whether entries may carry supporting documents */
  readonly acceptsDocuments: boolean;
}

export interface PipelineDefinition<
  K extends PipelineKind = PipelineKind,
  D extends TaskDefinitionBase = TaskDefinitionBase,
> {
  readonly kind: K;
  readonly label: string;
  /** Source files end in `-{fileSuffix}.json` */
  readonly fileSuffix: string;
  readonly defaultOutputFile: string;
  readonly defaultRules: BoilerplateRules;
  readonly tasks: readonly D[];
}

export type OralPipelineDefinition = PipelineDefinition<"oral", PartsTaskDefinition>;
export type WrittenPipelineDefinition = PipelineDefinition<"written", EntriesTaskDefinition>;
