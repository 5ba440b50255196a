/**
 * The two exam sections, described as data.
 *
 * Adding a task means adding a row here; the extractor, deduplicator and
 * organizer read everything they need from these tables.
 */

import { DEFAULT_ORAL_RULES, DEFAULT_WRITTEN_RULES } from "./boilerplate.js";
import type { OralPipelineDefinition, WrittenPipelineDefinition } from "../types/pipeline.js";

export const ORAL_PIPELINE: OralPipelineDefinition = Object.freeze<OralPipelineDefinition>({
  kind: "oral",
  label: "Expression orale",
  fileSuffix: "expression-orale",
  defaultOutputFile: "organized_topics.json",
  defaultRules: DEFAULT_ORAL_RULES,
  tasks: Object.freeze([
    { id: "task2", sourceKey: "tache_2", title: "Tâche 2 - Interaction", shape: "parts" },
    { id: "task3", sourceKey: "tache_3", title: "Tâche 3 - Point de vue", shape: "parts" },
  ] as const),
});

export const WRITTEN_PIPELINE: WrittenPipelineDefinition = Object.freeze<WrittenPipelineDefinition>({
  kind: "written",
  label: "Expression écrite",
  fileSuffix: "expression-ecrite",
  defaultOutputFile: "organized_ee_topics.json",
  defaultRules: DEFAULT_WRITTEN_RULES,
  tasks: Object.freeze([
    {
      id: "task1",
      sourceKey: "tache_1",
      title: "Tâche 1 - Message personnel",
      shape: "entries",
      typeLabel: "message_personnel",
      defaultWordCount: "60-120",
      acceptsDocuments: false,
    },
    {
      id: "task2",
      sourceKey: "tache_2",
      title: "Tâche 2 - Article / blog",
      shape: "entries",
      typeLabel: "article_blog",
      defaultWordCount: "120-150",
      acceptsDocuments: false,
    },
    {
      id: "task3",
      sourceKey: "tache_3",
      title: "Tâche 3 - Texte argumentatif",
      shape: "entries",
      typeLabel: "texte_argumentatif",
      defaultWordCount: "120-180",
      acceptsDocuments: true,
    },
  ] as const),
});

export type PipelineName = "oral" | "written";

