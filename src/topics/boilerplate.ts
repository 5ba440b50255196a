/**
 * Boilerplate rules: the fragments that mark scraped text as page chrome
 * (menus, cookie banners, footers) rather than an exam topic.
 *
 * The built-in lists come from the site the topics are scraped from. New
 * sources bring new chrome, so a JSON file can extend them:
 *
 *   {
 *     "startsWith": ["Abonnez-vous"],
 *     "contains": ["Tous droits réservés"],
 *     "containsWords": ["newsletter"],
 *     "minLength": 25
 *   }
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

export interface BoilerplateRules {
  /** Shortest accepted content, in characters (inclusive) */
  readonly minLength: number;
  /** Reject content beginning with any of these */
  readonly startsWith: readonly string[];
  /** Reject content containing any of these (case-sensitive substring) */
  readonly contains: readonly string[];
  /** Reject content containing any of these as a whole word (any case) */
  readonly containsWords: readonly string[];
  /** Reject content where a term occurs more often than allowed */
  readonly repeatLimits: Readonly<Record<string, number>>;
  /** Drop a leading "Partie N:" header before checking */
  readonly stripPartPrefix: boolean;
}

export const MIN_TOPIC_LENGTH = 20;

const SITE_PREFIXES = [
  "AccueilSe connecter",
  "Nous utilisons des cookies",
  "Nos Contacts",
  "🎯 Nouveau Service Exceptionnel",
  "Sujets d'actualité corrigés pour",
  "les méthodologiesCompréhension",
  "Les méthodologiesCompréhension",
  "Partager avec votre réseau",
];

const SITE_FRAGMENTS = [
  "AccueilSe connecter",
  "Compréhension écrite",
  "Expression Orale",
  "Nos Formations",
  "Cabinet d'immigration",
  "Contactez-nous",
  "Politique de retour",
  "Mentions Légales",
];

const NAVIGATION_WORDS = ["menu", "navigation"];

export const DEFAULT_ORAL_RULES: BoilerplateRules = Object.freeze<BoilerplateRules>({
  minLength: MIN_TOPIC_LENGTH,
  startsWith: Object.freeze([...SITE_PREFIXES]),
  contains: Object.freeze([...SITE_FRAGMENTS]),
  containsWords: Object.freeze([...NAVIGATION_WORDS]),
  repeatLimits: {},
  stripPartPrefix: true,
});

export const DEFAULT_WRITTEN_RULES: BoilerplateRules = Object.freeze<BoilerplateRules>({
  minLength: MIN_TOPIC_LENGTH,
  startsWith: Object.freeze([
    ...SITE_PREFIXES,
    // Section headers and word-count labels of the written pages
    "Combinaison",
    "Tâche 1",
    "Tâche 2",
    "Tâche 3",
    "Document 1",
    "Document 2",
    "mots minimum",
    "mots maximum",
    "/* <![CDATA[",
  ]),
  contains: Object.freeze([
    ...SITE_FRAGMENTS,
    "les pagesActualité",
    "Les pages",
    "Nous acceptons",
    "Paiment",
    "Cliquez ici",
  ]),
  containsWords: Object.freeze([...NAVIGATION_WORDS]),
  repeatLimits: { "Compréhension": 1, "Expression": 1 },
  stripPartPrefix: false,
});

/**
 * Shape of a boilerplate extension file.
 */
export const BoilerplateExtensionSchema = z
  .object({
    startsWith: z.array(z.string().min(1)).default([]),
    contains: z.array(z.string().min(1)).default([]),
    containsWords: z.array(z.string().min(1)).default([]),
    // Extensions may only raise the threshold
    minLength: z.number().int().min(MIN_TOPIC_LENGTH).optional(),
  })
  .strict();
export type BoilerplateExtension = z.infer<typeof BoilerplateExtensionSchema>;

/**
 * Individual validation issue in a boilerplate file.
 */
export interface BoilerplateIssue {
  path: string;
  message: string;
}

export class BoilerplateRulesError extends Error {
  public readonly issues: BoilerplateIssue[];

  constructor(message: string, issues: BoilerplateIssue[] = []) {
    super(message);
    this.name = "BoilerplateRulesError";
    this.issues = issues;
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Validate a parsed boilerplate extension.
 *
 * @throws BoilerplateRulesError listing every schema issue
 */
export function parseBoilerplateExtension(input: unknown): BoilerplateExtension {
  const result = BoilerplateExtensionSchema.safeParse(input);
  if (!result.success) {
    throw new BoilerplateRulesError(
      "Invalid boilerplate rules",
      result.error.issues.map((issue) => ({
        path: issue.path.join(".") || "(root)",
        message: issue.message,
      }))
    );
  }
  return result.data;
}

/**
 * Read and validate a boilerplate extension file.
 *
 * @throws BoilerplateRulesError if the file is unreadable, not JSON, or invalid
 */
export function loadBoilerplateExtension(filePath: string): BoilerplateExtension {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new BoilerplateRulesError(
      `Failed to read boilerplate rules ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new BoilerplateRulesError(
      `Boilerplate rules ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseBoilerplateExtension(parsed);
}

function union(base: readonly string[], extra: readonly string[]): readonly string[] {
  return Object.freeze([...new Set([...base, ...extra])]);
}

/**
 * Extend a rule set. Lists are unioned (base order first); minLength is
 * replaced when the extension sets one.
 */
export function mergeBoilerplateRules(
  base: BoilerplateRules,
  extension: BoilerplateExtension
): BoilerplateRules {
  return Object.freeze<BoilerplateRules>({
    ...base,
    minLength: extension.minLength ?? base.minLength,
    startsWith: union(base.startsWith, extension.startsWith),
    contains: union(base.contains, extension.contains),
    containsWords: union(base.containsWords, extension.containsWords),
  });
}
