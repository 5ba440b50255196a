/**
 * Content cleaning: decides whether a scraped string is a topic and
 * normalizes its whitespace. Pure; identical input gives identical output.
 */

import type { BoilerplateRules } from "./boilerplate.js";

export type RejectionReason = "not_string" | "empty" | "too_short" | "boilerplate";

export type CleanResult =
  | { readonly ok: true; readonly content: string }
  | { readonly ok: false; readonly reason: RejectionReason; readonly detail?: string };

const PART_PREFIX = /^partie\s*\d+\s*[:\-–—]*\s*/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function wordPattern(word: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(word)}(?![\\p{L}\\p{N}])`, "iu");
}

function countOccurrences(content: string, term: string): number {
  return content.split(term).length - 1;
}

/**
 * Collapse whitespace runs to single spaces and trim.
 */
export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Find the first boilerplate rule the content breaks, if any.
 */
export function findBoilerplate(content: string, rules: BoilerplateRules): string | undefined {
  const prefix = rules.startsWith.find((candidate) => content.startsWith(candidate));
  if (prefix !== undefined) {
    return `starts with "${prefix}"`;
  }

  const fragment = rules.contains.find((candidate) => content.includes(candidate));
  if (fragment !== undefined) {
    return `contains "${fragment}"`;
  }

  const word = rules.containsWords.find((candidate) => wordPattern(candidate).test(content));
  if (word !== undefined) {
    return `contains the word "${word}"`;
  }

  for (const [term, max] of Object.entries(rules.repeatLimits)) {
    const count = countOccurrences(content, term);
    if (count > max) {
      return `"${term}" occurs ${count} times (max ${max})`;
    }
  }

  return undefined;
}

/**
 * Clean one scraped candidate.
 *
 * @example
 *   cleanTopicContent("  Vous   organisez une fête pour un ami.  ", rules)
 *   // { ok: true, content: "Vous organisez une fête pour un ami." }
 */
export function cleanTopicContent(raw: unknown, rules: BoilerplateRules): CleanResult {
  if (typeof raw !== "string") {
    return { ok: false, reason: "not_string" };
  }

  let content = normalizeWhitespace(raw);
  if (rules.stripPartPrefix) {
    content = content.replace(PART_PREFIX, "");
  }

  if (content === "") {
    return { ok: false, reason: "empty" };
  }

  const boilerplate = findBoilerplate(content, rules);
  if (boilerplate !== undefined) {
    return { ok: false, reason: "boilerplate", detail: boilerplate };
  }

  // Code points, so accented letters and emoji count once
  const length = [...content].length;
  if (length < rules.minLength) {
    return { ok: false, reason: "too_short", detail: `${length} < ${rules.minLength}` };
  }

  return { ok: true, content };
}
