/**
 * Deduplication of one file's records.
 *
 * Two records are duplicates when their content is identical and they
 * share a group key. Keys never span files: the same prompt recurring in
 * another month's file is kept.
 */

import type { OralTopicRecord, WrittenTopicRecord } from "../types/topic.js";

export interface DedupeResult<R> {
  /** First occurrences, in input order */
  records: R[];
  /** Later occurrences that were dropped */
  duplicates: R[];
}

/**
 * Oral records group by task and part.
 */
export function oralGroupKey(record: OralTopicRecord): string {
  return `${record.task}:${record.part}`;
}

/**
 * Written records group by task.
 */
export function writtenGroupKey(record: WrittenTopicRecord): string {
  return record.task;
}

/**
 * Drop records whose content already appeared under the same group key.
 */
export function dedupeRecords<R extends { readonly content: string }>(
  records: readonly R[],
  groupKey: (record: R) => string
): DedupeResult<R> {
  const seen = new Map<string, Set<string>>();
  const result: DedupeResult<R> = { records: [], duplicates: [] };

  for (const record of records) {
    const key = groupKey(record);
    let contents = seen.get(key);
    if (!contents) {
      contents = new Set();
      seen.set(key, contents);
    }

    if (contents.has(record.content)) {
      result.duplicates.push(record);
    } else {
      contents.add(record.content);
      result.records.push(record);
    }
  }

  return result;
}
