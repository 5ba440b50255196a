/**
 * Topic record definitions.
 * A record is one cleaned exam prompt, attributed to the file it came from.
 */

export type OralTaskId = "task2" | "task3";
export type WrittenTaskId = "task1" | "task2" | "task3";
export type TaskId = OralTaskId | WrittenTaskId;

export interface TopicRecordBase<T extends TaskId = TaskId> {
  /** Cleaned prompt text, never shorter than the cleaner's minimum */
  readonly content: string;
  /** Page the file was scraped from; "" when the file does not say */
  readonly sourceUrl: string;
  /** Name of the file the record was extracted from */
  readonly sourceFile: string;
  readonly task: T;
}

export interface OralTopicRecord extends TopicRecordBase<OralTaskId> {
  readonly kind: "oral";
  /** Part label as written in the source, e.g. "partie_2" */
  readonly part: string;
  /** Trailing digits of the part label, 0 when it has none */
  readonly partNumber: number;
}

export interface WrittenTopicRecord extends TopicRecordBase<WrittenTaskId> {
  readonly kind: "written";
  /** Target length range, e.g. "120-150" */
  readonly wordCount: string;
  readonly typeLabel: string;
  /** Supporting documents of an argumentative prompt */
  readonly documents?: readonly string[];
  readonly combination?: string;
}

export type TopicRecord = OralTopicRecord | WrittenTopicRecord;
