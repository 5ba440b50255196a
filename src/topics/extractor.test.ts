/**
 * Tests for record extraction and in-file deduplication.
 *
 * Run: node --import tsx src/topics/extractor.test.ts
 */

import { strict as assert } from "node:assert";

import {
  DocumentShapeError,
  extractTopics,
  parseSourceDocument,
  partNumberOf,
} from "./extractor.js";
import { dedupeRecords, oralGroupKey, writtenGroupKey } from "./dedupe.js";
import { ORAL_PIPELINE, WRITTEN_PIPELINE } from "./pipelines.js";
import type { OralTopicRecord, WrittenTopicRecord } from "../types/topic.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const ORAL_FILE = "mars-2025-expression-orale.json";
const WRITTEN_FILE = "mars-2025-expression-ecrite.json";

const ORAL_DOCUMENT = {
  source_url: "https://example.com/sujets/mars",
  topics: {
    tache_2: {
      partie_1: ["  Vous invitez un ami à découvrir votre ville.  ", "Nos Contacts", 42],
      partie_2: "not a list",
    },
    tache_3: {
      partie_1: ["Partie 1: Faut-il interdire les voitures en centre-ville ?"],
    },
  },
};

const WRITTEN_DOCUMENT = {
  source_url: "https://example.com/sujets/ecrit",
  topics: {
    tache_1: ["Écrivez un message à votre voisin pour l'inviter."],
    tache_2: [
      {
        content: "Rédigez un article sur les transports en commun.",
        word_count: 150,
        combination: "Combinaison 4",
        documents: ["ignored for this task"],
      },
    ],
    tache_3: [
      {
        content: "Les réseaux sociaux rapprochent-ils les gens ?",
        documents: ["Document A texte", 7, "Document B texte"],
      },
      { content: "ok", documents: ["short"] },
      { documents: ["no content"] },
      5,
    ],
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// DOCUMENT SHAPE
// ═══════════════════════════════════════════════════════════════════════════

section("Document Shape");

test("arrays are not documents", () => {
  assert.throws(() => parseSourceDocument([]), DocumentShapeError);
});

test("topics must be an object", () => {
  assert.throws(
    () => extractTopics({ topics: ["a"] }, ORAL_FILE, ORAL_PIPELINE),
    (err: unknown) => err instanceof DocumentShapeError && err.issues.length > 0
  );
});

test("a non-string source_url is dropped", () => {
  const result = extractTopics(
    { source_url: 5, topics: { tache_2: { partie_1: ["Vous invitez un ami à découvrir votre ville."] } } },
    ORAL_FILE,
    ORAL_PIPELINE
  );
  assert.equal(result.records[0]?.sourceUrl, "");
});

test("a document without topics yields nothing", () => {
  const result = extractTopics({}, ORAL_FILE, ORAL_PIPELINE);
  assert.deepEqual(result, { records: [], issues: [], rejections: [] });
});

// ═══════════════════════════════════════════════════════════════════════════
// ORAL EXTRACTION
// ═══════════════════════════════════════════════════════════════════════════

section("Oral Extraction");

test("part numbers come from trailing digits", () => {
  assert.equal(partNumberOf("partie_3"), 3);
  assert.equal(partNumberOf("Partie 12"), 12);
  assert.equal(partNumberOf("bonus"), 0);
});

test("valid prompts become records in extraction order", () => {
  const result = extractTopics(ORAL_DOCUMENT, ORAL_FILE, ORAL_PIPELINE);
  const expected: OralTopicRecord[] = [
    {
      kind: "oral",
      content: "Vous invitez un ami à découvrir votre ville.",
      sourceUrl: "https://example.com/sujets/mars",
      sourceFile: ORAL_FILE,
      task: "task2",
      part: "partie_1",
      partNumber: 1,
    },
    {
      kind: "oral",
      content: "Faut-il interdire les voitures en centre-ville ?",
      sourceUrl: "https://example.com/sujets/mars",
      sourceFile: ORAL_FILE,
      task: "task3",
      part: "partie_1",
      partNumber: 1,
    },
  ];
  assert.deepEqual(result.records, expected);
});

test("malformed values are reported with their location", () => {
  const result = extractTopics(ORAL_DOCUMENT, ORAL_FILE, ORAL_PIPELINE);
  assert.deepEqual(result.issues, [
    {
      file: ORAL_FILE,
      task: "task2",
      location: "tache_2.partie_1[2]",
      message: "expected a string, got number",
    },
    {
      file: ORAL_FILE,
      task: "task2",
      location: "tache_2.partie_2",
      message: "expected a list of prompts, got string",
    },
  ]);
});

test("boilerplate is a rejection, not an issue", () => {
  const result = extractTopics(ORAL_DOCUMENT, ORAL_FILE, ORAL_PIPELINE);
  assert.deepEqual(result.rejections, [
    {
      file: ORAL_FILE,
      task: "task2",
      location: "tache_2.partie_1[1]",
      reason: "boilerplate",
      detail: 'starts with "Nos Contacts"',
    },
  ]);
});

test("a task that is not an object of parts is an issue", () => {
  const result = extractTopics({ topics: { tache_3: ["a list"] } }, ORAL_FILE, ORAL_PIPELINE);
  assert.equal(result.records.length, 0);
  assert.deepEqual(result.issues, [
    {
      file: ORAL_FILE,
      task: "task3",
      location: "tache_3",
      message: "expected an object of parts, got array",
    },
  ]);
});

test("keys outside the task table are ignored", () => {
  const result = extractTopics(
    { topics: { tache_1: { partie_1: ["Une consigne de la tâche un."] } } },
    ORAL_FILE,
    ORAL_PIPELINE
  );
  assert.deepEqual(result, { records: [], issues: [], rejections: [] });
});

// ═══════════════════════════════════════════════════════════════════════════
// WRITTEN EXTRACTION
// ═══════════════════════════════════════════════════════════════════════════

section("Written Extraction");

test("a bare string is an entry with task defaults", () => {
  const result = extractTopics(WRITTEN_DOCUMENT, WRITTEN_FILE, WRITTEN_PIPELINE);
  const expected: WrittenTopicRecord = {
    kind: "written",
    content: "Écrivez un message à votre voisin pour l'inviter.",
    sourceUrl: "https://example.com/sujets/ecrit",
    sourceFile: WRITTEN_FILE,
    task: "task1",
    wordCount: "60-120",
    typeLabel: "message_personnel",
  };
  assert.deepEqual(result.records[0], expected);
});

test("entry fields override defaults and documents need a documents task", () => {
  const result = extractTopics(WRITTEN_DOCUMENT, WRITTEN_FILE, WRITTEN_PIPELINE);
  const expected: WrittenTopicRecord = {
    kind: "written",
    content: "Rédigez un article sur les transports en commun.",
    sourceUrl: "https://example.com/sujets/ecrit",
    sourceFile: WRITTEN_FILE,
    task: "task2",
    wordCount: "150",
    typeLabel: "article_blog",
    combination: "Combinaison 4",
  };
  assert.deepEqual(result.records[1], expected);
});

test("task 3 keeps string documents only", () => {
  const result = extractTopics(WRITTEN_DOCUMENT, WRITTEN_FILE, WRITTEN_PIPELINE);
  const record = result.records[2];
  assert.equal(record?.task, "task3");
  assert.equal(record?.wordCount, "120-180");
  assert.equal(record?.typeLabel, "texte_argumentatif");
  assert.deepEqual(record?.documents, ["Document A texte", "Document B texte"]);
  assert.equal(result.records.length, 3);
});

test("short task 3 content is rejected without failing the document", () => {
  const result = extractTopics(WRITTEN_DOCUMENT, WRITTEN_FILE, WRITTEN_PIPELINE);
  assert.deepEqual(result.rejections, [
    {
      file: WRITTEN_FILE,
      task: "task3",
      location: "tache_3[1].content",
      reason: "too_short",
      detail: "2 < 20",
    },
  ]);
});

test("entries without usable content are issues", () => {
  const result = extractTopics(WRITTEN_DOCUMENT, WRITTEN_FILE, WRITTEN_PIPELINE);
  assert.deepEqual(result.issues, [
    {
      file: WRITTEN_FILE,
      task: "task3",
      location: "tache_3[0].documents[1]",
      message: "expected a string, got number",
    },
    { file: WRITTEN_FILE, task: "task3", location: "tache_3[2].content", message: "missing content" },
    {
      file: WRITTEN_FILE,
      task: "task3",
      location: "tache_3[3]",
      message: "expected an entry object or string, got number",
    },
  ]);
});

test("a non-string content is an issue", () => {
  const result = extractTopics(
    { topics: { tache_1: [{ content: ["list"] }] } },
    WRITTEN_FILE,
    WRITTEN_PIPELINE
  );
  assert.deepEqual(result.issues, [
    {
      file: WRITTEN_FILE,
      task: "task1",
      location: "tache_1[0].content",
      message: "expected a string, got array",
    },
  ]);
});

test("an empty documents list is left out", () => {
  const result = extractTopics(
    { topics: { tache_3: [{ content: "Le télétravail est-il un progrès ?", documents: [] }] } },
    WRITTEN_FILE,
    WRITTEN_PIPELINE
  );
  assert.equal(result.records.length, 1);
  assert.equal(result.records[0]?.documents, undefined);
  assert.equal("documents" in (result.records[0] ?? {}), false);
});

test("documents that are not strings are reported with their index", () => {
  const result = extractTopics(
    {
      topics: {
        tache_3: [
          {
            content: "Le télétravail est-il un progrès pour tous ?",
            documents: ["Doc A", 42, null, "Doc B"],
          },
          { content: "Les musées devraient-ils être gratuits ?", documents: "Doc seul" },
        ],
      },
    },
    WRITTEN_FILE,
    WRITTEN_PIPELINE
  );
  assert.deepEqual(
    result.records.map((record) => record.documents),
    [["Doc A", "Doc B"], undefined]
  );
  assert.deepEqual(result.issues, [
    {
      file: WRITTEN_FILE,
      task: "task3",
      location: "tache_3[0].documents[1]",
      message: "expected a string, got number",
    },
    {
      file: WRITTEN_FILE,
      task: "task3",
      location: "tache_3[0].documents[2]",
      message: "expected a string, got null",
    },
    {
      file: WRITTEN_FILE,
      task: "task3",
      location: "tache_3[1].documents",
      message: "expected a list of documents, got string",
    },
  ]);
});

test("unusable word counts and combinations are reported and left out", () => {
  const result = extractTopics(
    {
      topics: {
        tache_2: [
          {
            content: "Rédigez un article sur les transports en commun.",
            word_count: { min: 120 },
            combination: ["Combinaison 1"],
          },
        ],
      },
    },
    WRITTEN_FILE,
    WRITTEN_PIPELINE
  );
  assert.equal(result.records[0]?.wordCount, "120-150");
  assert.equal(result.records[0]?.combination, undefined);
  assert.deepEqual(result.issues, [
    {
      file: WRITTEN_FILE,
      task: "task2",
      location: "tache_2[0].word_count",
      message: "expected a string or number, got object",
    },
    {
      file: WRITTEN_FILE,
      task: "task2",
      location: "tache_2[0].combination",
      message: "expected a string or number, got array",
    },
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// DEDUPLICATION
// ═══════════════════════════════════════════════════════════════════════════

section("Deduplication");

function oral(content: string, part: string, task: "task2" | "task3" = "task2"): OralTopicRecord {
  return {
    kind: "oral",
    content,
    sourceUrl: "",
    sourceFile: ORAL_FILE,
    task,
    part,
    partNumber: partNumberOf(part),
  };
}

test("repeated content in one part keeps the first occurrence", () => {
  const first = oral("Vous invitez un ami à découvrir votre ville.", "partie_1");
  const second = oral("Vous cherchez un colocataire pour votre appartement.", "partie_1");
  const repeat = oral("Vous invitez un ami à découvrir votre ville.", "partie_1");
  const result = dedupeRecords([first, second, repeat], oralGroupKey);
  assert.deepEqual(result.records, [first, second]);
  assert.deepEqual(result.duplicates, [repeat]);
});

test("the same content in another part or task is kept", () => {
  const content = "Vous invitez un ami à découvrir votre ville.";
  const result = dedupeRecords(
    [oral(content, "partie_1"), oral(content, "partie_2"), oral(content, "partie_1", "task3")],
    oralGroupKey
  );
  assert.equal(result.records.length, 3);
  assert.equal(result.duplicates.length, 0);
});

test("written records group by task", () => {
  const base: WrittenTopicRecord = {
    kind: "written",
    content: "Rédigez un article sur les transports en commun.",
    sourceUrl: "",
    sourceFile: WRITTEN_FILE,
    task: "task2",
    wordCount: "120-150",
    typeLabel: "article_blog",
  };
  const reworded: WrittenTopicRecord = { ...base, wordCount: "150" };
  const otherTask: WrittenTopicRecord = { ...base, task: "task3" };
  const result = dedupeRecords([base, reworded, otherTask], writtenGroupKey);
  assert.equal(result.records.length, 2);
  assert.equal(result.duplicates[0]?.wordCount, "150");
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
