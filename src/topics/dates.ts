/**
 * Filename date resolution.
 *
 * Source files are named `{month}-{year}-{suffix}.json`, with the month
 * written in French (`mars-2025-expression-orale.json`). The resolved
 * (year, month) pair is the only ordering signal the organizer has.
 */

/**
 * Sortable key derived from a filename. `{ year: 0, month: 0 }` marks a
 * filename that could not be resolved and sorts last.
 */
export interface FileDateKey {
  readonly year: number;
  readonly month: number;
}

export const UNKNOWN_FILE_DATE: FileDateKey = Object.freeze({ year: 0, month: 0 });

const MONTH_NAMES = [
  "janvier",
  "février",
  "mars",
  "avril",
  "mai",
  "juin",
  "juillet",
  "août",
  "septembre",
  "octobre",
  "novembre",
  "décembre",
] as const;

function stripDiacritics(value: string): string {
  return value.normalize("NFD").replace(/[\u0300-\u036f]/g, "");
}

/**
 * Month lexicon: every spelling, with and without accents, mapped to its
 * calendar position (1-12).
 */
export const FRENCH_MONTHS: ReadonlyMap<string, number> = (() => {
  const lexicon = new Map<string, number>();
  MONTH_NAMES.forEach((name, index) => {
    lexicon.set(name, index + 1);
    lexicon.set(stripDiacritics(name), index + 1);
  });
  return lexicon;
})();

/**
 * Look up a month token (any case, accented or not).
 */
export function resolveMonth(token: string): number | undefined {
  const lowered = token.trim().toLowerCase();
  return FRENCH_MONTHS.get(lowered) ?? FRENCH_MONTHS.get(stripDiacritics(lowered));
}

function resolveYear(token: string): number | undefined {
  if (/^\d{4}$/.test(token)) {
    return parseInt(token, 10);
  }
  if (/^\d{2}$/.test(token)) {
    return 2000 + parseInt(token, 10);
  }
  return undefined;
}

/**
 * Resolve the (year, month) key of a source filename.
 * Never throws: anything unrecognized yields UNKNOWN_FILE_DATE.
 *
 * @example
 *   resolveFileDate("mars-2025-expression-orale.json")  // { year: 2025, month: 3 }
 *   resolveFileDate("Août-24-expression-ecrite.json")   // { year: 2024, month: 8 }
 *   resolveFileDate("notes.json")                       // { year: 0, month: 0 }
 */
export function resolveFileDate(filename: string): FileDateKey {
  const base = filename.replace(/\.json$/i, "");
  const [monthToken, yearToken, ...suffix] = base.split("-");

  if (monthToken === undefined || yearToken === undefined || suffix.length === 0) {
    return UNKNOWN_FILE_DATE;
  }

  const month = resolveMonth(monthToken);
  const year = resolveYear(yearToken);
  if (month === undefined || year === undefined) {
    return UNKNOWN_FILE_DATE;
  }

  return { year, month };
}

/**
 * Comparator placing the newest key first.
 */
export function compareFileDatesDesc(a: FileDateKey, b: FileDateKey): number {
  return b.year - a.year || b.month - a.month;
}

/**
 * Sort filenames newest first. Files with the same key keep their input
 * order.
 */
export function sortFilesByDate(filenames: readonly string[]): string[] {
  return filenames
    .map((name) => ({ name, key: resolveFileDate(name) }))
    .sort((a, b) => compareFileDatesDesc(a.key, b.key))
    .map(({ name }) => name);
}

/**
 * Human-readable form of a key, e.g. "Mars 2025".
 */
export function formatFileDate(key: FileDateKey): string {
  const name = MONTH_NAMES[key.month - 1];
  if (name === undefined || key.year === 0) {
    return "unknown";
  }
  return `${name.charAt(0).toUpperCase()}${name.slice(1)} ${key.year}`;
}
