/**
 * Catalog renderers
 *
 * Both render reStructuredText definition lists: a ``term`` line followed by
 * its definition indented by two spaces. A definition must fit on one line.
 */

import type { Constant, QueryField } from "./schema/index.js";

const DEFINITION_INDENT = "  ";

/**
 * Compare strings with digit runs ordered by numeric value:
 * `disk.size/2` sorts before `disk.size/10`
 */
export function compareNatural(a: string, b: string): number {
  const left = splitDigitRuns(a);
  const right = splitDigitRuns(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i] ?? "";
    const y = right[i] ?? "";
    if (x === y) continue;

    const xIsNumber = /^\d/.test(x);
    const yIsNumber = /^\d/.test(y);
    if (xIsNumber && yIsNumber) {
      const diff = compareDigitRuns(x, y);
      if (diff !== 0) return diff;
      // Same value, different zero padding
      return x.length - y.length;
    }
    return x < y ? -1 : 1;
  }

  return left.length - right.length;
}

/**
 * Compare digit runs by value at any length
 */
function compareDigitRuns(x: string, y: string): number {
  const a = x.replace(/^0+/, "");
  const b = y.replace(/^0+/, "");
  if (a.length !== b.length) return a.length - b.length;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function splitDigitRuns(value: string): string[] {
  return value.match(/\d+|\D+/g) ?? [];
}

/**
 * Sort by name in natural order, without mutating the input
 */
export function niceSort<T>(items: readonly T[], key: (item: T) => string): T[] {
  return [...items].sort((a, b) => compareNatural(key(a), key(b)));
}

function singleLine(text: string, owner: string): string {
  if (/[\r\n]/.test(text)) {
    throw new Error(`Documentation for '${owner}' must be a single line`);
  }
  return text;
}

/**
 * Term/definition pairs as definition list lines
 */
export function* renderDefinitionList(
  entries: Iterable<readonly [term: string, definition: string]>
): Generator<string, void, undefined> {
  for (const [term, definition] of entries) {
    yield `\`\`${term}\`\``;
    yield `${DEFINITION_INDENT}${singleLine(definition, term)}`;
  }
}

/**
 * Render constants in declared order
 */
export function* renderConstants(constants: readonly Constant[]): Generator<string, void, undefined> {
  yield* renderDefinitionList(
    constants.map((constant): [string, string] => {
      const value = `\`\`${String(constant.value)}\`\``;
      return [constant.name, constant.doc === undefined ? value : `${constant.doc} (value: ${value})`];
    })
  );
}

/**
 * Render query fields sorted by name
 */
export function* renderQueryFields(fields: readonly QueryField[]): Generator<string, void, undefined> {
  yield* renderDefinitionList(
    niceSort(fields, (field) => field.name).map((field): [string, string] => [field.name, field.doc])
  );
}
