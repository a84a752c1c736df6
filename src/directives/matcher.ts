/**
 * A directive line: `@CLASS_KIND@` and nothing else
 */
export interface Directive {
  /** Class token, uppercase with underscores: QUERY_FIELDS */
  className: string;
  /** Kind token as written: NODE */
  kind: string;
  /** Lower-cased kind, the data source lookup key: node */
  kindKey: string;
  /** Line text without its terminator */
  raw: string;
}

/**
 * Greedy class group, uppercase-only kind group.
 * The class takes everything up to the underscore before the trailing
 * uppercase run, so `@A__B@` splits into class `A_` and kind `B`.
 */
const DIRECTIVE_REGEX = /^@([A-Z_]+)_([A-Z]+)@$/;

/**
 * Remove exactly one trailing line terminator (`\r\n` or `\n`)
 */
export function stripTerminator(line: string): string {
  if (line.endsWith("\r\n")) {
    return line.slice(0, -2);
  }
  if (line.endsWith("\n")) {
    return line.slice(0, -1);
  }
  return line;
}

/**
 * Recognize a directive line.
 *
 * @param line Line text, with or without its terminator
 * @returns The directive, or undefined when the line is not exactly one
 */
export function matchDirective(line: string): Directive | undefined {
  const raw = stripTerminator(line);
  const match = DIRECTIVE_REGEX.exec(raw);
  if (match === null) {
    return undefined;
  }

  const className = match[1];
  const kind = match[2];
  if (className === undefined || kind === undefined) {
    return undefined;
  }

  return { className, kind, kindKey: kind.toLowerCase(), raw };
}

export function isDirective(line: string): boolean {
  return matchDirective(line) !== undefined;
}

/**
 * Build the marker text for a class and kind: `@CLASS_KIND@`
 */
export function formatDirective(className: string, kind: string): string {
  return `@${className}_${kind.toUpperCase()}@`;
}
