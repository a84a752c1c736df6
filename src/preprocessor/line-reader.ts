import { createReadStream } from "fs";
import type { Readable } from "stream";

import { InputIOError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

/**
 * Source name for standard input
 */
export const STDIN_SOURCE = "-";

const STDIN_LABEL = "<stdin>";

/**
 * Byte-transparent decoding for input sources: every byte maps to one
 * character and back, so passthrough lines keep their exact bytes
 */
export const SOURCE_ENCODING: BufferEncoding = "latin1";

/**
 * One input line with its position
 */
export interface SourceLine {
  /** Line text including its terminator, if it had one */
  text: string;
  /** Source name: file path or "<stdin>" */
  source: string;
  /** 1-based line number within the source */
  line: number;
  /** Encoding that turns `text` back into the source's bytes; UTF-8 when absent */
  encoding?: BufferEncoding;
}

/**
 * Splits a stream of text chunks into lines, keeping each terminator
 */
export class LineSplitter {
  private pending = "";

  /**
   * Feed a chunk; returns the lines it completes
   */
  push(chunk: string): string[] {
    const lines: string[] = [];
    let text = this.pending + chunk;
    let newline = text.indexOf("\n");

    while (newline !== -1) {
      lines.push(text.slice(0, newline + 1));
      text = text.slice(newline + 1);
      newline = text.indexOf("\n");
    }

    this.pending = text;
    return lines;
  }

  /**
   * Trailing text without a terminator, if any
   */
  flush(): string | undefined {
    const rest = this.pending;
    this.pending = "";
    return rest.length > 0 ? rest : undefined;
  }
}

/**
 * Split a complete text into lines, keeping terminators
 */
export function splitLines(text: string): string[] {
  const splitter = new LineSplitter();
  const lines = splitter.push(text);
  const rest = splitter.flush();
  if (rest !== undefined) {
    lines.push(rest);
  }
  return lines;
}

/**
 * Lines of an in-memory text, positioned as one source
 */
export function* textLines(text: string, source: string = "<text>"): Generator<SourceLine, void, undefined> {
  let line = 0;
  for (const chunk of splitLines(text)) {
    line++;
    yield { text: chunk, source, line };
  }
}

function openSource(source: string): { label: string; stream: Readable; owned: boolean } {
  if (source === STDIN_SOURCE) {
    process.stdin.setEncoding(SOURCE_ENCODING);
    return { label: STDIN_LABEL, stream: process.stdin, owned: false };
  }
  return { label: source, stream: createReadStream(source, { encoding: SOURCE_ENCODING }), owned: true };
}

async function* readOne(source: string): AsyncGenerator<SourceLine, void, undefined> {
  const { label, stream, owned } = openSource(source);
  const splitter = new LineSplitter();
  let line = 0;

  logger.debug(`Reading ${label}`);
  try {
    const iterator = stream[Symbol.asyncIterator]();
    for (;;) {
      let next: IteratorResult<unknown>;
      try {
        next = await iterator.next();
      } catch (cause) {
        throw new InputIOError(label, cause);
      }
      if (next.done === true) break;

      const chunk = typeof next.value === "string" ? next.value : String(next.value);
      for (const text of splitter.push(chunk)) {
        line++;
        yield { text, source: label, line, encoding: SOURCE_ENCODING };
      }
    }

    const rest = splitter.flush();
    if (rest !== undefined) {
      line++;
      yield { text: rest, source: label, line, encoding: SOURCE_ENCODING };
    }
  } finally {
    if (owned) {
      stream.destroy();
    }
  }
}

/**
 * Read the given sources in order as one stream of lines.
 *
 * A source is a file path, or "-" for standard input; no sources means
 * standard input. A source that cannot be opened or read fails with
 * InputIOError before any of its lines are yielded.
 */
export async function* readSourceLines(sources: readonly string[]): AsyncGenerator<SourceLine, void, undefined> {
  const targets = sources.length > 0 ? sources : [STDIN_SOURCE];
  for (const source of targets) {
    yield* readOne(source);
  }
}
