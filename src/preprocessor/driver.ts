import { once } from "events";

import { matchDirective } from "../directives/matcher.js";
import { logger } from "../lib/logger.js";

import { readSourceLines } from "./line-reader.js";

import type { Writable } from "stream";
import type { DirectiveResolver } from "../directives/registry.js";
import type { SourceLine } from "./line-reader.js";

/**
 * Driver states: reading input, draining one directive's rendered lines,
 * finished
 */
export type PreprocessorState = "reading" | "emitting-replacement" | "done";

/**
 * Counts for one run
 */
export interface ProcessSummary {
  /** Input lines consumed */
  linesRead: number;
  /** Directives replaced by rendered lines */
  directivesExpanded: number;
  /** Output lines written, passthrough and rendered */
  linesWritten: number;
  /** Source names in the order they were first read */
  sources: string[];
}

/**
 * Terminator written after every rendered line
 */
const RENDERED_LINE_END = "\n";

const log = logger.child("[preprocess]");

async function write(output: Writable, chunk: string, encoding: BufferEncoding = "utf-8"): Promise<void> {
  // A failed stream never drains
  if (output.errored !== null) {
    throw output.errored;
  }
  if (!output.write(chunk, encoding)) {
    await once(output, "drain");
  }
}

/**
 * Streams lines to an output, replacing directive lines with the lines
 * their data source renders.
 *
 * @example
 * ```typescript
 * const preprocessor = new Preprocessor(resolver);
 * await preprocessor.process(readSourceLines(["guide.rst.in"]), process.stdout);
 * ```
 */
export class Preprocessor {
  private current: PreprocessorState = "reading";

  constructor(private readonly resolver: DirectiveResolver) {}

  get state(): PreprocessorState {
    return this.current;
  }

  /**
   * Process every line in order.
   *
   * Non-directive lines are written unchanged, terminator included, in the
   * encoding they were read with. Rendered lines are written as UTF-8. Each
   * directive's rendered lines are written, in order, before the next input
   * line is read. The first failure ends the run; output already written
   * stays written.
   */
  async process(
    lines: AsyncIterable<SourceLine> | Iterable<SourceLine>,
    output: Writable
  ): Promise<ProcessSummary> {
    const summary: ProcessSummary = {
      linesRead: 0,
      directivesExpanded: 0,
      linesWritten: 0,
      sources: [],
    };
    this.current = "reading";

    try {
      for await (const line of lines) {
        summary.linesRead++;
        if (!summary.sources.includes(line.source)) {
          summary.sources.push(line.source);
        }

        const directive = matchDirective(line.text);
        if (directive === undefined) {
          await write(output, line.text, line.encoding);
          summary.linesWritten++;
          continue;
        }

        this.current = "emitting-replacement";
        log.debug(`${line.source}:${line.line} expanding ${directive.raw}`);

        const rendered = this.resolver.render(directive, { source: line.source, line: line.line });
        for (const text of rendered) {
          await write(output, text + RENDERED_LINE_END);
          summary.linesWritten++;
        }

        summary.directivesExpanded++;
        this.current = "reading";
      }
    } finally {
      this.current = "done";
    }

    return summary;
  }
}

/**
 * Read the given sources ("-" or none for standard input) and process them
 * as one stream
 */
export async function preprocessFiles(
  resolver: DirectiveResolver,
  sources: readonly string[],
  output: Writable
): Promise<ProcessSummary> {
  const preprocessor = new Preprocessor(resolver);
  return preprocessor.process(readSourceLines(sources), output);
}
