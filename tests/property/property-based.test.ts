/**
 * Property-based tests using fast-check.
 *
 * These tests generate random inputs to find edge cases
 * that might be missed by example-based tests.
 */

import * as fc from "fast-check";
import { describe, it, expect } from "vitest";

import { compareNatural } from "@/catalogs/renderers.js";
import { DirectiveRegistry, DirectiveResolver } from "@/directives/registry.js";
import { matchDirective } from "@/directives/matcher.js";
import { Preprocessor } from "@/preprocessor/driver.js";
import { splitLines, textLines } from "@/preprocessor/line-reader.js";
import { MemorySink } from "@tests/fixtures/catalogs.js";

const upper = fc.constantFrom(..."ABCDEFGHIJKLMNOPQRSTUVWXYZ".split(""));
const upperWord = fc.array(upper, { minLength: 1, maxLength: 8 }).map((chars) => chars.join(""));
const classArb = fc.array(upperWord, { minLength: 1, maxLength: 3 }).map((words) => words.join("_"));

// Lines that never contain '@' cannot be directives
const plainLineArb = fc
  .string({ maxLength: 60 })
  .filter((s) => !s.includes("@") && !s.includes("\n"))
  .chain((body) => fc.constantFrom(body, `${body}\n`, `${body}\r\n`, `${body}  \n`));

/**
 * Registry where every class renders its kind as "CLASS:kind:n" lines
 */
function echoResolver(classes: string[], kinds: string[]): DirectiveResolver {
  const registry = new DirectiveRegistry();
  for (const className of classes) {
    const table = Object.fromEntries(kinds.map((kind) => [kind, `${className}:${kind}`]));
    registry.register(className, table, (label: string) => [`${label}:1`, `${label}:2`]);
  }
  return new DirectiveResolver(registry);
}

async function run(resolver: DirectiveResolver, input: string): Promise<string> {
  const output = new MemorySink();
  await new Preprocessor(resolver).process(textLines(input), output);
  return output.text;
}

describe("Property-based tests", () => {
  describe("matchDirective", () => {
    it("recognizes any well-formed directive", () => {
      fc.assert(
        fc.property(classArb, upperWord, (className, kind) => {
          const directive = matchDirective(`@${className}_${kind}@\n`);
          expect(directive).toBeDefined();
          expect(directive?.kindKey).toBe(kind.toLowerCase());
          expect(`${directive?.className}_${directive?.kind}`).toBe(`${className}_${kind}`);
        })
      );
    });

    it("never throws on arbitrary input", () => {
      fc.assert(
        fc.property(fc.string(), (line) => {
          matchDirective(line);
        })
      );
    });

    it("rejects any directive with trailing text", () => {
      fc.assert(
        fc.property(classArb, upperWord, fc.string({ minLength: 1 }).filter((s) => !/^\r?\n$/.test(s)), (c, k, tail) => {
          expect(matchDirective(`@${c}_${k}@${tail}`)).toBeUndefined();
        })
      );
    });
  });

  describe("splitLines", () => {
    it("joins back to the original text", () => {
      fc.assert(
        fc.property(fc.string(), (text) => {
          expect(splitLines(text).join("")).toBe(text);
        })
      );
    });
  });

  describe("Preprocessor", () => {
    const resolver = echoResolver(["CONSTANTS", "QUERY_FIELDS"], ["doc", "node"]);

    it("passes non-directive text through byte for byte", async () => {
      await fc.assert(
        fc.asyncProperty(fc.array(plainLineArb, { maxLength: 20 }), async (lines) => {
          const input = lines.join("");
          expect(await run(resolver, input)).toBe(input);
        })
      );
    });

    it("keeps plain lines and expansions in input order", async () => {
      const directiveArb = fc.constantFrom(
        "@CONSTANTS_DOC@",
        "@CONSTANTS_NODE@",
        "@QUERY_FIELDS_DOC@",
        "@QUERY_FIELDS_NODE@"
      );
      const itemArb = fc.oneof(
        directiveArb.map((text) => ({ text, directive: true })),
        fc.stringMatching(/^[a-z ]{0,20}$/).map((text) => ({ text, directive: false }))
      );

      await fc.assert(
        fc.asyncProperty(fc.array(itemArb, { maxLength: 15 }), async (items) => {
          const input = items.map((item) => `${item.text}\n`).join("");
          const expected = items
            .map((item) => {
              const directive = item.directive ? matchDirective(item.text) : undefined;
              if (directive === undefined) return `${item.text}\n`;
              const label = `${directive.className}:${directive.kindKey}`;
              return `${label}:1\n${label}:2\n`;
            })
            .join("");
          expect(await run(resolver, input)).toBe(expected);
        })
      );
    });

    it("renders the same input the same way every time", async () => {
      await fc.assert(
        fc.asyncProperty(fc.array(fc.constantFrom("@CONSTANTS_DOC@\n", "text\n"), { maxLength: 10 }), async (lines) => {
          const input = lines.join("");
          expect(await run(resolver, input)).toBe(await run(resolver, input));
        })
      );
    });
  });

  describe("compareNatural", () => {
    it("is antisymmetric", () => {
      fc.assert(
        fc.property(fc.string(), fc.string(), (a, b) => {
          expect(Math.sign(compareNatural(a, b)) + Math.sign(compareNatural(b, a))).toBe(0);
        })
      );
    });
  });
});
