import { describe, it, expect } from "vitest";

import {
  matchDirective,
  isDirective,
  stripTerminator,
  formatDirective,
} from "@/directives/matcher.js";

describe("matchDirective", () => {
  it("matches a directive line and lower-cases the kind", () => {
    expect(matchDirective("@CONSTANTS_DOC@")).toEqual({
      className: "CONSTANTS",
      kind: "DOC",
      kindKey: "doc",
      raw: "@CONSTANTS_DOC@",
    });
  });

  it("ignores one trailing newline", () => {
    expect(matchDirective("@CONSTANTS_DOC@\n")?.raw).toBe("@CONSTANTS_DOC@");
  });

  it("ignores one trailing CRLF", () => {
    expect(matchDirective("@CONSTANTS_DOC@\r\n")?.kindKey).toBe("doc");
  });

  it("does not ignore a second terminator", () => {
    expect(matchDirective("@CONSTANTS_DOC@\n\n")).toBeUndefined();
  });

  it("keeps underscores in the class", () => {
    const directive = matchDirective("@QUERY_FIELDS_NODE@");
    expect(directive?.className).toBe("QUERY_FIELDS");
    expect(directive?.kind).toBe("NODE");
  });

  it("splits at the underscore before the trailing uppercase run", () => {
    const directive = matchDirective("@A__B@");
    expect(directive?.className).toBe("A_");
    expect(directive?.kind).toBe("B");
  });

  it("allows a class made of one underscore", () => {
    expect(matchDirective("@__B@")?.className).toBe("_");
  });

  it.each([
    ["lowercase", "@constants_doc@"],
    ["mixed case", "@Constants_DOC@"],
    ["trailing text", "@CONSTANTS_DOC@ extra"],
    ["leading text", "see @CONSTANTS_DOC@"],
    ["leading whitespace", " @CONSTANTS_DOC@"],
    ["trailing space", "@CONSTANTS_DOC@ \n"],
    ["no underscore", "@CONSTANTS@"],
    ["kind with underscore only", "@CONSTANTS_@"],
    ["digits in kind", "@CONSTANTS_DOC2@"],
    ["two directives", "@CONSTANTS_DOC@@CONSTANTS_DOC@"],
    ["missing closing marker", "@CONSTANTS_DOC"],
    ["empty line", ""],
    ["plain text", "hello world"],
  ])("rejects %s", (_label, line) => {
    expect(matchDirective(line)).toBeUndefined();
  });
});

describe("isDirective", () => {
  it("is case sensitive", () => {
    expect(isDirective("@CONSTANTS_DOC@")).toBe(true);
    expect(isDirective("@constants_doc@")).toBe(false);
  });
});

describe("stripTerminator", () => {
  it("removes exactly one terminator", () => {
    expect(stripTerminator("a\n")).toBe("a");
    expect(stripTerminator("a\r\n")).toBe("a");
    expect(stripTerminator("a\n\n")).toBe("a\n");
    expect(stripTerminator("a")).toBe("a");
  });
});

describe("formatDirective", () => {
  it("builds the marker from class and kind key", () => {
    expect(formatDirective("QUERY_FIELDS", "node")).toBe("@QUERY_FIELDS_NODE@");
  });

  it("produces lines the matcher accepts", () => {
    const directive = matchDirective(formatDirective("CONSTANTS", "hypervisor"));
    expect(directive?.kindKey).toBe("hypervisor");
  });
});
