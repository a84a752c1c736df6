import { describe, it, expect, beforeEach } from "vitest";

import { DirectiveRegistry, DirectiveResolver, TableSource } from "@/directives/registry.js";
import { matchDirective } from "@/directives/matcher.js";
import { RenderError, UnknownClassError, UnknownKindError } from "@/lib/errors.js";
import { createTestRegistry } from "@tests/fixtures/catalogs.js";

import type { RenderableSource } from "@/directives/registry.js";

describe("TableSource", () => {
  it("reads a plain object table", () => {
    const source = new TableSource({ doc: ["a"], api: ["b"] }, (lines: string[]) => lines);
    expect(source.kinds()).toEqual(["doc", "api"]);
    expect(source.hasKind("doc")).toBe(true);
    expect(source.hasKind("DOC")).toBe(false);
    expect([...source.render("api")]).toEqual(["b"]);
  });

  it("reads a Map table", () => {
    const table = new Map([["doc", 3]]);
    const source = new TableSource(table, (count: number) => Array.from({ length: count }, (_, i) => `line ${i}`));
    expect([...source.render("doc")]).toEqual(["line 0", "line 1", "line 2"]);
  });

  it("keeps a copy of the table", () => {
    const table = new Map([["doc", ["a"]]]);
    const source = new TableSource(table, (lines: string[]) => lines);
    table.set("later", ["b"]);
    expect(source.hasKind("later")).toBe(false);
  });

  it("throws for a missing kind", () => {
    const source = new TableSource({ doc: ["a"] }, (lines: string[]) => lines);
    expect(() => source.render("api")).toThrow("No record set for kind 'api'");
  });
});

describe("DirectiveRegistry", () => {
  let registry: DirectiveRegistry;

  beforeEach(() => {
    registry = new DirectiveRegistry();
  });

  it("registers classes", () => {
    registry.register("QUERY_FIELDS", { node: ["x"] }, (lines: string[]) => lines);
    registry.register("CONSTANTS", { doc: ["y"] }, (lines: string[]) => lines);

    expect(registry.size).toBe(2);
    expect(registry.has("CONSTANTS")).toBe(true);
    expect(registry.classes()).toEqual(["CONSTANTS", "QUERY_FIELDS"]);
  });

  it("replaces a class registered twice", () => {
    registry.register("CONSTANTS", { doc: ["first"] }, (lines: string[]) => lines);
    registry.register("CONSTANTS", { doc: ["second"] }, (lines: string[]) => lines);

    expect(registry.size).toBe(1);
    const resolver = new DirectiveResolver(registry);
    expect([...resolver.resolveAndRender("CONSTANTS", "doc")]).toEqual(["second"]);
  });

  it("accepts any RenderableSource", () => {
    const source: RenderableSource = {
      hasKind: (kind) => kind === "all",
      kinds: () => ["all"],
      render: () => ["rendered"],
    };
    registry.registerSource("CUSTOM", source);
    expect(registry.get("CUSTOM")).toBe(source);
  });
});

describe("DirectiveResolver", () => {
  it("renders the record set unchanged and in order", () => {
    const resolver = new DirectiveResolver(createTestRegistry());
    expect([...resolver.resolveAndRender("CONSTANTS", "doc")]).toEqual(["# Constants", "FOO = 1"]);
  });

  it("renders a matched directive", () => {
    const resolver = new DirectiveResolver(createTestRegistry());
    const directive = matchDirective("@CONSTANTS_DOC@\n");
    expect(directive).toBeDefined();
    if (directive) {
      expect([...resolver.render(directive)]).toEqual(["# Constants", "FOO = 1"]);
    }
  });

  it("gives the same output on every resolution", () => {
    const resolver = new DirectiveResolver(createTestRegistry());
    const first = [...resolver.resolveAndRender("CONSTANTS", "doc")];
    const second = [...resolver.resolveAndRender("CONSTANTS", "doc")];
    expect(second).toEqual(first);
  });

  it("fails with UnknownClassError for an unregistered class", () => {
    const resolver = new DirectiveResolver(createTestRegistry());
    expect(() => resolver.resolveAndRender("UNKNOWN", "doc")).toThrow(UnknownClassError);
  });

  it("fails with UnknownKindError for a missing kind", () => {
    const resolver = new DirectiveResolver(createTestRegistry());
    expect(() => resolver.resolveAndRender("CONSTANTS", "bar")).toThrow(UnknownKindError);
  });

  it("attaches the location to lookup failures", () => {
    const resolver = new DirectiveResolver(createTestRegistry());
    try {
      resolver.resolveAndRender("CONSTANTS", "bar", { source: "guide.rst", line: 12 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownKindError);
      if (error instanceof UnknownKindError) {
        expect(error.message).toBe("Unknown kind 'bar' for directive class CONSTANTS (guide.rst:12)");
        expect(error.context).toEqual({ className: "CONSTANTS", kind: "bar", source: "guide.rst", line: 12 });
      }
    }
  });

  it("ignores registrations made after construction", () => {
    const registry = createTestRegistry();
    const resolver = new DirectiveResolver(registry);
    registry.register("LATE", { doc: ["x"] }, (lines: string[]) => lines);

    expect(() => resolver.resolveAndRender("LATE", "doc")).toThrow(UnknownClassError);
  });

  it("wraps a failing render function in RenderError", () => {
    const registry = new DirectiveRegistry().register("BROKEN", { doc: 1 }, () => {
      throw new Error("table is corrupt");
    });
    const resolver = new DirectiveResolver(registry);

    const output = resolver.resolveAndRender("BROKEN", "doc");
    expect(() => [...output]).toThrow(RenderError);
  });

  it("wraps a failure raised while iterating the rendered lines", () => {
    const cause = new Error("bad record");
    const registry = new DirectiveRegistry().register("LAZY", { doc: ["ok"] }, function* (lines: string[]) {
      yield* lines;
      throw cause;
    });
    const resolver = new DirectiveResolver(registry);

    const seen: string[] = [];
    try {
      for (const line of resolver.resolveAndRender("LAZY", "doc", { source: "a.rst", line: 3 })) {
        seen.push(line);
      }
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RenderError);
      if (error instanceof RenderError) {
        expect(error.cause).toBe(cause);
        expect(error.message).toBe("Failed to render LAZY/doc (a.rst:3): bad record");
      }
    }
    expect(seen).toEqual(["ok"]);
  });

  it("checks class and kind before rendering anything", () => {
    let calls = 0;
    const registry = new DirectiveRegistry().register("COUNTED", { doc: ["x"] }, (lines: string[]) => {
      calls++;
      return lines;
    });
    const resolver = new DirectiveResolver(registry);

    expect(() => resolver.resolveAndRender("COUNTED", "api")).toThrow(UnknownKindError);
    expect(calls).toBe(0);
  });
});
