/**
 * Directive recognition and resolution
 *
 * - Match `@CLASS_KIND@` lines
 * - Register class names against renderable data sources
 * - Resolve a directive to its rendered lines
 *
 * @example
 * ```typescript
 * import { DirectiveRegistry, DirectiveResolver, matchDirective } from "@/directives";
 *
 * const registry = new DirectiveRegistry().register("CONSTANTS", { doc: ["FOO = 1"] }, (lines) => lines);
 * const resolver = new DirectiveResolver(registry);
 *
 * const directive = matchDirective("@CONSTANTS_DOC@\n");
 * if (directive) {
 *   for (const line of resolver.render(directive)) console.log(line);
 * }
 * ```
 */

export {
  matchDirective,
  isDirective,
  stripTerminator,
  formatDirective,
  type Directive,
} from "./matcher.js";

export {
  DirectiveRegistry,
  DirectiveResolver,
  TableSource,
  type RenderableSource,
  type RenderFunction,
  type DataSource,
} from "./registry.js";
