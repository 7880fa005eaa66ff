/**
 * Options for rendering a node hierarchy as text.
 *
 * @module core/hierarchy-options
 */

import * as z from "zod";
import { InvalidOptionsError } from "./errors.js";

/**
 * Schema for hierarchy formatting options. Missing fields take their defaults.
 */
export const hierarchyFormatOptionsSchema = z.object({
  /** Repeated once per level of depth in front of each node line. */
  indent: z.string().default("\t"),
  /** Whether to print each node's backtrace below it. */
  backtrace: z.boolean().default(true),
});

/**
 * Hierarchy formatting options as accepted by `formatHierarchy` and `printHierarchy`.
 *
 * @example
 * ```typescript
 * root.printHierarchy(process.stderr, { indent: "  ", backtrace: false });
 * ```
 */
export type HierarchyFormatOptions = z.input<typeof hierarchyFormatOptionsSchema>;

/**
 * Hierarchy formatting options with all defaults applied.
 */
export type ResolvedHierarchyFormatOptions = z.output<typeof hierarchyFormatOptionsSchema>;

/**
 * Default hierarchy formatting: tab indentation, backtraces included.
 */
export const DEFAULT_HIERARCHY_FORMAT_OPTIONS: ResolvedHierarchyFormatOptions = {
  indent: "\t",
  backtrace: true,
};

/**
 * Validates hierarchy formatting options and applies defaults.
 *
 * @throws InvalidOptionsError when a field has the wrong type
 */
export function resolveHierarchyFormatOptions(
  options?: HierarchyFormatOptions,
): ResolvedHierarchyFormatOptions {
  if (!options) {
    return { ...DEFAULT_HIERARCHY_FORMAT_OPTIONS };
  }

  const result = hierarchyFormatOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new InvalidOptionsError("hierarchy format options", z.prettifyError(result.error));
  }

  return result.data;
}
