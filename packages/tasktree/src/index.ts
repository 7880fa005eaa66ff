// Intrusive list and child bookkeeping
export type { ListLinks } from "./core/list.js";
export { IntrusiveList } from "./core/list.js";
export type { TransientMember } from "./core/children.js";
export { ChildCollection } from "./core/children.js";

// Task hierarchy
export type { HierarchyOutput, TreeNodeOptions, TreeVisitor } from "./core/node.js";
export { TreeNode } from "./core/node.js";
export type { TaskHooks } from "./core/hooks.js";

// Hierarchy formatting options
export type {
  HierarchyFormatOptions,
  ResolvedHierarchyFormatOptions,
} from "./core/hierarchy-options.js";
export {
  DEFAULT_HIERARCHY_FORMAT_OPTIONS,
  hierarchyFormatOptionsSchema,
  resolveHierarchyFormatOptions,
} from "./core/hierarchy-options.js";

// Errors
export { InvalidOptionsError, ListMembershipError, TaskTreeError } from "./core/errors.js";

// Logging
export type { LoggerOptions } from "./logging/logger.js";
export { createLogger, defaultLogger, isDebugEnabled } from "./logging/logger.js";
