/**
 * Extension points through which a concrete task type plugs its own
 * execution state into a {@link TreeNode}.
 *
 * @module core/hooks
 */

import type { TreeNode } from "./node.js";

/**
 * Hooks supplied by a concrete task type. Every hook is optional; the node
 * falls back to its structural default for any hook that is missing.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 *
 * const task = new TreeNode(parent, {
 *   annotation: "fetching feed",
 *   hooks: {
 *     stop(node, later, stopChildren) {
 *       stopChildren();
 *       if (later) queueMicrotask(() => controller.abort());
 *       else controller.abort();
 *     },
 *     isStopped: () => controller.signal.aborted,
 *   },
 * });
 * ```
 */
export interface TaskHooks {
  /**
   * Stop the task.
   *
   * `stopChildren` performs the default cascade onto the non-transient
   * children. The hook decides whether and when to call it.
   */
  stop?(node: TreeNode, later: boolean, stopChildren: () => void): void;

  /**
   * Whether the task has stopped. Replaces the default "has no children
   * collection" check.
   */
  isStopped?(node: TreeNode): boolean;

  /**
   * Captured call-site lines for diagnostics, innermost first.
   */
  backtrace?(node: TreeNode, from: number, length: number | undefined): string[] | undefined;
}
