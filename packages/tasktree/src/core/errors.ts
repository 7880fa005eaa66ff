/**
 * Error types for tasktree.
 *
 * Everything here signals a programming error in the caller. Nothing is
 * expected to fail transiently, so there is no retry classification.
 */

/**
 * Base class for all errors raised by tasktree itself.
 */
export class TaskTreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TaskTreeError";
  }
}

/**
 * Thrown when an intrusive list is asked to insert an item that is already
 * linked, or to delete an item that is not linked where its slots say it is.
 *
 * @example
 * ```typescript
 * const list = new IntrusiveList<Item>();
 * list.insert(item);
 *
 * try {
 *   list.insert(item);
 * } catch (error) {
 *   if (error instanceof ListMembershipError) {
 *     console.log(error.operation); // "insert"
 *   }
 * }
 * ```
 */
export class ListMembershipError extends TaskTreeError {
  public readonly operation: "insert" | "delete";

  constructor(operation: "insert" | "delete") {
    super(
      operation === "insert"
        ? "Cannot insert an item that is already linked into a list"
        : "Cannot delete an item that is not a member of this list",
    );
    this.name = "ListMembershipError";
    this.operation = operation;
  }
}

/**
 * Thrown when hierarchy format options fail validation.
 */
export class InvalidOptionsError extends TaskTreeError {
  public readonly details: string;

  constructor(subject: string, details: string) {
    super(`Invalid ${subject}:\n${details}`);
    this.name = "InvalidOptionsError";
    this.details = details;
  }
}
