/**
 * Task hierarchy node.
 *
 * Nodes form an intrusive tree: each node links itself into its parent's
 * {@link ChildCollection}. The parent reference is non-owning; a subtree stays
 * alive through its root, and a node detached by {@link TreeNode.consume} is
 * left for the garbage collector.
 *
 * @module core/node
 */

import { inspect } from "node:util";
import type { ILogObj, Logger } from "tslog";
import { defaultLogger, isDebugEnabled } from "../logging/logger.js";
import { ChildCollection, type TransientMember } from "./children.js";
import {
  type HierarchyFormatOptions,
  resolveHierarchyFormatOptions,
} from "./hierarchy-options.js";
import type { TaskHooks } from "./hooks.js";

/**
 * Options for creating a {@link TreeNode}.
 */
export interface TreeNodeOptions {
  /** Diagnostic label shown in descriptions and hierarchy dumps */
  annotation?: string | null;
  /**
   * Transient nodes do not keep their parent from being finished.
   * @default false
   */
  transient?: boolean;
  /** Task behaviour plugged in by composition */
  hooks?: TaskHooks;
  /** Logger; inherited from the initial parent when omitted */
  logger?: Logger<ILogObj>;
}

/**
 * Destination for {@link TreeNode.printHierarchy}: a function receiving each
 * line, or anything with a `write` method such as a Node writable stream,
 * which receives newline-terminated lines.
 */
export type HierarchyOutput = ((line: string) => void) | { write(chunk: string): unknown };

/** Called by {@link TreeNode.traverse} with each node and its level below the start. */
export type TreeVisitor = (node: TreeNode, level: number) => void;

let objectIdCounter = 0;

const nodeLogger = defaultLogger.getSubLogger({ name: "node" });

/**
 * A node in the task hierarchy.
 *
 * A concrete task either subclasses `TreeNode` and overrides {@link stop},
 * {@link isStopped} and {@link backtrace}, or passes {@link TaskHooks} at
 * construction. {@link consume} and {@link terminate} reach other nodes through
 * their own methods, so overrides of those apply across the tree.
 *
 * @example
 * ```typescript
 * const root = new TreeNode(null, { annotation: "reactor" });
 * const worker = new TreeNode(root, { annotation: "worker" });
 * const heartbeat = new TreeNode(root, { annotation: "heartbeat", transient: true });
 *
 * root.isFinished(); // false: worker is outstanding
 *
 * worker.consume();  // worker is finished, so it leaves the tree
 * root.isFinished(); // true: only the transient heartbeat remains
 * ```
 */
export class TreeNode implements TransientMember<TreeNode> {
  /** @internal */
  prev: TreeNode | null = null;
  /** @internal */
  next: TreeNode | null = null;

  readonly transient: boolean;
  readonly logger: Logger<ILogObj>;
  protected readonly hooks: TaskHooks;

  private parentNode: TreeNode | null = null;
  private childList: ChildCollection<TreeNode> | null = null;
  private currentAnnotation: string | null;
  private objectName: string | undefined;
  private readonly objectId = ++objectIdCounter;

  constructor(parent: TreeNode | null = null, options: TreeNodeOptions = {}) {
    this.currentAnnotation = options.annotation ?? null;
    this.transient = options.transient ?? false;
    this.hooks = options.hooks ?? {};
    this.logger = options.logger ?? parent?.logger ?? nodeLogger;

    if (parent) {
      parent.addChild(this);
    }
  }

  /** The parent node, or `null` for a root. */
  get parent(): TreeNode | null {
    return this.parentNode;
  }

  /** The children collection, or `null` if no child was ever attached (or it was consumed). */
  get children(): ChildCollection<TreeNode> | null {
    return this.childList;
  }

  /** Diagnostic label, if any. */
  get annotation(): string | null {
    return this.currentAnnotation;
  }

  /** The topmost ancestor. */
  get root(): TreeNode {
    let node: TreeNode = this;
    while (node.parentNode) {
      node = node.parentNode;
    }
    return node;
  }

  /** Whether at least one child is attached. */
  hasChildren(): boolean {
    return this.childList !== null && !this.childList.isEmpty();
  }

  /**
   * Whether no non-transient child is attached. Transient children may remain.
   */
  isFinished(): boolean {
    return this.childList === null || this.childList.isFinished();
  }

  /**
   * Set the annotation, or set it only for the duration of `body`.
   *
   * With a body, the previous annotation is restored when the body returns or
   * throws, and the body's result is returned. Use {@link annotateAsync} for
   * asynchronous bodies.
   */
  annotate(annotation: string | null): void;
  annotate<T>(annotation: string | null, body: () => T): T;
  annotate<T>(annotation: string | null, body?: () => T): T | undefined {
    if (!body) {
      this.currentAnnotation = annotation;
      return undefined;
    }

    const previous = this.currentAnnotation;
    this.currentAnnotation = annotation;
    try {
      return body();
    } finally {
      this.currentAnnotation = previous;
    }
  }

  /**
   * Set the annotation until the promise returned by `body` settles.
   */
  async annotateAsync<T>(annotation: string | null, body: () => Promise<T>): Promise<T> {
    const previous = this.currentAnnotation;
    this.currentAnnotation = annotation;
    try {
      return await body();
    } finally {
      this.currentAnnotation = previous;
    }
  }

  /**
   * Move this node under `parent`, or detach it when `parent` is `null`.
   * Does nothing if `parent` is already the parent.
   */
  setParent(parent: TreeNode | null): this {
    if (this.parentNode === parent) {
      return this;
    }

    if (this.parentNode) {
      this.parentNode.deleteChild(this);
    }

    if (parent) {
      parent.addChild(this);
    }

    return this;
  }

  protected addChild(child: TreeNode): void {
    this.childList ??= new ChildCollection<TreeNode>();
    this.childList.insert(child);
    child.parentNode = this;
  }

  protected deleteChild(child: TreeNode): void {
    this.childList?.delete(child);
    child.parentNode = null;
  }

  /**
   * Remove this node from the tree if it is finished.
   *
   * Its finished children are dropped with it and its unfinished children
   * move up to the former parent. The former parent is then consumed in turn,
   * so a chain of finished ancestors collapses in one call.
   */
  consume(): void {
    const parent = this.parentNode;
    if (!parent || !this.isFinished()) {
      return;
    }

    parent.deleteChild(this);

    const children = this.childList;
    if (children) {
      for (const child of children.each()) {
        this.deleteChild(child);

        if (!child.isFinished()) {
          parent.addChild(child);
        }
      }

      this.childList = null;
    }

    if (isDebugEnabled(this.logger)) {
      this.logger.debug("Consumed finished node", {
        node: this.description,
        parent: parent.description,
      });
    }

    parent.consume();
  }

  /**
   * Depth-first, pre-order walk starting at this node.
   *
   * A node's children are read after the visitor returns for it, and are
   * iterated with the list's mutation-tolerant cursor, so the visitor may
   * detach the node it was given.
   */
  traverse(visitor: TreeVisitor): void {
    visitor(this, 0);

    const stack: Array<{ cursor: Iterator<TreeNode>; level: number }> = [];
    if (this.childList) {
      stack.push({ cursor: this.childList.each(), level: 1 });
    }

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const step = frame.cursor.next();

      if (step.done) {
        stack.pop();
        continue;
      }

      const child = step.value;
      visitor(child, frame.level);

      if (child.childList) {
        stack.push({ cursor: child.childList.each(), level: frame.level + 1 });
      }
    }
  }

  /**
   * Stop this node immediately, then terminate every child, transient ones
   * included. Every node of the subtree receives `stop(false)` in pre-order.
   */
  terminate(): void {
    if (isDebugEnabled(this.logger)) {
      this.logger.debug("Terminating subtree", { node: this.description });
    }

    this.stop(false);

    if (!this.childList) return;

    for (const child of this.childList.each()) {
      child.terminate();
    }
  }

  /**
   * Stop this node and its non-transient children.
   *
   * Without a `stop` hook this only cascades to the children. `later` is a
   * hint that stopping may be deferred; it is passed along unchanged.
   */
  stop(later = false): void {
    if (this.hooks.stop) {
      this.hooks.stop(this, later, () => this.stopChildren(later));
    } else {
      this.stopChildren(later);
    }
  }

  protected stopChildren(later: boolean): void {
    if (!this.childList) return;

    for (const child of this.childList.each()) {
      if (!child.transient) {
        child.stop(later);
      }
    }
  }

  /**
   * Whether this node has stopped. Defaults to "has no children collection".
   */
  isStopped(): boolean {
    return this.hooks.isStopped ? this.hooks.isStopped(this) : this.childList === null;
  }

  /**
   * Call-site lines for diagnostics, innermost first. None by default.
   */
  backtrace(from = 0, length?: number): string[] | undefined {
    return this.hooks.backtrace?.(this, from, length);
  }

  /**
   * Stable identifier followed by the annotation, or by the first backtrace
   * line when there is no annotation.
   */
  get description(): string {
    if (this.objectName === undefined) {
      const id = this.objectId.toString(16).padStart(16, "0");
      this.objectName = `${this.constructor.name}:0x${id}${this.transient ? " transient" : ""}`;
    }

    if (this.currentAnnotation !== null) {
      return `${this.objectName} ${this.currentAnnotation}`;
    }

    const line = this.backtrace(0, 1)?.[0];
    return line === undefined ? this.objectName : `${this.objectName} ${line}`;
  }

  toString(): string {
    return `#<${this.description}>`;
  }

  [inspect.custom](): string {
    return this.toString();
  }

  /**
   * Render the subtree, one line per node, indented by level.
   */
  formatHierarchy(options?: HierarchyFormatOptions): string[] {
    const { indent, backtrace } = resolveHierarchyFormatOptions(options);
    const lines: string[] = [];

    this.traverse((node, level) => {
      const prefix = indent.repeat(level);
      lines.push(`${prefix}${node}`);

      if (backtrace) {
        node.backtrace()?.forEach((line, index) => {
          lines.push(`${prefix}${index === 0 ? "→ " : "  "}${line}`);
        });
      }
    });

    return lines;
  }

  /**
   * Write {@link formatHierarchy} to `output`.
   */
  printHierarchy(output: HierarchyOutput = process.stdout, options?: HierarchyFormatOptions): void {
    for (const line of this.formatHierarchy(options)) {
      if (typeof output === "function") {
        output(line);
      } else {
        output.write(`${line}\n`);
      }
    }
  }
}
