/**
 * End-to-end scenarios for the task hierarchy: a scheduler stopping,
 * terminating and reclaiming trees of recorded tasks.
 */

import { ChildCollection, type TransientMember, TreeNode } from "tasktree";
import { beforeEach, describe, expect, it } from "vitest";
import { LineSink } from "./line-sink.js";
import { StopRecorder } from "./stop-recorder.js";
import { buildTree } from "./tree-builder.js";

describe("stop and terminate cascades", () => {
  let recorder: StopRecorder;

  beforeEach(() => {
    recorder = new StopRecorder();
  });

  it("stop reaches the regular child but not the transient one", () => {
    const tree = buildTree(
      { name: "R", children: [{ name: "A" }, { name: "B", transient: true }] },
      { hooks: recorder.hooks() },
    );

    tree.root.stop(false);

    expect(recorder.wasStopped(tree.get("A"))).toBe(true);
    expect(recorder.wasStopped(tree.get("B"))).toBe(false);
  });

  it("terminate reaches both children", () => {
    const tree = buildTree(
      { name: "R", children: [{ name: "A" }, { name: "B", transient: true }] },
      { hooks: recorder.hooks({ cascade: false }) },
    );

    tree.root.terminate();

    expect(recorder.names()).toEqual(["R", "A", "B"]);
    expect(recorder.calls.every((call) => call.later === false)).toBe(true);
  });

  it("stop skips a transient subtree entirely", () => {
    const tree = buildTree(
      {
        name: "R",
        children: [
          { name: "worker", children: [{ name: "worker-io" }] },
          { name: "monitor", transient: true, children: [{ name: "monitor-probe" }] },
        ],
      },
      { hooks: recorder.hooks() },
    );

    tree.root.stop(true);

    expect(recorder.names()).toEqual(["R", "worker", "worker-io"]);
    expect(tree.get("monitor-probe").isStopped()).toBe(false);
  });

  it("tasks that complete on stop leave only the transient ones behind", () => {
    const tree = buildTree(
      {
        name: "R",
        children: [{ name: "A" }, { name: "B", transient: true }, { name: "C" }],
      },
      {
        hooks: (shape) => (shape.name === "R" ? undefined : recorder.hooks({ consumeOnStop: true })),
      },
    );

    tree.root.stop();

    expect(recorder.names()).toEqual(["A", "C"]);
    expect(tree.childNames("R")).toEqual(["B"]);
    expect(tree.root.isFinished()).toBe(true);
  });

  it("terminate tolerates every task consuming itself", () => {
    const tree = buildTree(
      {
        name: "R",
        children: [
          { name: "A", children: [{ name: "A1" }] },
          { name: "B", transient: true },
        ],
      },
      {
        hooks: (shape) =>
          shape.name === "R" ? undefined : recorder.hooks({ cascade: false, consumeOnStop: true }),
      },
    );

    tree.root.terminate();

    // R has no hook, so its default stop reaches A once before terminate visits A.
    // A is not finished while A1 is pending; A1 consuming itself collapses A too.
    expect(recorder.names()).toEqual(["A", "A", "A1", "B"]);
    expect(tree.root.hasChildren()).toBe(false);
  });
});

describe("consume", () => {
  it("collapses a finished chain up to the root", () => {
    const tree = buildTree({ name: "R", children: [{ name: "X", children: [{ name: "Y" }] }] });

    tree.get("Y").consume();

    expect(tree.parentName("Y")).toBeNull();
    expect(tree.parentName("X")).toBeNull();
    expect(tree.childNames("R")).toEqual([]);
    expect(tree.outline()).toEqual(["R"]);
  });

  it("promotes pending work when an intermediate node finishes", () => {
    const tree = buildTree({
      name: "G",
      children: [
        { name: "sibling" },
        {
          name: "P",
          children: [
            { name: "C1", transient: true },
            { name: "C2", transient: true, children: [{ name: "C2-io" }] },
          ],
        },
      ],
    });

    tree.get("P").consume();

    expect(tree.outline()).toEqual(["G", "  sibling", "  C2*", "    C2-io"]);
    expect(tree.parentName("C1")).toBeNull();
  });

  it("keeps a node whose own work is pending", () => {
    const tree = buildTree({
      name: "R",
      children: [{ name: "P", children: [{ name: "C" }] }],
    });

    tree.get("P").consume();

    expect(tree.outline()).toEqual(["R", "  P", "    C"]);
  });
});

describe("printHierarchy", () => {
  it("prints the tree with backtraces to a stream-like sink", () => {
    const tree = buildTree(
      {
        name: "reactor",
        children: [{ name: "server", children: [{ name: "connection", transient: true }] }],
      },
      {
        hooks: (shape) =>
          shape.name === "server" ? { backtrace: () => ["server.ts:12", "main.ts:4"] } : undefined,
      },
    );
    const sink = new LineSink();

    tree.root.printHierarchy(sink);

    const server = tree.get("server");
    const connection = tree.get("connection");
    expect(sink.lines).toEqual([
      `#<${tree.root.description}>`,
      `\t#<${server.description}>`,
      "\t→ server.ts:12",
      "\t  main.ts:4",
      `\t\t#<${connection.description}>`,
    ]);
    expect(connection.description).toMatch(/^TreeNode:0x[0-9a-f]{16} transient connection$/);
  });
});

describe("list invariants under random operations", () => {
  class Member implements TransientMember<Member> {
    prev: Member | null = null;
    next: Member | null = null;

    constructor(
      readonly id: number,
      readonly transient: boolean,
    ) {}
  }

  // Park-Miller generator, deterministic per seed
  function random(seed: number): () => number {
    let state = seed;
    return () => {
      state = (state * 48_271) % 2_147_483_647;
      return state / 2_147_483_647;
    };
  }

  it("keeps size and transient count equal to what traversal finds", () => {
    const next = random(7);
    const collection = new ChildCollection<Member>();
    const present: Member[] = [];
    let id = 0;

    for (let step = 0; step < 500; step++) {
      if (present.length === 0 || next() < 0.55) {
        const member = new Member(id++, next() < 0.4);
        collection.insert(member);
        present.push(member);
      } else {
        const [member] = present.splice(Math.floor(next() * present.length), 1);
        collection.delete(member);
      }

      const traversed = collection.toArray().map((member) => member.id);
      expect(traversed).toEqual(present.map((member) => member.id));
      expect(collection.size).toBe(present.length);
      expect(collection.transientCount).toBe(present.filter((member) => member.transient).length);
      expect(collection.isFinished()).toBe(present.every((member) => member.transient));
    }
  });

  it("visits every member once while the body deletes members at random", () => {
    const next = random(11);
    const collection = new ChildCollection<Member>();
    const members = Array.from({ length: 40 }, (_, index) => new Member(index, index % 3 === 0));
    for (const member of members) {
      collection.insert(member);
    }

    const visited: number[] = [];
    const deletedUnvisited = new Set<number>();
    for (const member of collection.each()) {
      visited.push(member.id);

      if (next() < 0.3) {
        collection.delete(member);
      }

      // Sometimes drop a member further along
      const later = member.next;
      if (later && next() < 0.2) {
        collection.delete(later);
        deletedUnvisited.add(later.id);
      }
    }

    const expected = members.map((member) => member.id).filter((id) => !deletedUnvisited.has(id));
    expect(visited).toEqual(expected);
  });
});

describe("TreeNode subclasses", () => {
  it("work as a concrete task type through overrides", () => {
    const log: string[] = [];

    class Task extends TreeNode {
      private done = false;

      stop(later = false): void {
        super.stop(later);
        this.done = true;
        log.push(`stopped ${this.annotation}`);
      }

      isStopped(): boolean {
        return this.done;
      }
    }

    const tree = buildTree({ name: "outer" });
    const task = new Task(tree.root, { annotation: "job" });
    new Task(task, { annotation: "step" });

    task.stop();

    expect(log).toEqual(["stopped step", "stopped job"]);
    expect(task.isStopped()).toBe(true);
  });
});
