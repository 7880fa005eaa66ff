/**
 * Task hierarchy: building a tree, annotating work, traversal and printing
 *
 * Run: npx tsx examples/01-task-hierarchy.ts
 */

import { TreeNode } from "tasktree";

async function main() {
  console.log("=== Task Hierarchy ===\n");

  // ==========================================================================
  // Building the tree
  // ==========================================================================
  const reactor = new TreeNode(null, { annotation: "reactor" });
  const server = new TreeNode(reactor, { annotation: "http server" });
  new TreeNode(server, { annotation: "connection 1", transient: true });
  new TreeNode(server, { annotation: "connection 2", transient: true });
  const jobs = new TreeNode(reactor, { annotation: "job runner" });

  console.log("1. Hierarchy:");
  reactor.printHierarchy((line) => console.log(`   ${line}`));

  console.log("\n2. Server finished (only transient children):", server.isFinished());
  console.log("   Reactor finished:", reactor.isFinished());

  // ==========================================================================
  // Annotations around units of work
  // ==========================================================================
  console.log("\n3. Annotating work:");
  const total = jobs.annotate("summing batch", () => {
    console.log(`   during: ${jobs.annotation}`);
    return [1, 2, 3].reduce((sum, value) => sum + value, 0);
  });
  console.log(`   after: ${jobs.annotation} (result ${total})`);

  await jobs.annotateAsync("waiting for timer", async () => {
    console.log(`   during: ${jobs.annotation}`);
    await new Promise((resolve) => setTimeout(resolve, 10));
  });

  // ==========================================================================
  // Traversal with levels
  // ==========================================================================
  console.log("\n4. Traversal:");
  reactor.traverse((node, level) => {
    console.log(`   ${"  ".repeat(level)}${node.annotation ?? node.description}`);
  });

  // ==========================================================================
  // Re-parenting
  // ==========================================================================
  console.log("\n5. Moving the job runner under the server:");
  jobs.setParent(server);
  reactor.printHierarchy((line) => console.log(`   ${line}`), { indent: "  ", backtrace: false });

  console.log("\n=== Done ===");
}

main().catch(console.error);
