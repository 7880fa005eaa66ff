/**
 * Stopping and reclaiming tasks: hooks backed by AbortController,
 * deferred stops, consume and terminate
 *
 * Run: npx tsx examples/02-consume-and-terminate.ts
 */

import { createLogger, TreeNode, type TaskHooks } from "tasktree";

/**
 * Hooks that tie a node's lifetime to an AbortController. A deferred stop
 * aborts on the next microtask; the node consumes itself once aborted.
 */
function abortableHooks(controller: AbortController): TaskHooks {
  return {
    stop(node, later, stopChildren) {
      stopChildren();

      const abort = () => {
        controller.abort();
        node.consume();
      };

      if (later) {
        queueMicrotask(abort);
      } else {
        abort();
      }
    },
    isStopped: () => controller.signal.aborted,
  };
}

async function main() {
  console.log("=== Consume and Terminate ===\n");

  const logger = createLogger({ name: "scheduler", minLevel: 2 });
  const root = new TreeNode(null, { annotation: "scheduler", logger });

  const controllers = new Map<string, AbortController>();
  const spawn = (parent: TreeNode, annotation: string, transient = false) => {
    const controller = new AbortController();
    controllers.set(annotation, controller);
    return new TreeNode(parent, { annotation, transient, hooks: abortableHooks(controller) });
  };

  const download = spawn(root, "download");
  spawn(download, "chunk 1");
  spawn(download, "chunk 2");
  const watcher = spawn(root, "file watcher", true);

  // ==========================================================================
  // Deferred stop
  // ==========================================================================
  console.log("1. Deferred stop of the download:");
  download.stop(true);
  console.log(`   stopped right away: ${download.isStopped()}`);
  await Promise.resolve();
  await Promise.resolve();
  console.log(`   stopped after a tick: ${download.isStopped()}`);
  console.log(`   download still attached: ${download.parent !== null}`);

  // ==========================================================================
  // Stop skips transient children, terminate does not
  // ==========================================================================
  console.log("\n2. Remaining hierarchy:");
  root.printHierarchy((line) => console.log(`   ${line}`));

  console.log(`\n3. Root finished: ${root.isFinished()}`);
  root.stop();
  console.log(`   watcher stopped by stop(): ${watcher.isStopped()}`);

  root.terminate();
  console.log(`   watcher stopped by terminate(): ${watcher.isStopped()}`);
  console.log(`   root has children: ${root.hasChildren()}`);

  console.log("\n=== Done ===");
}

main().catch(console.error);
