import path from "node:path";
import type { Action, ExecutionResult, OnEvent } from "./types.js";
import { ExecutionError } from "./errors.js";
import { type FileSystemBackend, nodeFileSystem } from "./fs-backend.js";

export type ExecuteOptions = {
  dryRun: boolean;
  backend?: FileSystemBackend;
  onEvent?: OnEvent;
};

async function performAction(
  action: Action,
  index: number,
  backend: FileSystemBackend,
  onEvent?: OnEvent,
): Promise<void> {
  const destDir = path.dirname(action.dest_path);
  try {
    await backend.createDirAll(destDir);
  } catch (err) {
    throw new ExecutionError("DirectoryCreateFailed", index, action, destDir, err);
  }
  onEvent?.({ type: "action.dir_ready", index, path: destDir });

  // File is already where the rule puts it; removing the "source" would delete it
  if (path.resolve(action.source_path) === path.resolve(action.dest_path)) {
    return;
  }

  try {
    await backend.copy(action.source_path, action.dest_path);
  } catch (err) {
    throw new ExecutionError("CopyFailed", index, action, action.dest_path, err);
  }

  if (action.kind === "move") {
    // Source goes only after its copy is in place
    try {
      await backend.remove(action.source_path);
    } catch (err) {
      throw new ExecutionError("DeleteFailed", index, action, action.source_path, err);
    }
  }
}

/**
 * Run actions strictly in order. The first failure stops the run; actions
 * that already completed are left as they are.
 */
export async function executeActions(
  actions: readonly Action[],
  options: ExecuteOptions,
): Promise<ExecutionResult> {
  const { dryRun, onEvent } = options;
  const backend = options.backend ?? nodeFileSystem;
  const total = actions.length;

  for (let i = 0; i < total; i++) {
    const action = actions[i];

    if (dryRun) {
      onEvent?.({ type: "action.skipped", index: i, total, action });
      continue;
    }

    try {
      await performAction(action, i, backend, onEvent);
    } catch (err) {
      if (!(err instanceof ExecutionError)) {
        throw err;
      }
      onEvent?.({ type: "run.failed", error: err, completed: i });
      return { ok: false, error: err, completed: i, lastCompletedIndex: i - 1 };
    }

    onEvent?.({ type: "action.performed", index: i, total, action });
  }

  return { ok: true, completed: dryRun ? 0 : total, dryRun };
}
