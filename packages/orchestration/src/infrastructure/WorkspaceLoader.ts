/**
 * Workspace file loading.
 * Reads a JSON workspace definition and validates it into a Workspace snapshot.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Err, tryCatch, tryCatchAsync, type Result } from "@stackwise/core";
import type { Workspace } from "../core/model.js";
import { parseWorkspace } from "../core/WorkspaceConfig.js";
import { invalidConfiguration, type OrchestrationError } from "../core/errors.js";

export const DEFAULT_WORKSPACE_FILE = "stackwise.workspace.json";

export async function loadWorkspaceFile(filePath: string): Promise<Result<Workspace, OrchestrationError>> {
  const absolute = resolve(filePath);

  const content = await tryCatchAsync(() => readFile(absolute, "utf-8"));
  if (!content.ok) {
    return Err(invalidConfiguration(`cannot read ${absolute}: ${content.error.message}`));
  }

  const json = tryCatch((): unknown => JSON.parse(content.value));
  if (!json.ok) {
    return Err(invalidConfiguration(`malformed JSON in ${absolute}: ${json.error.message}`));
  }

  return parseWorkspace(json.value);
}
