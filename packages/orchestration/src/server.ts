#!/usr/bin/env node
/**
 * MCP server for workspace orchestration.
 * Loads the workspace file from the current directory when one is present.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import { runServer } from "@stackwise/core";
import { WorkspaceService } from "./WorkspaceService.js";
import { DEFAULT_WORKSPACE_FILE } from "./infrastructure/WorkspaceLoader.js";
import { registerAllTools, type Services } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "stackwise:orchestration",
    version: "0.1.0",
  },
  createServices: () => ({
    workspace: new WorkspaceService(),
  }),
  registerTools: registerAllTools,
  onStartup: async (services) => {
    const file = join(process.cwd(), DEFAULT_WORKSPACE_FILE);
    if (!existsSync(file)) {
      console.error(`[orchestration] No ${DEFAULT_WORKSPACE_FILE} in ${process.cwd()}; waiting for workspace_load`);
      return;
    }

    const result = await services.workspace.load(file);
    if (!result.ok) {
      console.error(`[orchestration] Warning: workspace not loaded: ${result.error.message}`);
    }
  },
});
