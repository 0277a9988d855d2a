/**
 * workspace_load - Load a workspace definition file.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse, type ToolResponse } from "@stackwise/core";
import type { ToolRegistrar } from "./types.js";
import { DEFAULT_WORKSPACE_FILE } from "../infrastructure/WorkspaceLoader.js";

interface LoadWorkspaceInput {
  path?: string;
}

export const registerLoadWorkspace: ToolRegistrar = (server, service) => {
  server.registerTool(
    "workspace_load",
    {
      title: "Load workspace",
      description: `Load a JSON workspace definition (projects, dependencies, rules).
Replaces the currently loaded workspace only if the new one is valid.`,
      inputSchema: {
        path: z
          .string()
          .optional()
          .describe(`Path to the workspace file (default: ${DEFAULT_WORKSPACE_FILE})`),
      },
    },
    async (input: LoadWorkspaceInput): Promise<ToolResponse> => {
      const result = await service.load(input.path ?? DEFAULT_WORKSPACE_FILE);
      return resultToStructuredResponse(result, (summary) => ({
        text:
          `Loaded workspace ${summary.root}: ${summary.projects} projects, ` +
          `${summary.dependencies} dependencies, ${summary.constraints} constraints`,
        data: { ...summary },
      }));
    }
  );
};
