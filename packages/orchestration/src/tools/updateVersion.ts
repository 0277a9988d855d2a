/**
 * version_update - Validate and apply one version update.
 */

import * as z from "zod/v4";
import { andThen, resultToStructuredResponse, type ToolResponse } from "@stackwise/core";
import type { ToolRegistrar } from "./types.js";

interface UpdateVersionInput {
  project: string;
  version: string;
}

export const registerUpdateVersion: ToolRegistrar = (server, service) => {
  server.registerTool(
    "version_update",
    {
      title: "Update version",
      description:
        "Set a project's version after checking it against every registered constraint. Rejected updates change nothing.",
      inputSchema: {
        project: z.string().describe("Project name"),
        version: z.string().describe("New version, e.g. 1.4.0"),
      },
    },
    async (input: UpdateVersionInput): Promise<ToolResponse> => {
      const result = andThen(service.getCoordinator(), (coordinator) =>
        coordinator.updateVersion(input.project, input.version)
      );
      return resultToStructuredResponse(result, (update) => ({
        text:
          `Updated ${update.project}: ${update.oldVersion} -> ${update.newVersion}` +
          (update.affectedProjects.length > 0 ? `\nAffected: ${update.affectedProjects.join(", ")}` : ""),
        data: { ...update },
      }));
    }
  );
};
