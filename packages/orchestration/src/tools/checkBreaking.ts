/**
 * version_check_breaking - Classify a candidate version as breaking or not.
 */

import * as z from "zod/v4";
import { andThen, resultToStructuredResponse, type ToolResponse } from "@stackwise/core";
import type { ToolRegistrar } from "./types.js";

interface CheckBreakingInput {
  project: string;
  version: string;
}

export const registerCheckBreaking: ToolRegistrar = (server, service) => {
  server.registerTool(
    "version_check_breaking",
    {
      title: "Check breaking change",
      description: "A change is breaking when its major version differs from the current one.",
      inputSchema: {
        project: z.string().describe("Project name"),
        version: z.string().describe("Candidate version"),
      },
    },
    async (input: CheckBreakingInput): Promise<ToolResponse> => {
      const result = andThen(service.getCoordinator(), (coordinator) =>
        coordinator.isBreakingChange(input.project, input.version)
      );
      return resultToStructuredResponse(result, (breaking) => ({
        text: `${input.project} -> ${input.version}: ${breaking ? "breaking" : "not breaking"}`,
        data: { project: input.project, version: input.version, breaking },
      }));
    }
  );
};
