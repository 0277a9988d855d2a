/**
 * workspace_set_status - Record a project's health status.
 */

import * as z from "zod/v4";
import { andThen, resultToStructuredResponse, type ToolResponse } from "@stackwise/core";
import type { ProjectStatus } from "../core/model.js";
import type { ToolRegistrar } from "./types.js";

interface SetStatusInput {
  project: string;
  status: ProjectStatus;
}

export const registerSetStatus: ToolRegistrar = (server, service) => {
  server.registerTool(
    "workspace_set_status",
    {
      title: "Set project status",
      description: "Mark a project healthy, warning, critical or unknown. workspace_status reports the change.",
      inputSchema: {
        project: z.string().describe("Project name"),
        status: z.enum(["healthy", "warning", "critical", "unknown"]).describe("New status"),
      },
    },
    async (input: SetStatusInput): Promise<ToolResponse> => {
      const result = andThen(service.getGraph(), (graph) => graph.setProjectStatus(input.project, input.status));
      return resultToStructuredResponse(result, () => ({
        text: `${input.project} is now ${input.status}`,
        data: { project: input.project, status: input.status },
      }));
    }
  );
};
