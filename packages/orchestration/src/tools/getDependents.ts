/**
 * workspace_get_dependents - Projects that depend on a project.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse, type ToolResponse } from "@stackwise/core";
import { formatProjectList, type ToolRegistrar } from "./types.js";

interface GetDependentsInput {
  project: string;
  transitive?: boolean;
}

export const registerGetDependents: ToolRegistrar = (server, service) => {
  server.registerTool(
    "workspace_get_dependents",
    {
      title: "Get dependents",
      description:
        "List the projects that depend on a project. With transitive=true this is the set a change would affect.",
      inputSchema: {
        project: z.string().describe("Project name"),
        transitive: z.boolean().optional().describe("Follow edges transitively (default: false)"),
      },
    },
    async (input: GetDependentsInput): Promise<ToolResponse> => {
      const graph = service.getGraph();
      return resultToStructuredResponse(graph, (g) => {
        const projects = input.transitive
          ? g.getTransitiveDependents(input.project)
          : g.getDependents(input.project);
        return {
          text: formatProjectList(`Dependents of ${input.project}`, projects),
          data: { project: input.project, dependents: projects },
        };
      });
    }
  );
};
