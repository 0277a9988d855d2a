/**
 * workspace_get_dependencies - Projects a project depends on.
 */

import * as z from "zod/v4";
import { resultToStructuredResponse, type ToolResponse } from "@stackwise/core";
import { formatProjectList, type ToolRegistrar } from "./types.js";

interface GetDependenciesInput {
  project: string;
  transitive?: boolean;
}

export const registerGetDependencies: ToolRegistrar = (server, service) => {
  server.registerTool(
    "workspace_get_dependencies",
    {
      title: "Get dependencies",
      description: "List the projects a project depends on, directly or transitively.",
      inputSchema: {
        project: z.string().describe("Project name"),
        transitive: z.boolean().optional().describe("Follow edges transitively (default: false)"),
      },
    },
    async (input: GetDependenciesInput): Promise<ToolResponse> => {
      const graph = service.getGraph();
      return resultToStructuredResponse(graph, (g) => {
        const projects = input.transitive
          ? g.getTransitiveDependencies(input.project)
          : g.getDependencies(input.project);
        return {
          text: formatProjectList(`Dependencies of ${input.project}`, projects),
          data: { project: input.project, dependencies: projects },
        };
      });
    }
  );
};
