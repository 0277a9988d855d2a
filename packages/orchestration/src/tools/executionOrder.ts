/**
 * workspace_execution_order - Dependency-respecting execution levels.
 */

import * as z from "zod/v4";
import { andThen, resultToStructuredResponse, type ToolResponse } from "@stackwise/core";
import type { ToolRegistrar } from "./types.js";
import type { ExecutionStrategy } from "../core/model.js";

interface ExecutionOrderInput {
  projects?: string[];
  strategy?: ExecutionStrategy;
}

export const registerExecutionOrder: ToolRegistrar = (server, service) => {
  server.registerTool(
    "workspace_execution_order",
    {
      title: "Execution order",
      description:
        "Group projects into levels so every project runs after its dependencies. Projects in one level can run in parallel.",
      inputSchema: {
        projects: z.array(z.string()).optional().describe("Projects to order (default: all)"),
        strategy: z
          .enum(["sequential", "level-based", "full-parallel"])
          .optional()
          .describe("Planning strategy (default: level-based)"),
      },
    },
    async (input: ExecutionOrderInput): Promise<ToolResponse> => {
      const result = andThen(service.getGraph(), (graph) =>
        andThen(service.getOrderer(), (orderer) =>
          orderer.createExecutionPlan(
            input.projects ?? graph.getProjects().map((p) => p.name),
            input.strategy ?? "level-based"
          )
        )
      );

      return resultToStructuredResponse(result, (plan) => ({
        text: [
          `## Execution plan (${plan.strategy})`,
          `${plan.totalProjects} project(s), max parallelism ${plan.maxParallelism}`,
          "",
          ...plan.levels.map((l) => `${l.level}. ${l.projects.join(", ")}`),
        ].join("\n"),
        data: { ...plan },
      }));
    }
  );
};
