/**
 * version_dependency_report - Declared constraints of a project checked against current versions.
 */

import * as z from "zod/v4";
import { Ok, andThen, failureMessage, resultToStructuredResponse, type ToolResponse } from "@stackwise/core";
import type { ToolRegistrar } from "./types.js";

interface DependencyReportInput {
  project: string;
  version?: string;
}

export const registerDependencyReport: ToolRegistrar = (server, service) => {
  server.registerTool(
    "version_dependency_report",
    {
      title: "Dependency report",
      description: `Check each constrained edge of a project against the current version of its target,
list its dependents and every unsatisfied constraint in the workspace.
With version set, also check whether that version would break a dependent's constraint.`,
      inputSchema: {
        project: z.string().describe("Project name"),
        version: z.string().optional().describe("Candidate version to check against dependents"),
      },
    },
    async (input: DependencyReportInput): Promise<ToolResponse> => {
      const result = andThen(service.getCoordinator(), (coordinator) =>
        andThen(coordinator.getValidationReport(input.project), (report) => {
          let conflict: string | null = null;
          if (input.version !== undefined) {
            const check = coordinator.validateNoBreakingChanges(input.project, input.version);
            if (!check.ok) conflict = failureMessage(check.error);
          }
          return Ok({ report, conflict });
        })
      );

      return resultToStructuredResponse(result, ({ report, conflict }) => {
        const lines = [`## ${report.project} ${report.version ?? "(no version)"}`, ""];
        for (const dep of report.dependencies) {
          const mark = dep.satisfied ? "✅" : "❌";
          lines.push(`${mark} ${dep.to} ${dep.constraint} (current: ${dep.targetVersion ?? "none"})`);
        }
        lines.push(`Dependents: ${report.dependents.length > 0 ? report.dependents.join(", ") : "none"}`);
        if (report.issues.length > 0) {
          lines.push("", "Workspace issues:", ...report.issues.map((issue) => `- ${issue}`));
        }
        if (input.version !== undefined) {
          lines.push("", conflict ?? `${input.version} is safe for every dependent`);
        }
        return { text: lines.join("\n"), data: { report, conflict } };
      });
    }
  );
};
