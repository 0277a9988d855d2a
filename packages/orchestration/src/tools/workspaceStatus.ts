/**
 * workspace_status - Health report for the workspace or one project.
 */

import * as z from "zod/v4";
import { Ok, andThen, resultToStructuredResponse, type ToolResponse } from "@stackwise/core";
import type { ToolRegistrar } from "./types.js";

interface WorkspaceStatusInput {
  project?: string;
}

const percent = (share: number): string => `${(share * 100).toFixed(0)}%`;

export const registerWorkspaceStatus: ToolRegistrar = (server, service) => {
  server.registerTool(
    "workspace_status",
    {
      title: "Workspace status",
      description: `Report workspace health: status counts, rule compliance and dependency metrics.
With project set, report that project's status, edge counts and violations instead.`,
      inputSchema: {
        project: z.string().optional().describe("Project name (default: whole workspace)"),
      },
    },
    async (input: WorkspaceStatusInput): Promise<ToolResponse> => {
      const reporter = service.getStatusReporter();

      if (input.project !== undefined) {
        const name = input.project;
        return resultToStructuredResponse(
          andThen(reporter, (r) => r.getProjectHealth(name)),
          (health) => ({
            text:
              `${health.name}: ${health.status}, ${health.dependencyCount} dependencies, ` +
              `${health.dependentCount} dependents, ${health.violationCount} violation(s)`,
            data: { health },
          })
        );
      }

      const result = andThen(reporter, (r) =>
        andThen(r.generateReport(), (report) =>
          andThen(r.generateComplianceSummary(), (compliance) =>
            Ok({ report, compliance, metrics: r.collectMetrics() })
          )
        )
      );
      return resultToStructuredResponse(result, ({ report, compliance, metrics }) => {
        const counts = report.statusCounts;
        const lines = [
          `## Workspace: ${report.healthStatus}`,
          "",
          `${report.totalProjects} project(s), ${report.totalDependencies} dependencies`,
          `healthy ${counts.healthy}, warning ${counts.warning}, critical ${counts.critical}, unknown ${counts.unknown}`,
          `Compliance: ${percent(report.complianceScore)} (${compliance.isCompliant ? "compliant" : "not compliant"})`,
          `Dependencies per project: avg ${metrics.averageDependencies.toFixed(2)}, ` +
            `min ${metrics.minDependencies}, max ${metrics.maxDependencies}`,
        ];
        if (compliance.issues.length > 0) {
          lines.push("", "Issues:", ...compliance.issues.map((issue) => `- ${issue}`));
        }
        return { text: lines.join("\n"), data: { report, compliance, metrics } };
      });
    }
  );
};
