import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { WorkspaceService } from "../WorkspaceService.js";
import type { Project, Violation } from "../core/model.js";

export interface ToolRegistrar {
  (server: McpServer, service: WorkspaceService): void;
}

export function formatProjectList(title: string, projects: Project[]): string {
  if (projects.length === 0) {
    return `${title}: none`;
  }
  const lines = [`## ${title}`, "", `Found ${projects.length} project(s):`, ""];
  for (const p of projects) {
    lines.push(`- **${p.name}** ${p.version} (${p.projectType}, ${p.status}) ${p.path}`);
  }
  return lines.join("\n");
}

const SEVERITY_ICON: Record<Violation["severity"], string> = {
  info: "ℹ️",
  warning: "⚠️",
  critical: "❌",
};

export function formatViolation(v: Violation): string {
  return `${SEVERITY_ICON[v.severity]} [${v.severity}] ${v.ruleName}: ${v.description}`;
}
