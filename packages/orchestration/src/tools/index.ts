/**
 * MCP tool registration for the orchestration package.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { WorkspaceService } from "../WorkspaceService.js";

import { registerLoadWorkspace } from "./loadWorkspace.js";
import { registerGetDependencies } from "./getDependencies.js";
import { registerGetDependents } from "./getDependents.js";
import { registerValidateWorkspace } from "./validateWorkspace.js";
import { registerExecutionOrder } from "./executionOrder.js";
import { registerPlanVersions } from "./planVersions.js";
import { registerUpdateVersion } from "./updateVersion.js";
import { registerCheckBreaking } from "./checkBreaking.js";
import { registerDependencyReport } from "./dependencyReport.js";
import { registerWorkspaceStatus } from "./workspaceStatus.js";
import { registerSetStatus } from "./setStatus.js";

export interface Services {
  workspace: WorkspaceService;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { workspace } = services;

  registerLoadWorkspace(server, workspace);
  registerGetDependencies(server, workspace);
  registerGetDependents(server, workspace);
  registerValidateWorkspace(server, workspace);
  registerExecutionOrder(server, workspace);
  registerPlanVersions(server, workspace);
  registerUpdateVersion(server, workspace);
  registerCheckBreaking(server, workspace);
  registerDependencyReport(server, workspace);
  registerWorkspaceStatus(server, workspace);
  registerSetStatus(server, workspace);
}
