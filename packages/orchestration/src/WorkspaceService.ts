/**
 * Workspace service.
 * Holds one loaded workspace snapshot and the engine components built over it.
 */

import { Ok, Err, type Result } from "@stackwise/core";
import type { Workspace } from "./core/model.js";
import { DependencyGraph } from "./core/DependencyGraph.js";
import { VersionCoordinator } from "./core/VersionCoordinator.js";
import { RulesValidator } from "./core/RulesValidator.js";
import { ExecutionOrderer } from "./core/ExecutionOrderer.js";
import { StatusReporter } from "./core/StatusReporter.js";
import { parseConstraint } from "./core/semver.js";
import { errorDetail, invalidConfiguration, type OrchestrationError } from "./core/errors.js";
import { loadWorkspaceFile } from "./infrastructure/WorkspaceLoader.js";

interface Loaded {
  workspace: Workspace;
  graph: DependencyGraph;
  coordinator: VersionCoordinator;
  validator: RulesValidator;
  orderer: ExecutionOrderer;
  reporter: StatusReporter;
}

export interface WorkspaceSummary {
  root: string;
  projects: number;
  dependencies: number;
  constraints: number;
}

const notLoaded = (): OrchestrationError =>
  invalidConfiguration("workspace not loaded. Call workspace_load first.");

export class WorkspaceService {
  private state: Loaded | null = null;

  isLoaded(): boolean {
    return this.state !== null;
  }

  async load(filePath: string): Promise<Result<WorkspaceSummary, OrchestrationError>> {
    const workspace = await loadWorkspaceFile(filePath);
    if (!workspace.ok) {
      console.error(`[orchestration] Failed to load ${filePath}: ${workspace.error.message}`);
      return workspace;
    }
    return this.loadWorkspace(workspace.value);
  }

  /**
   * Build the graph, coordinator and validator for a snapshot.
   * Every non-empty edge constraint must parse.
   * On failure the previously loaded state is kept.
   */
  loadWorkspace(workspace: Workspace): Result<WorkspaceSummary, OrchestrationError> {
    for (const dependency of workspace.dependencies) {
      if (dependency.versionConstraint.trim() === "") continue;
      const constraint = parseConstraint(dependency.versionConstraint);
      if (!constraint.ok) {
        return Err(
          invalidConfiguration(`dependency ${dependency.from} -> ${dependency.to}: ${errorDetail(constraint.error)}`)
        );
      }
    }

    const graph = new DependencyGraph(true);
    for (const project of workspace.projects) {
      const added = graph.addProject(project);
      if (!added.ok) return added;
    }
    for (const dependency of workspace.dependencies) {
      const added = graph.addDependency(dependency);
      if (!added.ok) return added;
    }

    const coordinator = new VersionCoordinator(graph);
    for (const project of workspace.projects) {
      coordinator.registerProject(project);
    }
    let constraints = 0;
    for (const dependency of workspace.dependencies) {
      if (dependency.versionConstraint.trim() === "") continue;
      coordinator.registerConstraint(dependency.to, dependency.versionConstraint);
      constraints++;
    }

    this.state = {
      workspace,
      graph,
      coordinator,
      validator: new RulesValidator(workspace),
      orderer: new ExecutionOrderer(graph, {
        maxParallelOperations: workspace.config.settings.maxParallelOperations,
      }),
      reporter: new StatusReporter(graph, workspace.config),
    };

    const summary: WorkspaceSummary = {
      root: workspace.root,
      projects: workspace.projects.length,
      dependencies: workspace.dependencies.length,
      constraints,
    };
    if (workspace.config.settings.enableAuditLogging) {
      console.error(
        `[orchestration] Loaded workspace ${summary.root}: ${summary.projects} projects, ` +
          `${summary.dependencies} dependencies, ${summary.constraints} constraints`
      );
    }
    return Ok(summary);
  }

  getWorkspace(): Result<Workspace, OrchestrationError> {
    return this.state ? Ok(this.state.workspace) : Err(notLoaded());
  }

  getGraph(): Result<DependencyGraph, OrchestrationError> {
    return this.state ? Ok(this.state.graph) : Err(notLoaded());
  }

  getCoordinator(): Result<VersionCoordinator, OrchestrationError> {
    return this.state ? Ok(this.state.coordinator) : Err(notLoaded());
  }

  getValidator(): Result<RulesValidator, OrchestrationError> {
    return this.state ? Ok(this.state.validator) : Err(notLoaded());
  }

  getOrderer(): Result<ExecutionOrderer, OrchestrationError> {
    return this.state ? Ok(this.state.orderer) : Err(notLoaded());
  }

  getStatusReporter(): Result<StatusReporter, OrchestrationError> {
    return this.state ? Ok(this.state.reporter) : Err(notLoaded());
  }
}
