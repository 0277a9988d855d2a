/**
 * Version lifecycle across workspace projects.
 *
 * Keeps its own copy of each registered project's version and constraints, and a
 * private clone of the dependency graph taken at construction. Neither side sees
 * the other's later mutations.
 */

import { Ok, Err, type Result } from "@stackwise/core";
import type {
  DependencyCheck,
  DependencyReport,
  Project,
  ProjectDependency,
  VersionUpdatePlan,
  VersionUpdateResult,
  VersionUpdateStep,
} from "./model.js";
import type { DependencyGraph } from "./DependencyGraph.js";
import {
  breakingChange,
  incompatibleVersion,
  invalidConfiguration,
  unknownProject,
  type OrchestrationError,
} from "./errors.js";
import { isBreakingChange, parseConstraint, parseVersion, satisfiesConstraint } from "./semver.js";

export class VersionCoordinator {
  private readonly graph: DependencyGraph;
  private projects = new Map<string, Project>();
  private constraints = new Map<string, string[]>();

  constructor(graph: DependencyGraph) {
    this.graph = graph.clone();
  }

  /**
   * Record a project and its current version. Re-registering overwrites.
   */
  registerProject(project: Project): void {
    this.projects.set(project.name, { ...project });
  }

  /**
   * Append a constraint for a project. The project need not be registered.
   */
  registerConstraint(projectName: string, constraint: string): void {
    const list = this.constraints.get(projectName);
    if (list) {
      list.push(constraint);
    } else {
      this.constraints.set(projectName, [constraint]);
    }
  }

  getConstraints(projectName: string): string[] {
    return [...(this.constraints.get(projectName) ?? [])];
  }

  getVersion(projectName: string): string | undefined {
    return this.projects.get(projectName)?.version;
  }

  getAllProjects(): Project[] {
    return Array.from(this.projects.values(), (p) => ({ ...p }));
  }

  getDependencyGraph(): DependencyGraph {
    return this.graph;
  }

  /**
   * Check `newVersion` against every constraint registered for the project.
   * With no constraints any parseable version is admitted.
   */
  validateVersionUpdate(projectName: string, newVersion: string): Result<void, OrchestrationError> {
    const candidate = parseVersion(newVersion);
    if (!candidate.ok) {
      return candidate;
    }

    for (const text of this.constraints.get(projectName) ?? []) {
      const constraint = parseConstraint(text);
      if (!constraint.ok) {
        return constraint;
      }
      if (!satisfiesConstraint(candidate.value, constraint.value)) {
        return Err(incompatibleVersion(projectName, newVersion, constraint.value.raw));
      }
    }

    return Ok(undefined);
  }

  /**
   * Validate and store a new version.
   * Precondition failures come back as errors; the record is only produced on success.
   */
  updateVersion(projectName: string, newVersion: string): Result<VersionUpdateResult, OrchestrationError> {
    const project = this.projects.get(projectName);
    if (!project) {
      return Err(unknownProject(projectName));
    }

    const valid = this.validateVersionUpdate(projectName, newVersion);
    if (!valid.ok) {
      return valid;
    }

    const oldVersion = project.version;
    project.version = newVersion;

    return Ok({
      project: projectName,
      oldVersion,
      newVersion,
      affectedProjects: this.affectedNames(projectName),
      success: true,
    });
  }

  /**
   * True when the candidate's major differs from the stored version's major.
   */
  isBreakingChange(projectName: string, candidateVersion: string): Result<boolean, OrchestrationError> {
    const project = this.projects.get(projectName);
    if (!project) {
      return Err(unknownProject(projectName));
    }

    const current = parseVersion(project.version);
    if (!current.ok) {
      return current;
    }
    const candidate = parseVersion(candidateVersion);
    if (!candidate.ok) {
      return candidate;
    }

    return Ok(isBreakingChange(current.value, candidate.value));
  }

  /**
   * Refuse a major bump when a direct dependent's declared constraint would not
   * admit the new version. Non-breaking changes always pass.
   */
  validateNoBreakingChanges(projectName: string, newVersion: string): Result<void, OrchestrationError> {
    const breaking = this.isBreakingChange(projectName, newVersion);
    if (!breaking.ok) return breaking;
    if (!breaking.value) return Ok(undefined);

    const candidate = parseVersion(newVersion);
    if (!candidate.ok) return candidate;

    for (const edge of this.constrainedEdges((d) => d.to === projectName)) {
      const constraint = parseConstraint(edge.versionConstraint);
      if (!constraint.ok) return constraint;
      if (!satisfiesConstraint(candidate.value, constraint.value)) {
        return Err(breakingChange(projectName, edge.from, constraint.value.raw));
      }
    }

    return Ok(undefined);
  }

  /**
   * Check each edge's declared constraint against the current version of its target.
   * Edges without a constraint are skipped.
   */
  validateAllDependencies(): DependencyCheck[] {
    return this.constrainedEdges(() => true).map((edge) => this.checkDependency(edge));
  }

  getValidationReport(projectName: string): Result<DependencyReport, OrchestrationError> {
    if (!this.graph.hasProject(projectName)) {
      return Err(unknownProject(projectName));
    }

    const issues = this.validateAllDependencies()
      .filter((check) => !check.satisfied)
      .map((check) => `${check.from} -> ${check.to}: ${check.issue ?? "unsatisfied"}`);

    return Ok({
      project: projectName,
      version: this.getVersion(projectName),
      dependencies: this.constrainedEdges((d) => d.from === projectName).map((edge) => this.checkDependency(edge)),
      dependents: this.graph.getDependents(projectName).map((p) => p.name),
      issues,
    });
  }

  /**
   * Build a plan from (project, version) pairs.
   *
   * Malformed pairs are left out of `updates` and reported in `validationErrors`
   * with `isValid = false`. Constraint compatibility is not checked here.
   */
  planVersionUpdates(
    updates: ReadonlyArray<readonly [string, string]>
  ): Result<VersionUpdatePlan, OrchestrationError> {
    const steps: VersionUpdateStep[] = [];
    const validationErrors: string[] = [];
    const affected = new Set<string>();

    for (const [projectName, newVersion] of updates) {
      const project = this.projects.get(projectName);
      if (!project) {
        validationErrors.push(`Project not found: ${projectName}`);
        continue;
      }

      const candidate = parseVersion(newVersion);
      if (!candidate.ok) {
        validationErrors.push(`Invalid version for ${projectName}: ${candidate.error.message}`);
        continue;
      }

      const current = parseVersion(project.version);
      const dependents = this.affectedNames(projectName);
      dependents.forEach((name) => affected.add(name));

      steps.push({
        project: projectName,
        newVersion,
        dependents,
        isBreaking: current.ok && isBreakingChange(current.value, candidate.value),
      });
    }

    return Ok({
      updates: steps,
      totalAffected: affected.size,
      isValid: validationErrors.length === 0,
      validationErrors,
    });
  }

  /**
   * Apply a valid plan step by step.
   *
   * If a step fails, steps already applied are restored to their old versions and
   * reported with success = false; the failing step is the last record returned.
   */
  applyVersionPlan(plan: VersionUpdatePlan): Result<VersionUpdateResult[], OrchestrationError> {
    if (!plan.isValid) {
      return Err(invalidConfiguration(`cannot apply an invalid plan: ${plan.validationErrors.join("; ")}`));
    }

    const applied: VersionUpdateResult[] = [];

    for (const step of plan.updates) {
      const result = this.updateVersion(step.project, step.newVersion);
      if (result.ok) {
        applied.push(result.value);
        continue;
      }

      const reason = result.error.message;
      for (const done of [...applied].reverse()) {
        const project = this.projects.get(done.project);
        if (project) project.version = done.oldVersion;
      }

      return Ok([
        ...applied.map((done) => ({ ...done, success: false, error: `rolled back: ${reason}` })),
        {
          project: step.project,
          oldVersion: this.getVersion(step.project) ?? "",
          newVersion: step.newVersion,
          affectedProjects: step.dependents,
          success: false,
          error: reason,
        },
      ]);
    }

    return Ok(applied);
  }

  /**
   * Projects affected by a version change of `projectName`: its transitive dependents.
   */
  getAffectedProjects(projectName: string): Project[] {
    return this.graph.getTransitiveDependents(projectName);
  }

  /**
   * Forget all projects, versions and constraints. The graph is kept.
   */
  clear(): void {
    this.projects.clear();
    this.constraints.clear();
  }

  private constrainedEdges(keep: (edge: ProjectDependency) => boolean): ProjectDependency[] {
    return this.graph
      .getAllDependencies()
      .filter((edge) => edge.versionConstraint.trim() !== "" && keep(edge));
  }

  private checkDependency(edge: ProjectDependency): DependencyCheck {
    const targetVersion = this.getVersion(edge.to);
    const check = { from: edge.from, to: edge.to, constraint: edge.versionConstraint, targetVersion };
    const failed = (issue: string): DependencyCheck => ({ ...check, satisfied: false, issue });

    if (targetVersion === undefined) return failed(`Project not found: ${edge.to}`);

    const version = parseVersion(targetVersion);
    if (!version.ok) return failed(version.error.message);
    const constraint = parseConstraint(edge.versionConstraint);
    if (!constraint.ok) return failed(constraint.error.message);

    if (!satisfiesConstraint(version.value, constraint.value)) {
      return failed(incompatibleVersion(edge.to, targetVersion, constraint.value.raw).message);
    }
    return { ...check, satisfied: true };
  }

  private affectedNames(projectName: string): string[] {
    return this.getAffectedProjects(projectName).map((p) => p.name);
  }
}
