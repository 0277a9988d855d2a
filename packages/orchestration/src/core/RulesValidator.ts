/**
 * Workspace policy evaluation.
 * Non-compliance is reported as Violation data; only malformed configuration is an error.
 */

import { Ok, Err, tryCatch, type Result } from "@stackwise/core";
import type {
  NamingConvention,
  Project,
  ProjectDependency,
  Severity,
  ValidationResult,
  Violation,
  Workspace,
  WorkspaceRule,
} from "./model.js";
import { DependencyGraph } from "./DependencyGraph.js";
import { invalidConfiguration, type OrchestrationError } from "./errors.js";

const NAMING_PATTERNS: Record<NamingConvention, RegExp> = {
  "kebab-case": /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/,
  "snake-case": /^[a-z0-9](?:[a-z0-9_]*[a-z0-9])?$/,
  "camel-case": /^[a-z][a-zA-Z0-9]*$/,
  "pascal-case": /^[A-Z][a-zA-Z0-9]*$/,
};

const SEVERITY_RANK: Record<Severity, number> = { info: 0, warning: 1, critical: 2 };

function atLeast(floor: Severity, requested: Severity | undefined): Severity {
  if (requested === undefined) return floor;
  return SEVERITY_RANK[requested] >= SEVERITY_RANK[floor] ? requested : floor;
}

interface CompiledLayer {
  name: string;
  index: number;
  pattern: RegExp;
}

export function isValidProjectName(name: string, convention: NamingConvention): boolean {
  return NAMING_PATTERNS[convention].test(name);
}

export class RulesValidator {
  constructor(private readonly workspace: Workspace) {}

  getEnabledRules(): WorkspaceRule[] {
    return this.workspace.config.rules.filter((rule) => rule.enabled);
  }

  /**
   * Evaluate every enabled rule and collect all violations in one pass.
   */
  validateAll(): Result<ValidationResult, OrchestrationError> {
    const violations: Violation[] = [];

    for (const rule of this.getEnabledRules()) {
      switch (rule.ruleType) {
        case "dependency-constraint": {
          const found = this.checkCircularDependencies(rule);
          if (!found.ok) return found;
          violations.push(...found.value);
          break;
        }
        case "naming-convention":
          violations.push(...this.checkNaming(rule, this.workspace.projects));
          break;
        case "architectural-boundary": {
          const found = this.checkBoundaries(rule);
          if (!found.ok) return found;
          violations.push(...found.value);
          break;
        }
      }
    }

    return Ok(toResult(violations));
  }

  /**
   * Apply the enabled naming rules to a single project.
   */
  validateProject(project: Project): Result<ValidationResult, OrchestrationError> {
    const violations = this.getEnabledRules()
      .filter((rule) => rule.ruleType === "naming-convention")
      .flatMap((rule) => this.checkNaming(rule, [project]));
    return Ok(toResult(violations));
  }

  /**
   * Check whether adding `dependency` to the workspace would close a cycle.
   */
  validateDependency(dependency: ProjectDependency): Result<ValidationResult, OrchestrationError> {
    const rules = this.getEnabledRules().filter((rule) => rule.ruleType === "dependency-constraint");
    if (rules.length === 0) {
      return Ok(toResult([]));
    }

    const graph = this.buildGraph();
    if (!graph.ok) return graph;
    const closesCycle =
      dependency.from === dependency.to || graph.value.wouldCreateCycle(dependency.from, dependency.to);
    if (!closesCycle) {
      return Ok(toResult([]));
    }

    return Ok(
      toResult(
        rules.map((rule): Violation => ({
          ruleName: rule.name,
          ruleType: rule.ruleType,
          severity: "critical",
          description: `Dependency would create a cycle: ${dependency.from} -> ${dependency.to}`,
          affectedProjects: unique([dependency.from, dependency.to]),
        }))
      )
    );
  }

  private checkCircularDependencies(rule: WorkspaceRule): Result<Violation[], OrchestrationError> {
    const graph = this.buildGraph();
    if (!graph.ok) return graph;

    return Ok(
      graph.value.detectCycles().map((cycle): Violation => ({
        ruleName: rule.name,
        ruleType: rule.ruleType,
        severity: "critical",
        description: `Circular dependency detected: ${[...cycle, cycle[0]].join(" -> ")}`,
        affectedProjects: unique(cycle),
      }))
    );
  }

  private checkNaming(rule: WorkspaceRule, projects: Project[]): Violation[] {
    const convention = this.workspace.config.namingConvention;
    return projects
      .filter((project) => !isValidProjectName(project.name, convention))
      .map((project): Violation => ({
        ruleName: rule.name,
        ruleType: rule.ruleType,
        severity: atLeast("warning", rule.severity),
        description: `Project name '${project.name}' does not follow the ${convention} naming convention`,
        affectedProjects: [project.name],
      }));
  }

  /**
   * A dependency from a lower layer to a higher one points the wrong way.
   * Projects outside every layer are unconstrained.
   */
  private checkBoundaries(rule: WorkspaceRule): Result<Violation[], OrchestrationError> {
    const layers = this.compileLayers();
    if (!layers.ok) return layers;

    const layerOf = new Map<string, CompiledLayer>();
    for (const project of this.workspace.projects) {
      const layer = layers.value.find((l) => l.pattern.test(project.name));
      if (layer) layerOf.set(project.name, layer);
    }

    const violations: Violation[] = [];
    for (const dep of this.workspace.dependencies) {
      const from = layerOf.get(dep.from);
      const to = layerOf.get(dep.to);
      if (!from || !to || from.index >= to.index) continue;

      violations.push({
        ruleName: rule.name,
        ruleType: rule.ruleType,
        severity: rule.severity ?? "warning",
        description: `Cross-layer dependency: ${dep.from} (${from.name}) depends on ${dep.to} (${to.name})`,
        affectedProjects: unique([dep.from, dep.to]),
      });
    }
    return Ok(violations);
  }

  private compileLayers(): Result<CompiledLayer[], OrchestrationError> {
    const compiled: CompiledLayer[] = [];
    for (const [index, layer] of this.workspace.config.layers.entries()) {
      const pattern = tryCatch(() => new RegExp(layer.pattern));
      if (!pattern.ok) {
        return Err(
          invalidConfiguration(`layer "${layer.name}" has an invalid pattern: ${pattern.error.message}`)
        );
      }
      compiled.push({ name: layer.name, index, pattern: pattern.value });
    }
    return Ok(compiled);
  }

  /**
   * Graph over the snapshot. Duplicate names or dangling edges make the snapshot malformed.
   */
  private buildGraph(): Result<DependencyGraph, OrchestrationError> {
    const graph = new DependencyGraph(true);
    for (const project of this.workspace.projects) {
      const added = graph.addProject(project);
      if (!added.ok) return Err(invalidConfiguration(`workspace data: ${added.error.message}`));
    }
    for (const dep of this.workspace.dependencies) {
      const added = graph.addDependency(dep);
      if (!added.ok) return Err(invalidConfiguration(`workspace data: ${added.error.message}`));
    }
    return Ok(graph);
  }
}

function toResult(violations: Violation[]): ValidationResult {
  return { passed: violations.length === 0, violations };
}

function unique(names: string[]): string[] {
  return [...new Set(names)];
}
