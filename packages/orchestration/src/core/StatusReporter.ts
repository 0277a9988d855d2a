/**
 * Workspace health reporting.
 * Reads project statuses from the graph and rule compliance from a RulesValidator
 * run over the graph's current contents.
 */

import { Ok, Err, type Result } from "@stackwise/core";
import type {
  AggregatedMetrics,
  ComplianceSummary,
  ProjectHealth,
  ProjectStatus,
  StatusCounts,
  StatusReport,
  Violation,
  WorkspaceConfig,
} from "./model.js";
import type { DependencyGraph } from "./DependencyGraph.js";
import { RulesValidator } from "./RulesValidator.js";
import { unknownProject, type OrchestrationError } from "./errors.js";

const COMPLIANCE_THRESHOLD = 0.8;

export class StatusReporter {
  constructor(
    private readonly graph: DependencyGraph,
    private readonly config: WorkspaceConfig
  ) {}

  generateReport(): Result<StatusReport, OrchestrationError> {
    const violations = this.violations();
    if (!violations.ok) return violations;

    const projects = this.graph.getProjects();
    const statusCounts = countStatuses(projects.map((p) => p.status));
    const projectStatuses: Record<string, ProjectStatus> = {};
    for (const project of projects) projectStatuses[project.name] = project.status;

    return Ok({
      healthStatus: overallHealth(statusCounts, violations.value),
      complianceScore: this.complianceScore(violations.value),
      totalProjects: projects.length,
      totalDependencies: this.graph.getAllDependencies().length,
      statusCounts,
      projectStatuses,
      violations: violations.value.length,
    });
  }

  collectMetrics(): AggregatedMetrics {
    const projects = this.graph.getProjects();
    const totalRules = this.config.rules.length;
    const enabledRules = this.config.rules.filter((rule) => rule.enabled).length;
    const rules = { totalRules, enabledRules, disabledRules: totalRules - enabledRules };

    if (projects.length === 0) {
      return {
        healthyPercentage: 100,
        warningPercentage: 0,
        criticalPercentage: 0,
        averageDependencies: 0,
        maxDependencies: 0,
        minDependencies: 0,
        ...rules,
      };
    }

    const counts = countStatuses(projects.map((p) => p.status));
    const degrees = projects.map((p) => this.graph.getDependencies(p.name).length);
    const percent = (n: number): number => (n / projects.length) * 100;

    return {
      healthyPercentage: percent(counts.healthy),
      warningPercentage: percent(counts.warning),
      criticalPercentage: percent(counts.critical),
      averageDependencies: degrees.reduce((sum, d) => sum + d, 0) / projects.length,
      maxDependencies: Math.max(...degrees),
      minDependencies: Math.min(...degrees),
      ...rules,
    };
  }

  getProjectHealthIndicators(): Result<ProjectHealth[], OrchestrationError> {
    const violations = this.violations();
    if (!violations.ok) return violations;
    return Ok(this.graph.getProjects().map((p) => this.health(p.name, p.status, violations.value)));
  }

  getProjectHealth(name: string): Result<ProjectHealth, OrchestrationError> {
    const project = this.graph.getProject(name);
    if (!project) return Err(unknownProject(name));

    const violations = this.violations();
    if (!violations.ok) return violations;
    return Ok(this.health(project.name, project.status, violations.value));
  }

  /**
   * Compliant means a score of at least 0.8 and no critical findings.
   */
  generateComplianceSummary(): Result<ComplianceSummary, OrchestrationError> {
    const violations = this.violations();
    if (!violations.ok) return violations;

    const issues = [
      ...this.graph
        .getProjects()
        .filter((p) => p.status === "critical")
        .map((p) => `Project '${p.name}' has critical status`),
      ...violations.value.filter((v) => v.severity === "critical").map((v) => v.description),
    ];
    const complianceScore = this.complianceScore(violations.value);

    return Ok({
      totalRules: this.config.rules.length,
      enabledRules: this.config.rules.filter((rule) => rule.enabled).length,
      complianceScore,
      isCompliant: complianceScore >= COMPLIANCE_THRESHOLD && issues.length === 0,
      issues,
    });
  }

  private violations(): Result<Violation[], OrchestrationError> {
    const validator = new RulesValidator({
      root: "",
      projects: this.graph.getProjects(),
      dependencies: this.graph.getAllDependencies(),
      config: this.config,
    });
    const result = validator.validateAll();
    return result.ok ? Ok(result.value.violations) : result;
  }

  /** Share of projects named in no violation */
  private complianceScore(violations: Violation[]): number {
    const projects = this.graph.getProjects();
    if (projects.length === 0) return 1;
    const flagged = new Set(violations.flatMap((v) => v.affectedProjects));
    return projects.filter((p) => !flagged.has(p.name)).length / projects.length;
  }

  private health(name: string, status: ProjectStatus, violations: Violation[]): ProjectHealth {
    return {
      name,
      status,
      dependencyCount: this.graph.getDependencies(name).length,
      dependentCount: this.graph.getDependents(name).length,
      violationCount: violations.filter((v) => v.affectedProjects.includes(name)).length,
    };
  }
}

function countStatuses(statuses: ProjectStatus[]): StatusCounts {
  const counts: StatusCounts = { healthy: 0, warning: 0, critical: 0, unknown: 0 };
  for (const status of statuses) counts[status]++;
  return counts;
}

function overallHealth(counts: StatusCounts, violations: Violation[]): ProjectStatus {
  if (counts.critical > 0 || violations.some((v) => v.severity === "critical")) return "critical";
  if (counts.warning > 0 || violations.length > 0) return "warning";
  if (counts.unknown > 0) return "unknown";
  return "healthy";
}
