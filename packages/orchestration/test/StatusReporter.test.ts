import { describe, it, expect, beforeEach } from "vitest";
import { DependencyGraph } from "../src/core/DependencyGraph.js";
import { StatusReporter } from "../src/core/StatusReporter.js";
import { defaultWorkspaceConfig } from "../src/core/WorkspaceConfig.js";
import { createProject, dependsOn } from "./helpers.js";

describe("StatusReporter", () => {
  let graph: DependencyGraph;
  let reporter: StatusReporter;

  beforeEach(() => {
    graph = new DependencyGraph(true);
    for (const name of ["core", "storage", "api", "cli"]) {
      graph.addProject(createProject(name));
    }
    graph.addDependency(dependsOn("storage", "core"));
    graph.addDependency(dependsOn("api", "core"));
    graph.addDependency(dependsOn("api", "storage"));
    reporter = new StatusReporter(graph, defaultWorkspaceConfig());
  });

  describe("generateReport", () => {
    it("reports a clean workspace as healthy and fully compliant", () => {
      expect(reporter.generateReport()).toEqual({
        ok: true,
        value: {
          healthStatus: "healthy",
          complianceScore: 1,
          totalProjects: 4,
          totalDependencies: 3,
          statusCounts: { healthy: 4, warning: 0, critical: 0, unknown: 0 },
          projectStatuses: { core: "healthy", storage: "healthy", api: "healthy", cli: "healthy" },
          violations: 0,
        },
      });
    });

    it("follows status changes made on the graph", () => {
      graph.setProjectStatus("cli", "warning");

      const report = reporter.generateReport();
      expect(report.ok && report.value.healthStatus).toBe("warning");
      expect(report.ok && report.value.statusCounts).toEqual({ healthy: 3, warning: 1, critical: 0, unknown: 0 });
    });

    it("is critical when a cycle is present", () => {
      graph.addDependency(dependsOn("core", "cli"));
      graph.addDependency(dependsOn("cli", "core"));

      const report = reporter.generateReport();
      expect(report.ok && report.value.healthStatus).toBe("critical");
      expect(report.ok && report.value.violations).toBe(1);
      expect(report.ok && report.value.complianceScore).toBe(0.5);
    });

    it("is unknown when nothing is wrong but a status is unknown", () => {
      graph.setProjectStatus("api", "unknown");

      const report = reporter.generateReport();
      expect(report.ok && report.value.healthStatus).toBe("unknown");
    });

    it("counts only violating projects against compliance", () => {
      graph.addProject(createProject("Legacy_Tool"));

      const report = reporter.generateReport();
      expect(report.ok && report.value.healthStatus).toBe("warning");
      expect(report.ok && report.value.complianceScore).toBe(0.8);
    });
  });

  describe("collectMetrics", () => {
    it("aggregates status shares, dependency counts and rules", () => {
      graph.setProjectStatus("core", "critical");

      expect(reporter.collectMetrics()).toEqual({
        healthyPercentage: 75,
        warningPercentage: 0,
        criticalPercentage: 25,
        averageDependencies: 0.75,
        maxDependencies: 2,
        minDependencies: 0,
        totalRules: 3,
        enabledRules: 2,
        disabledRules: 1,
      });
    });

    it("treats an empty workspace as healthy", () => {
      const empty = new StatusReporter(new DependencyGraph(true), defaultWorkspaceConfig());

      expect(empty.collectMetrics()).toMatchObject({
        healthyPercentage: 100,
        averageDependencies: 0,
        maxDependencies: 0,
        minDependencies: 0,
      });
    });
  });

  describe("project health", () => {
    it("lists every project with its edge and violation counts", () => {
      graph.addDependency(dependsOn("cli", "cli"));

      expect(reporter.getProjectHealthIndicators()).toEqual({
        ok: true,
        value: [
          { name: "core", status: "healthy", dependencyCount: 0, dependentCount: 2, violationCount: 0 },
          { name: "storage", status: "healthy", dependencyCount: 1, dependentCount: 1, violationCount: 0 },
          { name: "api", status: "healthy", dependencyCount: 2, dependentCount: 0, violationCount: 0 },
          { name: "cli", status: "healthy", dependencyCount: 1, dependentCount: 1, violationCount: 1 },
        ],
      });
    });

    it("answers for a single project", () => {
      expect(reporter.getProjectHealth("storage")).toEqual({
        ok: true,
        value: { name: "storage", status: "healthy", dependencyCount: 1, dependentCount: 1, violationCount: 0 },
      });
    });

    it("fails for an unknown project", () => {
      const result = reporter.getProjectHealth("ghost");
      expect(result.ok === false && result.error.kind).toBe("UnknownProject");
    });
  });

  describe("generateComplianceSummary", () => {
    it("is compliant with no critical findings", () => {
      expect(reporter.generateComplianceSummary()).toEqual({
        ok: true,
        value: { totalRules: 3, enabledRules: 2, complianceScore: 1, isCompliant: true, issues: [] },
      });
    });

    it("lists critical projects and critical violations", () => {
      graph.setProjectStatus("storage", "critical");
      graph.addDependency(dependsOn("cli", "cli"));

      const summary = reporter.generateComplianceSummary();
      expect(summary.ok && summary.value.issues).toEqual([
        "Project 'storage' has critical status",
        "Circular dependency detected: cli -> cli",
      ]);
      expect(summary.ok && summary.value.isCompliant).toBe(false);
    });
  });
});
