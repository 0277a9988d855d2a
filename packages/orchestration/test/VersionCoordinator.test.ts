import { describe, it, expect, beforeEach } from "vitest";
import { DependencyGraph } from "../src/core/DependencyGraph.js";
import { VersionCoordinator } from "../src/core/VersionCoordinator.js";
import { createProject, dependsOn } from "./helpers.js";

const names = (projects: Array<{ name: string }>): string[] => projects.map((p) => p.name);

describe("VersionCoordinator", () => {
  let graph: DependencyGraph;
  let coordinator: VersionCoordinator;

  beforeEach(() => {
    graph = new DependencyGraph(true);
    for (const name of ["core", "storage", "api", "cli"]) {
      graph.addProject(createProject(name));
    }
    graph.addDependency(dependsOn("storage", "core"));
    graph.addDependency(dependsOn("api", "core"));
    graph.addDependency(dependsOn("api", "storage"));
    graph.addDependency(dependsOn("cli", "api"));

    coordinator = new VersionCoordinator(graph);
  });

  describe("registration", () => {
    it("starts empty", () => {
      expect(coordinator.getAllProjects()).toEqual([]);
      expect(coordinator.getVersion("core")).toBeUndefined();
    });

    it("records the project's version", () => {
      coordinator.registerProject(createProject("api", { version: "1.0.0" }));
      expect(coordinator.getVersion("api")).toBe("1.0.0");
    });

    it("overwrites on re-registration", () => {
      coordinator.registerProject(createProject("api", { version: "1.0.0" }));
      coordinator.registerProject(createProject("api", { version: "1.3.0" }));

      expect(coordinator.getVersion("api")).toBe("1.3.0");
      expect(coordinator.getAllProjects()).toHaveLength(1);
    });

    it("keeps constraints in order, duplicates included", () => {
      coordinator.registerConstraint("api", "^1.0.0");
      coordinator.registerConstraint("api", ">=1.1.0");
      coordinator.registerConstraint("api", "^1.0.0");

      expect(coordinator.getConstraints("api")).toEqual(["^1.0.0", ">=1.1.0", "^1.0.0"]);
      expect(coordinator.getConstraints("core")).toEqual([]);
    });

    it("returns copies of constraint lists", () => {
      coordinator.registerConstraint("api", "^1.0.0");
      coordinator.getConstraints("api").push("~9.9.9");
      expect(coordinator.getConstraints("api")).toEqual(["^1.0.0"]);
    });
  });

  describe("validateVersionUpdate", () => {
    it("admits any parseable version without constraints", () => {
      expect(coordinator.validateVersionUpdate("api", "42.0.0").ok).toBe(true);
    });

    it("rejects an unparseable version", () => {
      const result = coordinator.validateVersionUpdate("api", "latest");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toMatchObject({ kind: "InvalidVersion", version: "latest" });
      }
    });

    it("requires every constraint to admit the version", () => {
      coordinator.registerConstraint("api", "^1.0.0");
      coordinator.registerConstraint("api", "~1.2.0");

      expect(coordinator.validateVersionUpdate("api", "1.2.5").ok).toBe(true);

      const result = coordinator.validateVersionUpdate("api", "1.3.0");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toEqual({
          kind: "IncompatibleVersion",
          project: "api",
          version: "1.3.0",
          constraint: "~1.2.0",
          message: "Version 1.3.0 of api does not satisfy constraint ~1.2.0",
        });
      }
    });

    it("treats an unsupported operator as a configuration error", () => {
      coordinator.registerConstraint("api", "<2.0.0");
      const result = coordinator.validateVersionUpdate("api", "1.0.0");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("InvalidConfiguration");
      }
    });
  });

  describe("updateVersion", () => {
    beforeEach(() => {
      coordinator.registerProject(createProject("api", { version: "1.0.0" }));
      coordinator.registerConstraint("api", "^1.0.0");
    });

    it("applies a compatible update", () => {
      const result = coordinator.updateVersion("api", "1.2.0");

      expect(result).toEqual({
        ok: true,
        value: {
          project: "api",
          oldVersion: "1.0.0",
          newVersion: "1.2.0",
          affectedProjects: ["cli"],
          success: true,
        },
      });
      expect(coordinator.getVersion("api")).toBe("1.2.0");
      expect(coordinator.getAllProjects()[0].version).toBe("1.2.0");
    });

    it("rejects an incompatible update and keeps the old version", () => {
      coordinator.updateVersion("api", "1.2.0");
      const result = coordinator.updateVersion("api", "2.0.0");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("IncompatibleVersion");
      }
      expect(coordinator.getVersion("api")).toBe("1.2.0");
    });

    it("rejects an unregistered project", () => {
      const result = coordinator.updateVersion("ghost", "1.0.0");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toMatchObject({ kind: "UnknownProject", project: "ghost" });
      }
    });

    it("rejects a malformed version", () => {
      const result = coordinator.updateVersion("api", "1.2");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("InvalidVersion");
      }
      expect(coordinator.getVersion("api")).toBe("1.0.0");
    });
  });

  describe("isBreakingChange", () => {
    beforeEach(() => {
      coordinator.registerProject(createProject("core", { version: "2.3.4" }));
    });

    it("is false for minor and patch moves, up or down", () => {
      for (const candidate of ["2.3.5", "2.9.0", "2.0.0", "2.3.3"]) {
        expect(coordinator.isBreakingChange("core", candidate)).toEqual({ ok: true, value: false });
      }
    });

    it("is true for major moves, up or down", () => {
      expect(coordinator.isBreakingChange("core", "3.0.0")).toEqual({ ok: true, value: true });
      expect(coordinator.isBreakingChange("core", "1.9.9")).toEqual({ ok: true, value: true });
    });

    it("flags a major bump even when a loose constraint admits it", () => {
      coordinator.registerConstraint("core", ">=2.0.0");
      expect(coordinator.validateVersionUpdate("core", "3.0.0").ok).toBe(true);
      expect(coordinator.isBreakingChange("core", "3.0.0")).toEqual({ ok: true, value: true });
    });

    it("fails for unknown projects and bad versions", () => {
      const unknown = coordinator.isBreakingChange("ghost", "1.0.0");
      const invalid = coordinator.isBreakingChange("core", "three");
      expect(unknown.ok || unknown.error.kind).toBe("UnknownProject");
      expect(invalid.ok || invalid.error.kind).toBe("InvalidVersion");
    });
  });

  describe("planVersionUpdates", () => {
    beforeEach(() => {
      coordinator.registerProject(createProject("core", { version: "1.0.0" }));
      coordinator.registerProject(createProject("api", { version: "1.0.0" }));
    });

    it("builds a valid plan with breaking flags and dependents", () => {
      const result = coordinator.planVersionUpdates([
        ["core", "2.0.0"],
        ["api", "1.1.0"],
      ]);

      expect(result).toEqual({
        ok: true,
        value: {
          updates: [
            { project: "core", newVersion: "2.0.0", dependents: ["storage", "api", "cli"], isBreaking: true },
            { project: "api", newVersion: "1.1.0", dependents: ["cli"], isBreaking: false },
          ],
          totalAffected: 3,
          isValid: true,
          validationErrors: [],
        },
      });
    });

    it("ignores constraint compatibility", () => {
      coordinator.registerConstraint("api", "^1.0.0");
      const result = coordinator.planVersionUpdates([["api", "5.0.0"]]);
      expect(result.ok && result.value.isValid).toBe(true);
    });

    it("is invalid when a project is missing, without failing the call", () => {
      const empty = new VersionCoordinator(new DependencyGraph(true));
      const result = empty.planVersionUpdates([["missing-project", "1.0.0"]]);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.isValid).toBe(false);
        expect(result.value.updates).toEqual([]);
        expect(result.value.validationErrors).toEqual(["Project not found: missing-project"]);
      }
    });

    it("is invalid when a version does not parse", () => {
      const result = coordinator.planVersionUpdates([
        ["core", "1.1.0"],
        ["api", "next"],
      ]);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.isValid).toBe(false);
        expect(result.value.updates.map((u) => u.project)).toEqual(["core"]);
        expect(result.value.validationErrors).toEqual(['Invalid version for api: Invalid version: "next"']);
      }
    });

    it("does not change stored versions", () => {
      coordinator.planVersionUpdates([["core", "1.5.0"]]);
      expect(coordinator.getVersion("core")).toBe("1.0.0");
    });
  });

  describe("applyVersionPlan", () => {
    beforeEach(() => {
      coordinator.registerProject(createProject("core", { version: "1.0.0" }));
      coordinator.registerProject(createProject("api", { version: "1.0.0" }));
      coordinator.registerConstraint("api", "^1.0.0");
    });

    it("applies every step of a valid plan", () => {
      const plan = coordinator.planVersionUpdates([
        ["core", "1.1.0"],
        ["api", "1.4.0"],
      ]);
      if (!plan.ok) throw new Error("plan failed");

      const applied = coordinator.applyVersionPlan(plan.value);
      expect(applied.ok).toBe(true);
      if (applied.ok) {
        expect(applied.value.map((r) => [r.project, r.success])).toEqual([
          ["core", true],
          ["api", true],
        ]);
      }
      expect(coordinator.getVersion("core")).toBe("1.1.0");
      expect(coordinator.getVersion("api")).toBe("1.4.0");
    });

    it("rolls back earlier steps when a later one is rejected", () => {
      const plan = coordinator.planVersionUpdates([
        ["core", "1.1.0"],
        ["api", "2.0.0"],
      ]);
      if (!plan.ok) throw new Error("plan failed");

      const applied = coordinator.applyVersionPlan(plan.value);
      expect(applied.ok).toBe(true);
      if (applied.ok) {
        const reason = "Version 2.0.0 of api does not satisfy constraint ^1.0.0";
        expect(applied.value).toEqual([
          {
            project: "core",
            oldVersion: "1.0.0",
            newVersion: "1.1.0",
            affectedProjects: ["storage", "api", "cli"],
            success: false,
            error: `rolled back: ${reason}`,
          },
          {
            project: "api",
            oldVersion: "1.0.0",
            newVersion: "2.0.0",
            affectedProjects: ["cli"],
            success: false,
            error: reason,
          },
        ]);
      }
      expect(coordinator.getVersion("core")).toBe("1.0.0");
      expect(coordinator.getVersion("api")).toBe("1.0.0");
    });

    it("refuses an invalid plan", () => {
      const plan = coordinator.planVersionUpdates([["ghost", "1.0.0"]]);
      if (!plan.ok) throw new Error("plan failed");

      const applied = coordinator.applyVersionPlan(plan.value);
      expect(applied.ok).toBe(false);
      if (!applied.ok) {
        expect(applied.error.kind).toBe("InvalidConfiguration");
      }
    });
  });

  describe("getAffectedProjects", () => {
    it("returns transitive dependents", () => {
      expect(names(coordinator.getAffectedProjects("storage"))).toEqual(["api", "cli"]);
    });

    it("is empty for leaves and unknown projects", () => {
      expect(coordinator.getAffectedProjects("cli")).toEqual([]);
      expect(coordinator.getAffectedProjects("ghost")).toEqual([]);
    });

    it("does not see graph changes made after construction", () => {
      graph.addProject(createProject("web"));
      graph.addDependency(dependsOn("web", "cli"));

      expect(coordinator.getAffectedProjects("cli")).toEqual([]);
      expect(names(graph.getTransitiveDependents("cli"))).toEqual(["web"]);
    });
  });

  describe("declared dependency checks", () => {
    beforeEach(() => {
      for (const name of ["core", "storage", "api", "cli"]) {
        coordinator.registerProject(createProject(name));
      }
    });

    it("checks every constrained edge against the target's version", () => {
      expect(coordinator.validateAllDependencies()).toEqual([
        { from: "storage", to: "core", constraint: "^1.0.0", targetVersion: "1.0.0", satisfied: true },
        { from: "api", to: "core", constraint: "^1.0.0", targetVersion: "1.0.0", satisfied: true },
        { from: "api", to: "storage", constraint: "^1.0.0", targetVersion: "1.0.0", satisfied: true },
        { from: "cli", to: "api", constraint: "^1.0.0", targetVersion: "1.0.0", satisfied: true },
      ]);
    });

    it("flags edges the current version no longer satisfies", () => {
      expect(coordinator.updateVersion("core", "2.0.0").ok).toBe(true);

      const failing = coordinator.validateAllDependencies().filter((check) => !check.satisfied);
      expect(failing.map((check) => [check.from, check.issue])).toEqual([
        ["storage", "Version 2.0.0 of core does not satisfy constraint ^1.0.0"],
        ["api", "Version 2.0.0 of core does not satisfy constraint ^1.0.0"],
      ]);
    });

    it("flags an edge whose target has no recorded version", () => {
      const partial = new VersionCoordinator(graph);
      partial.registerProject(createProject("api"));

      const check = partial.validateAllDependencies().find((c) => c.from === "api" && c.to === "storage");
      expect(check).toEqual({
        from: "api",
        to: "storage",
        constraint: "^1.0.0",
        targetVersion: undefined,
        satisfied: false,
        issue: "Project not found: storage",
      });
    });

    describe("validateNoBreakingChanges", () => {
      it("admits non-breaking changes", () => {
        expect(coordinator.validateNoBreakingChanges("core", "1.5.0")).toEqual({ ok: true, value: undefined });
      });

      it("names the first dependent whose constraint refuses a major bump", () => {
        const result = coordinator.validateNoBreakingChanges("core", "2.0.0");
        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error).toEqual({
            kind: "BreakingChange",
            project: "core",
            dependent: "storage",
            constraint: "^1.0.0",
            message: "Breaking change in core would break dependent project storage (constraint: ^1.0.0)",
          });
        }
      });

      it("admits a major bump every dependent's constraint allows", () => {
        const open = new DependencyGraph(true);
        open.addProject(createProject("core"));
        open.addProject(createProject("api"));
        open.addDependency(dependsOn("api", "core", { versionConstraint: ">=1.0.0" }));
        const local = new VersionCoordinator(open);
        local.registerProject(createProject("core"));

        expect(local.validateNoBreakingChanges("core", "2.0.0").ok).toBe(true);
      });

      it("fails for an unregistered project", () => {
        const result = coordinator.validateNoBreakingChanges("ghost", "2.0.0");
        expect(result.ok === false && result.error.kind).toBe("UnknownProject");
      });
    });

    describe("getValidationReport", () => {
      it("describes a project's edges, dependents and workspace issues", () => {
        coordinator.updateVersion("core", "2.0.0");

        expect(coordinator.getValidationReport("api")).toEqual({
          ok: true,
          value: {
            project: "api",
            version: "1.0.0",
            dependencies: [
              {
                from: "api",
                to: "core",
                constraint: "^1.0.0",
                targetVersion: "2.0.0",
                satisfied: false,
                issue: "Version 2.0.0 of core does not satisfy constraint ^1.0.0",
              },
              { from: "api", to: "storage", constraint: "^1.0.0", targetVersion: "1.0.0", satisfied: true },
            ],
            dependents: ["cli"],
            issues: [
              "storage -> core: Version 2.0.0 of core does not satisfy constraint ^1.0.0",
              "api -> core: Version 2.0.0 of core does not satisfy constraint ^1.0.0",
            ],
          },
        });
      });

      it("fails for a project outside the graph", () => {
        const result = coordinator.getValidationReport("ghost");
        expect(result.ok === false && result.error.message).toBe("Unknown project: ghost");
      });
    });
  });

  describe("clear", () => {
    it("forgets projects and constraints but keeps the graph", () => {
      coordinator.registerProject(createProject("api"));
      coordinator.registerProject(createProject("core"));
      coordinator.registerConstraint("api", "^1.0.0");
      coordinator.registerConstraint("core", "~1.0.0");

      coordinator.clear();

      expect(coordinator.getAllProjects()).toEqual([]);
      expect(coordinator.getConstraints("api")).toEqual([]);
      expect(coordinator.getConstraints("core")).toEqual([]);
      expect(coordinator.getVersion("api")).toBeUndefined();
      expect(names(coordinator.getAffectedProjects("core"))).toEqual(["storage", "api", "cli"]);
    });
  });

  it("rejects 2.0.0 after admitting 1.2.0 under ^1.0.0", () => {
    const api = new VersionCoordinator(new DependencyGraph(true));
    api.registerProject(createProject("api", { version: "1.0.0" }));
    api.registerConstraint("api", "^1.0.0");

    expect(api.updateVersion("api", "1.2.0").ok).toBe(true);
    const second = api.updateVersion("api", "2.0.0");
    expect(second.ok).toBe(false);
    if (!second.ok) {
      expect(second.error.kind).toBe("IncompatibleVersion");
    }
  });
});
