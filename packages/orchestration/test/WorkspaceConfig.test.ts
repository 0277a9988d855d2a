import { describe, it, expect } from "vitest";
import {
  defaultWorkspaceConfig,
  mergeConfigs,
  parseWorkspace,
  setRuleEnabled,
} from "../src/core/WorkspaceConfig.js";

describe("defaultWorkspaceConfig", () => {
  it("ships three rules with layer checks off", () => {
    const config = defaultWorkspaceConfig();
    expect(config.rules.map((r) => [r.name, r.enabled])).toEqual([
      ["no-circular-deps", true],
      ["naming-convention", true],
      ["no-cross-layer-deps", false],
    ]);
    expect(config.namingConvention).toBe("kebab-case");
    expect(config.layers).toEqual([]);
    expect(config.settings).toEqual({
      maxParallelOperations: 4,
      enableAuditLogging: true,
    });
  });

  it("returns a fresh object each call", () => {
    const first = defaultWorkspaceConfig();
    first.rules[0].enabled = false;
    expect(defaultWorkspaceConfig().rules[0].enabled).toBe(true);
  });
});

describe("mergeConfigs", () => {
  it("replaces rules by name in place and appends new ones", () => {
    const merged = mergeConfigs(defaultWorkspaceConfig(), {
      rules: [
        { name: "naming-convention", ruleType: "naming-convention", enabled: false },
        { name: "strict-layers", ruleType: "architectural-boundary", enabled: true, severity: "critical" },
      ],
    });

    expect(merged.rules.map((r) => r.name)).toEqual([
      "no-circular-deps",
      "naming-convention",
      "no-cross-layer-deps",
      "strict-layers",
    ]);
    expect(merged.rules[1].enabled).toBe(false);
    expect(merged.rules[3].severity).toBe("critical");
  });

  it("merges settings key by key", () => {
    const merged = mergeConfigs(defaultWorkspaceConfig(), { settings: { maxParallelOperations: 8 } });
    expect(merged.settings).toEqual({
      maxParallelOperations: 8,
      enableAuditLogging: true,
    });
  });

  it("replaces layers wholesale", () => {
    const base = mergeConfigs(defaultWorkspaceConfig(), { layers: [{ name: "core", pattern: "^core" }] });
    const merged = mergeConfigs(base, { layers: [{ name: "ui", pattern: "^ui" }] });
    expect(merged.layers).toEqual([{ name: "ui", pattern: "^ui" }]);
  });

  it("leaves the base untouched", () => {
    const base = defaultWorkspaceConfig();
    mergeConfigs(base, {
      namingConvention: "snake-case",
      rules: [{ name: "no-circular-deps", ruleType: "dependency-constraint", enabled: false }],
    });
    expect(base.namingConvention).toBe("kebab-case");
    expect(base.rules[0].enabled).toBe(true);
  });
});

describe("setRuleEnabled", () => {
  it("toggles a rule by name", () => {
    const result = setRuleEnabled(defaultWorkspaceConfig(), "no-cross-layer-deps", true);
    expect(result.ok && result.value.rules[2].enabled).toBe(true);
  });

  it("fails for an unknown rule", () => {
    expect(setRuleEnabled(defaultWorkspaceConfig(), "no-such-rule", true)).toEqual({
      ok: false,
      error: {
        kind: "InvalidConfiguration",
        detail: "rule not found: no-such-rule",
        message: "Invalid configuration: rule not found: no-such-rule",
      },
    });
  });
});

describe("parseWorkspace", () => {
  it("fills defaults for an empty document", () => {
    expect(parseWorkspace({})).toEqual({
      ok: true,
      value: { root: ".", projects: [], dependencies: [], config: defaultWorkspaceConfig() },
    });
  });

  it("fills optional project and dependency fields", () => {
    const result = parseWorkspace({
      root: "/repo",
      projects: [
        { path: "/repo/core", name: "core", version: "1.0.0" },
        { path: "/repo/api", name: "api", version: "0.4.1", projectType: "npm", status: "healthy" },
      ],
      dependencies: [{ from: "api", to: "core" }],
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.projects[0]).toEqual({
        path: "/repo/core",
        name: "core",
        projectType: "unknown",
        version: "1.0.0",
        status: "unknown",
      });
      expect(result.value.dependencies).toEqual([
        { from: "api", to: "core", dependencyType: "direct", versionConstraint: "" },
      ]);
    }
  });

  it("merges the file's config over the defaults", () => {
    const result = parseWorkspace({ config: { namingConvention: "camel-case", settings: { enableAuditLogging: false } } });
    expect(result.ok && result.value.config.namingConvention).toBe("camel-case");
    expect(result.ok && result.value.config.settings.enableAuditLogging).toBe(false);
    expect(result.ok && result.value.config.settings.maxParallelOperations).toBe(4);
  });

  it("reports the path of a missing field", () => {
    const result = parseWorkspace({ projects: [{ path: "/repo/core", name: "core" }] });
    expect(result.ok).toBe(false);
    if (!result.ok && result.error.kind === "InvalidConfiguration") {
      expect(result.error.detail.startsWith("projects.0.version: ")).toBe(true);
    }
  });

  it("rejects out-of-range settings", () => {
    const result = parseWorkspace({ config: { settings: { maxParallelOperations: 0 } } });
    expect(result.ok).toBe(false);
    if (!result.ok && result.error.kind === "InvalidConfiguration") {
      expect(result.error.detail.startsWith("config.settings.maxParallelOperations: ")).toBe(true);
    }
  });

  it("labels problems with the whole document as root", () => {
    const result = parseWorkspace(42);
    expect(result.ok).toBe(false);
    if (!result.ok && result.error.kind === "InvalidConfiguration") {
      expect(result.error.detail.startsWith("(root): ")).toBe(true);
    }
  });
});
