/**
 * Workspace configuration: schema, built-in defaults, merging and rule toggles.
 */

import * as z from "zod/v4";
import { Ok, Err, type Result } from "@stackwise/core";
import type { Workspace, WorkspaceConfig, WorkspaceRule } from "./model.js";
import { invalidConfiguration, type OrchestrationError } from "./errors.js";

const SeveritySchema = z.enum(["info", "warning", "critical"]);

export const WorkspaceRuleSchema = z.object({
  name: z.string().min(1, "rule name cannot be empty"),
  ruleType: z.enum(["dependency-constraint", "naming-convention", "architectural-boundary"]),
  enabled: z.boolean(),
  severity: SeveritySchema.optional(),
});

export const LayerSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
});

export const SettingsSchema = z.object({
  maxParallelOperations: z.number().int().min(1).max(64),
  enableAuditLogging: z.boolean(),
});

export const WorkspaceConfigSchema = z.object({
  rules: z.array(WorkspaceRuleSchema),
  namingConvention: z.enum(["kebab-case", "snake-case", "camel-case", "pascal-case"]),
  layers: z.array(LayerSchema),
  settings: SettingsSchema,
});

/**
 * Config as written in a workspace file: every section optional, merged over defaults.
 */
export const PartialWorkspaceConfigSchema = z.object({
  rules: z.array(WorkspaceRuleSchema).optional(),
  namingConvention: WorkspaceConfigSchema.shape.namingConvention.optional(),
  layers: z.array(LayerSchema).optional(),
  settings: SettingsSchema.partial().optional(),
});

export const ProjectSchema = z.object({
  path: z.string(),
  name: z.string().min(1),
  projectType: z.string().default("unknown"),
  version: z.string(),
  status: z.enum(["healthy", "warning", "critical", "unknown"]).default("unknown"),
});

export const ProjectDependencySchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  dependencyType: z.enum(["direct", "transitive", "dev"]).default("direct"),
  versionConstraint: z.string().default(""),
});

export const WorkspaceSchema = z.object({
  root: z.string().default("."),
  projects: z.array(ProjectSchema).default([]),
  dependencies: z.array(ProjectDependencySchema).default([]),
  config: PartialWorkspaceConfigSchema.default({}),
});

export type PartialWorkspaceConfig = z.infer<typeof PartialWorkspaceConfigSchema>;

export function defaultWorkspaceConfig(): WorkspaceConfig {
  return {
    rules: [
      { name: "no-circular-deps", ruleType: "dependency-constraint", enabled: true },
      { name: "naming-convention", ruleType: "naming-convention", enabled: true },
      { name: "no-cross-layer-deps", ruleType: "architectural-boundary", enabled: false },
    ],
    namingConvention: "kebab-case",
    layers: [],
    settings: {
      maxParallelOperations: 4,
      enableAuditLogging: true,
    },
  };
}

/**
 * Overlay `override` on `base`. Rules are matched by name: a match replaces the base
 * rule in place, anything else is appended. Settings merge key by key.
 */
export function mergeConfigs(base: WorkspaceConfig, override: PartialWorkspaceConfig): WorkspaceConfig {
  const rules = base.rules.map((rule) => ({ ...rule }));
  for (const rule of override.rules ?? []) {
    const at = rules.findIndex((r) => r.name === rule.name);
    if (at >= 0) {
      rules[at] = { ...rule };
    } else {
      rules.push({ ...rule });
    }
  }

  return {
    rules,
    namingConvention: override.namingConvention ?? base.namingConvention,
    layers: (override.layers ?? base.layers).map((layer) => ({ ...layer })),
    settings: { ...base.settings, ...override.settings },
  };
}

export function setRuleEnabled(
  config: WorkspaceConfig,
  ruleName: string,
  enabled: boolean
): Result<WorkspaceConfig, OrchestrationError> {
  if (!config.rules.some((rule) => rule.name === ruleName)) {
    return Err(invalidConfiguration(`rule not found: ${ruleName}`));
  }
  const rules: WorkspaceRule[] = config.rules.map((rule) =>
    rule.name === ruleName ? { ...rule, enabled } : { ...rule }
  );
  return Ok({ ...config, rules });
}

/**
 * Validate raw workspace data and merge its config over the defaults.
 */
export function parseWorkspace(input: unknown): Result<Workspace, OrchestrationError> {
  const parsed = WorkspaceSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return Err(invalidConfiguration(detail));
  }

  const { root, projects, dependencies, config } = parsed.data;
  return Ok({
    root,
    projects,
    dependencies,
    config: mergeConfigs(defaultWorkspaceConfig(), config),
  });
}
