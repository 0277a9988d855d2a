/**
 * @stackwise/orchestration
 * Dependency graph, version coordination and policy rules for multi-project workspaces.
 */

// Model
export type {
  Project,
  ProjectStatus,
  ProjectDependency,
  DependencyType,
  Version,
  VersionConstraint,
  ConstraintOperator,
  VersionUpdateResult,
  VersionUpdateStep,
  VersionUpdatePlan,
  Severity,
  RuleType,
  NamingConvention,
  WorkspaceRule,
  LayerDefinition,
  WorkspaceSettings,
  WorkspaceConfig,
  Workspace,
  Violation,
  ValidationResult,
  ExecutionStrategy,
  ExecutionLevel,
  ExecutionPlan,
  GraphStats,
  DependencyCheck,
  DependencyReport,
  StatusCounts,
  StatusReport,
  AggregatedMetrics,
  ProjectHealth,
  ComplianceSummary,
} from "./core/model.js";

// Errors
export type { OrchestrationError, OrchestrationErrorKind } from "./core/errors.js";
export {
  duplicateProject,
  unknownProject,
  invalidVersion,
  incompatibleVersion,
  breakingChange,
  circularDependency,
  invalidConfiguration,
  errorDetail,
} from "./core/errors.js";

// Engine
export {
  parseVersion,
  formatVersion,
  compareVersions,
  parseConstraint,
  satisfiesConstraint,
  isBreakingChange,
} from "./core/semver.js";
export { DependencyGraph } from "./core/DependencyGraph.js";
export { VersionCoordinator } from "./core/VersionCoordinator.js";
export { RulesValidator, isValidProjectName } from "./core/RulesValidator.js";
export { ExecutionOrderer, type ExecutionOrdererOptions } from "./core/ExecutionOrderer.js";
export { StatusReporter } from "./core/StatusReporter.js";

// Configuration
export type { PartialWorkspaceConfig } from "./core/WorkspaceConfig.js";
export {
  WorkspaceSchema,
  WorkspaceConfigSchema,
  defaultWorkspaceConfig,
  mergeConfigs,
  setRuleEnabled,
  parseWorkspace,
} from "./core/WorkspaceConfig.js";
export { loadWorkspaceFile, DEFAULT_WORKSPACE_FILE } from "./infrastructure/WorkspaceLoader.js";

// Service
export { WorkspaceService, type WorkspaceSummary } from "./WorkspaceService.js";

// Tools
export { registerAllTools, type Services } from "./tools/index.js";
