/**
 * Core domain types for workspace orchestration.
 */

export type ProjectStatus = "healthy" | "warning" | "critical" | "unknown";

/**
 * A project registered in the workspace. The name is the unique key.
 */
export interface Project {
  /** Path to the project root */
  path: string;
  name: string;
  /** Build tool / ecosystem, e.g. "npm" or "cargo" */
  projectType: string;
  /** Semver string, e.g. "1.4.2" */
  version: string;
  status: ProjectStatus;
}

export type DependencyType = "direct" | "transitive" | "dev";

/**
 * A directed edge: `from` depends on `to`.
 * Several edges may connect the same pair.
 */
export interface ProjectDependency {
  from: string;
  to: string;
  dependencyType: DependencyType;
  /** Range `from` requires of `to`, e.g. "^1.2.0" */
  versionConstraint: string;
}

export interface Version {
  major: number;
  minor: number;
  patch: number;
}

export type ConstraintOperator = "^" | "~" | ">=";

export interface VersionConstraint {
  operator: ConstraintOperator;
  version: Version;
  /** Original text, trimmed */
  raw: string;
}

export interface VersionUpdateResult {
  project: string;
  oldVersion: string;
  newVersion: string;
  /** Transitive dependents of the updated project */
  affectedProjects: string[];
  /** Always equal to `error === undefined` */
  success: boolean;
  error?: string;
}

/**
 * One edge's declared constraint checked against the target's current version.
 */
export interface DependencyCheck {
  from: string;
  to: string;
  constraint: string;
  /** Current version of `to`; undefined when it is not registered */
  targetVersion: string | undefined;
  satisfied: boolean;
  /** Why the check failed */
  issue?: string;
}

export interface DependencyReport {
  project: string;
  version: string | undefined;
  /** Constrained edges leaving the project */
  dependencies: DependencyCheck[];
  /** Direct dependents */
  dependents: string[];
  /** Every unsatisfied constraint in the workspace */
  issues: string[];
}

export interface VersionUpdateStep {
  project: string;
  newVersion: string;
  dependents: string[];
  isBreaking: boolean;
}

export interface VersionUpdatePlan {
  updates: VersionUpdateStep[];
  /** Distinct dependents across all steps */
  totalAffected: number;
  /** Every pair named a registered project and a parseable version */
  isValid: boolean;
  validationErrors: string[];
}

export type Severity = "info" | "warning" | "critical";

export type RuleType = "dependency-constraint" | "naming-convention" | "architectural-boundary";

export type NamingConvention = "kebab-case" | "snake-case" | "camel-case" | "pascal-case";

export interface WorkspaceRule {
  name: string;
  ruleType: RuleType;
  enabled: boolean;
  /** Overrides the rule kind's default severity where the kind allows it */
  severity?: Severity;
}

/**
 * An architectural layer. Layers are ordered from foundation (index 0) upward.
 */
export interface LayerDefinition {
  name: string;
  /** RegExp source matched against project names */
  pattern: string;
}

export interface WorkspaceSettings {
  /** Largest number of projects placed in one execution level */
  maxParallelOperations: number;
  /** Log a summary line to stderr when a workspace is loaded */
  enableAuditLogging: boolean;
}

export interface WorkspaceConfig {
  rules: WorkspaceRule[];
  namingConvention: NamingConvention;
  layers: LayerDefinition[];
  settings: WorkspaceSettings;
}

/**
 * A full snapshot of everything under orchestration.
 */
export interface Workspace {
  root: string;
  projects: Project[];
  dependencies: ProjectDependency[];
  config: WorkspaceConfig;
}

export interface Violation {
  ruleName: string;
  ruleType: RuleType;
  severity: Severity;
  description: string;
  /** Never empty */
  affectedProjects: string[];
}

export interface ValidationResult {
  /** True exactly when there are no violations */
  passed: boolean;
  violations: Violation[];
}

export type ExecutionStrategy = "sequential" | "level-based" | "full-parallel";

export interface ExecutionLevel {
  level: number;
  projects: string[];
}

export interface ExecutionPlan {
  levels: ExecutionLevel[];
  totalProjects: number;
  strategy: ExecutionStrategy;
  maxParallelism: number;
}

export interface GraphStats {
  projects: number;
  dependencies: number;
}

export type StatusCounts = Record<ProjectStatus, number>;

export interface StatusReport {
  healthStatus: ProjectStatus;
  /** Share of projects named in no violation, 0 to 1 */
  complianceScore: number;
  totalProjects: number;
  totalDependencies: number;
  statusCounts: StatusCounts;
  projectStatuses: Record<string, ProjectStatus>;
  violations: number;
}

export interface AggregatedMetrics {
  healthyPercentage: number;
  warningPercentage: number;
  criticalPercentage: number;
  averageDependencies: number;
  maxDependencies: number;
  minDependencies: number;
  totalRules: number;
  enabledRules: number;
  disabledRules: number;
}

export interface ProjectHealth {
  name: string;
  status: ProjectStatus;
  dependencyCount: number;
  dependentCount: number;
  /** Violations naming this project */
  violationCount: number;
}

export interface ComplianceSummary {
  totalRules: number;
  enabledRules: number;
  complianceScore: number;
  isCompliant: boolean;
  issues: string[];
}
