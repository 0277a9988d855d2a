/**
 * Structured errors for the orchestration engine.
 * Every variant names the identifiers involved so callers can render or remediate.
 */

export type OrchestrationError =
  | { kind: "DuplicateProject"; project: string; message: string }
  | { kind: "UnknownProject"; project: string; message: string }
  | { kind: "InvalidVersion"; version: string; message: string }
  | {
      kind: "IncompatibleVersion";
      project: string;
      version: string;
      constraint: string;
      message: string;
    }
  | {
      kind: "BreakingChange";
      project: string;
      dependent: string;
      constraint: string;
      message: string;
    }
  | { kind: "CircularDependency"; cycle: string[]; message: string }
  | { kind: "InvalidConfiguration"; detail: string; message: string };

export type OrchestrationErrorKind = OrchestrationError["kind"];

export function duplicateProject(project: string): OrchestrationError {
  return { kind: "DuplicateProject", project, message: `Project already registered: ${project}` };
}

export function unknownProject(project: string): OrchestrationError {
  return { kind: "UnknownProject", project, message: `Unknown project: ${project}` };
}

export function invalidVersion(version: string): OrchestrationError {
  return { kind: "InvalidVersion", version, message: `Invalid version: "${version}"` };
}

export function incompatibleVersion(
  project: string,
  version: string,
  constraint: string
): OrchestrationError {
  return {
    kind: "IncompatibleVersion",
    project,
    version,
    constraint,
    message: `Version ${version} of ${project} does not satisfy constraint ${constraint}`,
  };
}

export function breakingChange(project: string, dependent: string, constraint: string): OrchestrationError {
  return {
    kind: "BreakingChange",
    project,
    dependent,
    constraint,
    message: `Breaking change in ${project} would break dependent project ${dependent} (constraint: ${constraint})`,
  };
}

export function circularDependency(cycle: string[]): OrchestrationError {
  return {
    kind: "CircularDependency",
    cycle,
    message: `Circular dependency: ${cycle.join(" -> ")}`,
  };
}

export function invalidConfiguration(detail: string): OrchestrationError {
  return { kind: "InvalidConfiguration", detail, message: `Invalid configuration: ${detail}` };
}

/**
 * The error's text without the kind prefix some messages carry.
 */
export function errorDetail(error: OrchestrationError): string {
  return error.kind === "InvalidConfiguration" ? error.detail : error.message;
}
