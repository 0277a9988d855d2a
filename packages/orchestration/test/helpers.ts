import type { Project, ProjectDependency, Workspace } from "../src/core/model.js";
import { defaultWorkspaceConfig } from "../src/core/WorkspaceConfig.js";

export const createProject = (name: string, overrides?: Partial<Project>): Project => ({
  path: `/workspace/${name}`,
  name,
  projectType: "npm",
  version: "1.0.0",
  status: "healthy",
  ...overrides,
});

export const dependsOn = (
  from: string,
  to: string,
  overrides?: Partial<ProjectDependency>
): ProjectDependency => ({
  from,
  to,
  dependencyType: "direct",
  versionConstraint: "^1.0.0",
  ...overrides,
});

export const createWorkspace = (
  names: string[],
  edges: Array<[string, string]>,
  overrides?: Partial<Workspace>
): Workspace => ({
  root: "/workspace",
  projects: names.map((n) => createProject(n)),
  dependencies: edges.map(([from, to]) => dependsOn(from, to)),
  config: defaultWorkspaceConfig(),
  ...overrides,
});
