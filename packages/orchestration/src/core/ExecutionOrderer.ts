/**
 * Execution ordering over a dependency graph.
 * Groups projects into levels whose members can run side by side.
 * A level larger than `maxParallelOperations` is split into consecutive levels.
 */

import { Ok, Err, type Result } from "@stackwise/core";
import type { ExecutionLevel, ExecutionPlan, ExecutionStrategy } from "./model.js";
import type { DependencyGraph } from "./DependencyGraph.js";
import { circularDependency, type OrchestrationError } from "./errors.js";

export interface ExecutionOrdererOptions {
  /** Cap on projects per level; unlimited when omitted */
  maxParallelOperations?: number;
}

export class ExecutionOrderer {
  private readonly maxParallel: number;

  constructor(
    private readonly graph: DependencyGraph,
    options: ExecutionOrdererOptions = {}
  ) {
    this.maxParallel = Math.max(1, options.maxParallelOperations ?? Number.POSITIVE_INFINITY);
  }

  /**
   * Build a plan for `projects`. Repeated names are planned once.
   */
  createExecutionPlan(
    projects: string[],
    strategy: ExecutionStrategy
  ): Result<ExecutionPlan, OrchestrationError> {
    const batch = unique(projects);
    switch (strategy) {
      case "level-based":
        return this.levelBasedPlan(batch);
      case "sequential": {
        const plan = this.levelBasedPlan(batch);
        if (!plan.ok) return plan;
        return Ok({
          levels: [{ level: 0, projects: plan.value.levels.flatMap((l) => l.projects) }],
          totalProjects: batch.length,
          strategy,
          maxParallelism: 1,
        });
      }
      case "full-parallel":
        return Ok(this.finish(batch.length > 0 ? [batch] : [], batch.length, strategy));
    }
  }

  /**
   * Dependencies first, flattened from the level-based plan.
   */
  determineOrder(projects: string[]): Result<string[], OrchestrationError> {
    const plan = this.levelBasedPlan(unique(projects));
    if (!plan.ok) return plan;
    return Ok(plan.value.levels.flatMap((l) => l.projects));
  }

  findParallelizationPoints(projects: string[]): Result<string[][], OrchestrationError> {
    const plan = this.levelBasedPlan(unique(projects));
    if (!plan.ok) return plan;
    return Ok(plan.value.levels.map((l) => l.projects));
  }

  /**
   * Kahn levels restricted to `projects`. Edges leaving the batch are ignored.
   */
  private levelBasedPlan(projects: string[]): Result<ExecutionPlan, OrchestrationError> {
    const batch = new Set(projects);
    const pending = new Map<string, number>();
    for (const name of batch) {
      const inBatch = this.graph.getDependencies(name).filter((d) => batch.has(d.name));
      pending.set(name, inBatch.length);
    }

    const groups: string[][] = [];
    const done = new Set<string>();

    while (done.size < batch.size) {
      const ready = [...batch].filter((name) => !done.has(name) && pending.get(name) === 0);
      if (ready.length === 0) {
        return Err(circularDependency([...batch].filter((name) => !done.has(name))));
      }

      groups.push(ready);

      for (const name of ready) {
        done.add(name);
        for (const dependent of this.graph.getDependents(name)) {
          const count = pending.get(dependent.name);
          if (count !== undefined && !done.has(dependent.name)) {
            pending.set(dependent.name, count - 1);
          }
        }
      }
    }

    return Ok(this.finish(groups, batch.size, "level-based"));
  }

  /**
   * Split each group at the parallelism cap and number the resulting levels.
   */
  private finish(groups: string[][], totalProjects: number, strategy: ExecutionStrategy): ExecutionPlan {
    const levels: ExecutionLevel[] = [];
    for (const group of groups) {
      for (let i = 0; i < group.length; i += this.maxParallel) {
        levels.push({ level: levels.length, projects: group.slice(i, i + this.maxParallel) });
      }
    }
    return {
      levels,
      totalProjects,
      strategy,
      maxParallelism: levels.reduce((max, l) => Math.max(max, l.projects.length), 0),
    };
  }
}

function unique(names: string[]): string[] {
  return [...new Set(names)];
}
