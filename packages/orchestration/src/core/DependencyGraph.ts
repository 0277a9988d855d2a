/**
 * In-memory project dependency graph.
 * Projects are nodes; each ProjectDependency is a directed edge from dependent to dependency.
 * Cycles are allowed at insertion time and reported by detectCycles().
 */

import { Ok, Err, type Result } from "@stackwise/core";
import type { GraphStats, Project, ProjectDependency, ProjectStatus } from "./model.js";
import {
  circularDependency,
  duplicateProject,
  unknownProject,
  type OrchestrationError,
} from "./errors.js";

type Direction = "out" | "in";

interface Link {
  direction: Direction;
  edge: ProjectDependency;
}

/**
 * Edge index for one graph instance. Both layouts answer queries in
 * time proportional to the edges touching the queried project.
 */
interface EdgeIndex {
  add(edge: ProjectDependency): void;
  edges(name: string, direction: Direction): ProjectDependency[];
  remove(from: string, to: string): number;
  clear(): void;
}

/**
 * Separate forward (from -> edges) and reverse (to -> edges) maps.
 */
class MirroredIndex implements EdgeIndex {
  private outgoing = new Map<string, ProjectDependency[]>();
  private incoming = new Map<string, ProjectDependency[]>();

  add(edge: ProjectDependency): void {
    append(this.outgoing, edge.from, edge);
    append(this.incoming, edge.to, edge);
  }

  edges(name: string, direction: Direction): ProjectDependency[] {
    const map = direction === "out" ? this.outgoing : this.incoming;
    return map.get(name) ?? [];
  }

  remove(from: string, to: string): number {
    const matches = (e: ProjectDependency): boolean => e.from === from && e.to === to;
    const removed = prune(this.outgoing, from, matches);
    prune(this.incoming, to, matches);
    return removed;
  }

  clear(): void {
    this.outgoing.clear();
    this.incoming.clear();
  }
}

/**
 * One map holding every edge under both endpoints, tagged with its direction.
 */
class SymmetricIndex implements EdgeIndex {
  private links = new Map<string, Link[]>();

  add(edge: ProjectDependency): void {
    append(this.links, edge.from, { direction: "out", edge });
    append(this.links, edge.to, { direction: "in", edge });
  }

  edges(name: string, direction: Direction): ProjectDependency[] {
    const links = this.links.get(name) ?? [];
    return links.filter((l) => l.direction === direction).map((l) => l.edge);
  }

  remove(from: string, to: string): number {
    const removed = prune(
      this.links,
      from,
      (l) => l.direction === "out" && l.edge.from === from && l.edge.to === to
    );
    prune(this.links, to, (l) => l.direction === "in" && l.edge.from === from && l.edge.to === to);
    return removed;
  }

  clear(): void {
    this.links.clear();
  }
}

function append<T>(map: Map<string, T[]>, key: string, item: T): void {
  const list = map.get(key);
  if (list) {
    list.push(item);
  } else {
    map.set(key, [item]);
  }
}

function prune<T>(map: Map<string, T[]>, key: string, matches: (item: T) => boolean): number {
  const list = map.get(key);
  if (!list) return 0;
  const kept = list.filter((item) => !matches(item));
  if (kept.length === 0) {
    map.delete(key);
  } else {
    map.set(key, kept);
  }
  return list.length - kept.length;
}

export class DependencyGraph {
  private projects = new Map<string, Project>();
  private order: ProjectDependency[] = [];
  private index: EdgeIndex;

  constructor(readonly directed: boolean = true) {
    this.index = directed ? new MirroredIndex() : new SymmetricIndex();
  }

  get isDirected(): boolean {
    return this.directed;
  }

  /**
   * Register a project. Fails if the name is taken; the existing project is left as it was.
   */
  addProject(project: Project): Result<void, OrchestrationError> {
    if (this.projects.has(project.name)) {
      return Err(duplicateProject(project.name));
    }
    this.projects.set(project.name, { ...project });
    return Ok(undefined);
  }

  /**
   * Add an edge. Both endpoints must already be registered.
   */
  addDependency(dependency: ProjectDependency): Result<void, OrchestrationError> {
    for (const name of [dependency.from, dependency.to]) {
      if (!this.projects.has(name)) {
        return Err(unknownProject(name));
      }
    }

    const edge = { ...dependency };
    this.index.add(edge);
    this.order.push(edge);
    return Ok(undefined);
  }

  /**
   * Remove every edge from `from` to `to`. Returns how many were removed.
   */
  removeDependency(from: string, to: string): number {
    const removed = this.index.remove(from, to);
    if (removed > 0) {
      this.order = this.order.filter((e) => !(e.from === from && e.to === to));
    }
    return removed;
  }

  getProject(name: string): Project | undefined {
    const project = this.projects.get(name);
    return project ? { ...project } : undefined;
  }

  hasProject(name: string): boolean {
    return this.projects.has(name);
  }

  hasDependency(from: string, to: string): boolean {
    return this.index.edges(from, "out").some((e) => e.to === to);
  }

  /**
   * All projects, in registration order.
   */
  getProjects(): Project[] {
    return Array.from(this.projects.values(), (p) => ({ ...p }));
  }

  /**
   * All edges, in insertion order.
   */
  getAllDependencies(): ProjectDependency[] {
    return this.order.map((e) => ({ ...e }));
  }

  setProjectStatus(name: string, status: ProjectStatus): Result<void, OrchestrationError> {
    const project = this.projects.get(name);
    if (!project) {
      return Err(unknownProject(name));
    }
    project.status = status;
    return Ok(undefined);
  }

  /**
   * Projects `name` depends on directly. Unique, first-seen order; empty for unknown names.
   */
  getDependencies(name: string): Project[] {
    return this.snapshot(this.neighbors(name, "out"));
  }

  /**
   * Projects that depend on `name` directly. Unique, first-seen order; empty for unknown names.
   */
  getDependents(name: string): Project[] {
    return this.snapshot(this.neighbors(name, "in"));
  }

  /**
   * Everything reachable along outgoing edges, breadth-first, excluding `name`.
   */
  getTransitiveDependencies(name: string): Project[] {
    return this.snapshot(this.reachable(name, "out"));
  }

  /**
   * Everything that reaches `name`, breadth-first, excluding `name`.
   */
  getTransitiveDependents(name: string): Project[] {
    return this.snapshot(this.reachable(name, "in"));
  }

  canReach(from: string, to: string): boolean {
    if (from === to) return true;
    return this.reachable(from, "out").includes(to);
  }

  /**
   * Whether adding `from -> to` would close a cycle.
   */
  wouldCreateCycle(from: string, to: string): boolean {
    return this.canReach(to, from);
  }

  /**
   * Enumerate elementary cycles (Johnson's algorithm, iterative).
   *
   * Projects are ranked by registration order. Each round takes the cyclic
   * strongly connected component with the lowest-ranked member among projects
   * not yet used as a start, and lists every circuit through that member.
   * Each cycle starts at its lowest-ranked project and is reported once.
   */
  detectCycles(): string[][] {
    const order = [...this.projects.keys()];
    const rank = new Map(order.map((name, i) => [name, i]));
    const cycles: string[][] = [];

    let start = 0;
    while (start < order.length) {
      const component = this.lowestCyclicComponent(order, rank, start);
      if (!component) break;

      for (const cycle of this.circuits(component.root, component.members)) cycles.push(cycle);
      start = (rank.get(component.root) ?? order.length) + 1;
    }

    return cycles;
  }

  /**
   * Order projects so every dependency precedes its dependents (Kahn's algorithm).
   * Ties keep registration order.
   */
  topologicalSort(): Result<string[], OrchestrationError> {
    const remaining = new Map<string, number>();
    for (const name of this.projects.keys()) {
      remaining.set(name, this.neighbors(name, "out").length);
    }

    const queue = [...remaining].filter(([, count]) => count === 0).map(([name]) => name);
    const sorted: string[] = [];

    while (queue.length > 0) {
      const name = queue.shift();
      if (name === undefined) break;
      sorted.push(name);

      for (const dependent of this.neighbors(name, "in")) {
        const count = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, count);
        if (count === 0) queue.push(dependent);
      }
    }

    if (sorted.length !== this.projects.size) {
      const blocked = [...this.projects.keys()].filter((n) => !sorted.includes(n));
      return Err(circularDependency(blocked));
    }
    return Ok(sorted);
  }

  /**
   * Deep copy. Later changes to either graph are not seen by the other.
   */
  clone(): DependencyGraph {
    const copy = new DependencyGraph(this.directed);
    for (const [name, project] of this.projects) {
      copy.projects.set(name, { ...project });
    }
    for (const edge of this.order) {
      const copied = { ...edge };
      copy.index.add(copied);
      copy.order.push(copied);
    }
    return copy;
  }

  stats(): GraphStats {
    return {
      projects: this.projects.size,
      dependencies: this.order.length,
    };
  }

  isEmpty(): boolean {
    return this.projects.size === 0;
  }

  clear(): void {
    this.projects.clear();
    this.order = [];
    this.index.clear();
  }

  private neighbors(name: string, direction: Direction): string[] {
    const names = new Set<string>();
    for (const edge of this.index.edges(name, direction)) {
      names.add(direction === "out" ? edge.to : edge.from);
    }
    return [...names];
  }

  private reachable(start: string, direction: Direction): string[] {
    const visited = new Set<string>([start]);
    const result: string[] = [];
    const queue = this.neighbors(start, direction);

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      result.push(current);

      for (const next of this.neighbors(current, direction)) {
        if (!visited.has(next)) queue.push(next);
      }
    }

    return result;
  }

  /**
   * Tarjan's strongly connected components over projects ranked `from` or later.
   * Returns the cyclic component (more than one member, or a self-edge) whose
   * lowest-ranked member ranks lowest.
   */
  private lowestCyclicComponent(
    order: string[],
    rank: Map<string, number>,
    from: number
  ): { root: string; members: Set<string> } | undefined {
    const rankOf = (name: string): number => rank.get(name) ?? -1;
    const inScope = (name: string): string[] =>
      this.neighbors(name, "out").filter((next) => rankOf(next) >= from);

    const index = new Map<string, number>();
    const low = new Map<string, number>();
    const onStack = new Set<string>();
    const stack: string[] = [];
    let counter = 0;
    let best: { root: string; members: Set<string> } | undefined;

    const visit = (name: string): { name: string; next: number; neighbors: string[] } => {
      index.set(name, counter);
      low.set(name, counter);
      counter++;
      stack.push(name);
      onStack.add(name);
      return { name, next: 0, neighbors: inScope(name) };
    };

    for (let i = from; i < order.length; i++) {
      if (index.has(order[i])) continue;
      const frames = [visit(order[i])];

      while (frames.length > 0) {
        const frame = frames[frames.length - 1];

        if (frame.next < frame.neighbors.length) {
          const next = frame.neighbors[frame.next++];
          if (!index.has(next)) {
            frames.push(visit(next));
          } else if (onStack.has(next)) {
            low.set(frame.name, Math.min(low.get(frame.name) ?? 0, index.get(next) ?? 0));
          }
          continue;
        }

        frames.pop();
        const frameLow = low.get(frame.name) ?? 0;
        const parent = frames[frames.length - 1];
        if (parent) {
          low.set(parent.name, Math.min(low.get(parent.name) ?? 0, frameLow));
        }
        if (frameLow !== index.get(frame.name)) continue;

        const members = new Set<string>();
        for (;;) {
          const member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          members.add(member);
          if (member === frame.name) break;
        }

        if (members.size === 1 && !this.hasDependency(frame.name, frame.name)) continue;
        const root = [...members].reduce((a, b) => (rankOf(b) < rankOf(a) ? b : a));
        if (!best || rankOf(root) < rankOf(best.root)) {
          best = { root, members };
        }
      }
    }

    return best;
  }

  /**
   * Every elementary circuit through `root` inside `members`, found with
   * Johnson's blocked-set search.
   */
  private circuits(root: string, members: Set<string>): string[][] {
    const found: string[][] = [];
    const blocked = new Set<string>([root]);
    const waiting = new Map<string, Set<string>>();
    const path = [root];
    const successors = (name: string): string[] =>
      this.neighbors(name, "out").filter((next) => members.has(next));

    const unblock = (name: string): void => {
      const pending = [name];
      for (;;) {
        const current = pending.pop();
        if (current === undefined) break;
        blocked.delete(current);
        const dependents = waiting.get(current);
        if (!dependents) continue;
        waiting.delete(current);
        for (const next of dependents) {
          if (blocked.has(next)) pending.push(next);
        }
      }
    };

    const frames = [{ name: root, next: 0, neighbors: successors(root), closed: false }];

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];

      if (frame.next < frame.neighbors.length) {
        const next = frame.neighbors[frame.next++];
        if (next === root) {
          found.push([...path]);
          frame.closed = true;
        } else if (!blocked.has(next)) {
          blocked.add(next);
          path.push(next);
          frames.push({ name: next, next: 0, neighbors: successors(next), closed: false });
        }
        continue;
      }

      frames.pop();
      path.pop();
      if (frame.closed) {
        unblock(frame.name);
      } else {
        for (const next of frame.neighbors) {
          const list = waiting.get(next);
          if (list) {
            list.add(frame.name);
          } else {
            waiting.set(next, new Set([frame.name]));
          }
        }
      }

      const parent = frames[frames.length - 1];
      if (parent && frame.closed) parent.closed = true;
    }

    return found;
  }

  private snapshot(names: string[]): Project[] {
    return names.flatMap((name) => {
      const project = this.projects.get(name);
      return project ? [{ ...project }] : [];
    });
  }
}
