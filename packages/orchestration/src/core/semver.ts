/**
 * Plain `major.minor.patch` versions, read and compared with the semver package,
 * and the three constraint forms workspaces declare (`^`, `~`, `>=`).
 */

import * as semver from "semver";
import { Ok, Err, type Result } from "@stackwise/core";
import type { ConstraintOperator, Version, VersionConstraint } from "./model.js";
import { invalidConfiguration, invalidVersion, type OrchestrationError } from "./errors.js";

/**
 * Accepts exactly `major.minor.patch`: no prefix, prerelease, build tag or padding.
 */
export function parseVersion(text: string): Result<Version, OrchestrationError> {
  if (semver.valid(text) !== text || semver.prerelease(text) !== null) {
    return Err(invalidVersion(text));
  }
  return Ok({ major: semver.major(text), minor: semver.minor(text), patch: semver.patch(text) });
}

export function formatVersion(version: Version): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * -1 when a < b, 0 when equal, 1 when a > b.
 */
export function compareVersions(a: Version, b: Version): number {
  return semver.compare(formatVersion(a), formatVersion(b));
}

/**
 * Admission test per operator. `declared` is the version written in the constraint.
 */
const CONSTRAINT_RULES: Record<ConstraintOperator, (candidate: Version, declared: Version) => boolean> = {
  "^": (candidate, declared) =>
    candidate.major === declared.major && compareVersions(candidate, declared) >= 0,
  "~": (candidate, declared) =>
    candidate.major === declared.major &&
    candidate.minor === declared.minor &&
    compareVersions(candidate, declared) >= 0,
  ">=": (candidate, declared) => compareVersions(candidate, declared) >= 0,
};

// Longest operator first so ">=" is not read as an unknown ">".
const OPERATORS: ConstraintOperator[] = [">=", "^", "~"];

export function parseConstraint(text: string): Result<VersionConstraint, OrchestrationError> {
  const raw = text.trim();
  const operator = OPERATORS.find((op) => raw.startsWith(op));
  if (!operator) {
    return Err(invalidConfiguration(`unsupported version constraint "${raw}"`));
  }

  const version = parseVersion(raw.slice(operator.length).trim());
  if (!version.ok) {
    return Err(invalidConfiguration(`malformed version in constraint "${raw}"`));
  }

  return Ok({ operator, version: version.value, raw });
}

export function satisfiesConstraint(version: Version, constraint: VersionConstraint): boolean {
  return CONSTRAINT_RULES[constraint.operator](version, constraint.version);
}

/**
 * A change is breaking when the major component differs, in either direction.
 */
export function isBreakingChange(current: Version, candidate: Version): boolean {
  return semver.major(formatVersion(current)) !== semver.major(formatVersion(candidate));
}
