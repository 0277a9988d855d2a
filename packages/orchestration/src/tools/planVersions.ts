/**
 * version_plan - Plan (and optionally apply) a batch of version updates.
 */

import * as z from "zod/v4";
import { andThen, Ok, resultToStructuredResponse, type Result, type ToolResponse } from "@stackwise/core";
import type { ToolRegistrar } from "./types.js";
import type { VersionUpdatePlan, VersionUpdateResult } from "../core/model.js";
import type { OrchestrationError } from "../core/errors.js";

interface PlanVersionsInput {
  updates: Array<{ project: string; version: string }>;
  apply?: boolean;
}

interface PlanOutcome {
  plan: VersionUpdatePlan;
  /** null when the plan was not applied */
  applied: VersionUpdateResult[] | null;
}

export const registerPlanVersions: ToolRegistrar = (server, service) => {
  server.registerTool(
    "version_plan",
    {
      title: "Plan version updates",
      description: `Build a plan for several version updates: flags breaking changes and lists affected dependents.
With apply=true a valid plan is applied; if any step violates a constraint, all steps are rolled back.`,
      inputSchema: {
        updates: z
          .array(z.object({ project: z.string(), version: z.string() }))
          .describe("Updates in order"),
        apply: z.boolean().optional().describe("Apply the plan when it is valid (default: false)"),
      },
    },
    async (input: PlanVersionsInput): Promise<ToolResponse> => {
      const pairs = input.updates.map((u): [string, string] => [u.project, u.version]);

      const result = andThen(service.getCoordinator(), (coordinator) =>
        andThen(coordinator.planVersionUpdates(pairs), (plan): Result<PlanOutcome, OrchestrationError> => {
          if (!input.apply || !plan.isValid) return Ok({ plan, applied: null });
          return andThen(coordinator.applyVersionPlan(plan), (applied) => Ok({ plan, applied }));
        })
      );

      return resultToStructuredResponse(result, ({ plan, applied }) => {
        const lines = [
          `## Version plan (${plan.isValid ? "valid" : "invalid"})`,
          "",
          ...plan.updates.map(
            (s) =>
              `- ${s.project} -> ${s.newVersion}${s.isBreaking ? " ⚠️ breaking" : ""}` +
              (s.dependents.length > 0 ? ` (affects ${s.dependents.join(", ")})` : "")
          ),
          ...plan.validationErrors.map((e) => `❌ ${e}`),
          `Total affected: ${plan.totalAffected}`,
        ];
        if (applied) {
          lines.push("", "## Applied");
          for (const r of applied) {
            lines.push(`- ${r.project}: ${r.oldVersion} -> ${r.newVersion} ${r.success ? "✅" : `❌ ${r.error ?? ""}`}`);
          }
        }
        return { text: lines.join("\n"), data: { plan, applied } };
      });
    }
  );
};
