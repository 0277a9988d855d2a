/**
 * workspace_validate - Run every enabled policy rule.
 */

import { andThen, resultToStructuredResponse, type ToolResponse } from "@stackwise/core";
import { formatViolation, type ToolRegistrar } from "./types.js";

export const registerValidateWorkspace: ToolRegistrar = (server, service) => {
  server.registerTool(
    "workspace_validate",
    {
      title: "Validate workspace",
      description: `Evaluate the enabled workspace rules:
- dependency-constraint: circular dependencies (critical)
- naming-convention: project names against the configured convention
- architectural-boundary: dependencies pointing from a lower layer to a higher one`,
      inputSchema: {},
    },
    async (): Promise<ToolResponse> => {
      const result = andThen(service.getValidator(), (validator) => validator.validateAll());
      return resultToStructuredResponse(result, (validation) => {
        const lines = validation.passed
          ? ["✅ All enabled rules passed"]
          : [`Found ${validation.violations.length} violation(s):`, ...validation.violations.map(formatViolation)];
        return {
          text: lines.join("\n"),
          data: { passed: validation.passed, violations: validation.violations },
        };
      });
    }
  );
};
