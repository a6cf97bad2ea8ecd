/**
 * Health Routes - Single Responsibility: service and device status
 */

import type { ServerResponse } from "http";
import { jsonResponse } from "../helpers";
import type { HealthChecker } from "../../health/checker";
import type { SessionStatus } from "../../session/types";

export interface HealthRouteDependencies {
  status: () => SessionStatus;
  checker: HealthChecker;
  getClientCount: () => number;
}

/**
 * Create health route handlers
 * @param deps Dependencies injected (Dependency Inversion)
 */
export function createHealthRoutes(deps: HealthRouteDependencies) {
  return {
    /**
     * GET /api/health
     * Returns session status and event client count
     */
    get(res: ServerResponse): void {
      const status = deps.status();
      if (status.state === "none") {
        jsonResponse(res, { connected: false, state: "none", clients: deps.getClientCount() });
        return;
      }
      jsonResponse(res, {
        connected: true,
        state: status.state,
        endpoint: status.endpoint,
        connectedAt: status.connectedAt.toISOString(),
        clients: deps.getClientCount(),
      });
    },

    /**
     * GET /api/health/report
     * Full diagnostic report with suggestions
     */
    async getReport(res: ServerResponse): Promise<void> {
      jsonResponse(res, await deps.checker.check());
    },
  };
}
