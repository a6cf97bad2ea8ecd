/**
 * Device Routes - Single Responsibility: state, info and screen capture
 */

import type { ServerResponse } from "http";
import { binaryResponse, jsonResponse } from "../helpers";
import type { FrameoController } from "../../device/controller";

export interface DeviceRouteDependencies {
  controller: FrameoController;
}

/**
 * Create device route handlers
 * @param deps Dependencies injected (Dependency Inversion)
 */
export function createDeviceRoutes(deps: DeviceRouteDependencies) {
  return {
    /**
     * GET /api/state
     * Screen power, brightness and focused app
     */
    async getState(res: ServerResponse): Promise<void> {
      jsonResponse(res, await deps.controller.state());
    },

    /**
     * GET /api/info
     */
    async getInfo(res: ServerResponse): Promise<void> {
      jsonResponse(res, await deps.controller.info());
    },

    /**
     * GET /api/screenshot
     * Returns screen as PNG
     */
    async getScreenshot(res: ServerResponse): Promise<void> {
      const png = await deps.controller.screenshot();
      binaryResponse(res, png, "image/png");
    },
  };
}
