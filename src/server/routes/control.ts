/**
 * Control Routes - Single Responsibility: screen, input and app control
 */

import type { IncomingMessage, ServerResponse } from "http";
import { jsonResponse, parseBody } from "../helpers";
import { isAppAction, type FrameoController } from "../../device/controller";
import { DEFAULT_SWIPE_DURATION } from "../../device/commands";
import { SessionError } from "../../session/errors";

export interface ControlDependencies {
  controller: FrameoController;
}

/**
 * Create control route handlers
 * @param deps Dependencies injected (Dependency Inversion)
 */
export function createControlRoutes(deps: ControlDependencies) {
  const { controller } = deps;

  return {
    /**
     * POST /api/wake
     */
    async postWake(res: ServerResponse): Promise<void> {
      await controller.wake();
      jsonResponse(res, { status: "awake" });
    },

    /**
     * POST /api/sleep
     */
    async postSleep(res: ServerResponse): Promise<void> {
      await controller.sleepScreen();
      jsonResponse(res, { status: "asleep" });
    },

    /**
     * POST /api/brightness
     * Body: { level } (0-255)
     */
    async postBrightness(req: IncomingMessage, res: ServerResponse): Promise<void> {
      const { level } = await parseBody(req);
      await controller.setBrightness(level);
      jsonResponse(res, { status: "brightness_set", level });
    },

    /**
     * POST /api/tap
     * Body: { x, y }
     */
    async postTap(req: IncomingMessage, res: ServerResponse): Promise<void> {
      const { x, y } = await parseBody(req);
      await controller.tap(x, y);
      jsonResponse(res, { status: "tapped", x, y });
    },

    /**
     * POST /api/swipe
     * Body: { x1, y1, x2, y2, duration? }
     */
    async postSwipe(req: IncomingMessage, res: ServerResponse): Promise<void> {
      const { x1, y1, x2, y2, duration } = await parseBody(req);
      await controller.swipe({ x1, y1, x2, y2, duration });
      jsonResponse(res, {
        status: "swiped",
        x1,
        y1,
        x2,
        y2,
        duration: duration ?? DEFAULT_SWIPE_DURATION,
      });
    },

    /**
     * POST /api/keyevent
     * Body: { key } - KEYCODE_* name or numeric code
     */
    async postKeyevent(req: IncomingMessage, res: ServerResponse): Promise<void> {
      const { key } = await parseBody(req);
      await controller.keyevent(key);
      jsonResponse(res, { status: "key_sent", key });
    },

    /**
     * POST /api/app
     * Body: { action: "open" | "restart" | "force-stop" }
     */
    async postApp(req: IncomingMessage, res: ServerResponse): Promise<void> {
      const { action } = await parseBody(req);
      if (!isAppAction(action)) {
        throw new SessionError(
          "InvalidRequest",
          "Invalid action. Use 'open', 'restart' or 'force-stop'"
        );
      }
      await controller.app(action);
      jsonResponse(res, { status: action, package: controller.appPackage });
    },
  };
}
