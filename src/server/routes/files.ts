/**
 * File Routes - Single Responsibility: photo upload and file download
 */

import type { IncomingMessage, ServerResponse } from "http";
import { binaryResponse, contentDisposition, jsonResponse, parseBody, readRawBody } from "../helpers";
import type { FrameoController } from "../../device/controller";
import { basename } from "../../device/commands";
import { SessionError } from "../../session/errors";

export interface FileRouteDependencies {
  controller: FrameoController;
}

/**
 * Create file route handlers
 * @param deps Dependencies injected (Dependency Inversion)
 */
export function createFileRoutes(deps: FileRouteDependencies) {
  return {
    /**
     * POST /api/upload?filename=photo.jpg&destination=/sdcard/Frameo
     * Body: raw file bytes
     */
    async postUpload(req: IncomingMessage, res: ServerResponse, query: URLSearchParams): Promise<void> {
      const filename = query.get("filename");
      if (!filename) {
        throw new SessionError("InvalidRequest", "Missing 'filename' query parameter");
      }
      const data = await readRawBody(req);
      if (data.byteLength === 0) {
        throw new SessionError("InvalidRequest", "No file data in request body");
      }
      const remotePath = await deps.controller.upload(
        filename,
        data,
        query.get("destination") ?? undefined
      );
      jsonResponse(res, { status: "uploaded", remotePath, size: data.byteLength });
    },

    /**
     * POST /api/download
     * Body: { remotePath }
     */
    async postDownload(req: IncomingMessage, res: ServerResponse): Promise<void> {
      const { remotePath } = await parseBody(req);
      if (typeof remotePath !== "string" || !remotePath.trim()) {
        throw new SessionError("InvalidRequest", "Missing 'remotePath'");
      }
      const file = await deps.controller.download(remotePath);
      binaryResponse(res, file.data, file.contentType, {
        "Content-Disposition": contentDisposition(basename(remotePath)),
      });
    },
  };
}
