/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * context.ts: Collaborators shared by the HTTP routes.
 */
import type { CaptureController } from "../capture/controller.js";
import type { Config } from "../types/index.js";
import type { ImageUploader } from "../upload/index.js";
import type { PreviewEncoder } from "../capture/preview.js";
import type { StatusHub } from "../streaming/statusHub.js";
import type { StreamManager } from "../streaming/manager.js";

/**
 * Everything a route handler may need. Created once at startup and passed to every setup function.
 */
export interface AppContext {

  capture: CaptureController;

  // Directory served at /captures, when the local uploader is in use.
  captureDir: string;
  config: Config;
  hub: StatusHub;
  manager: StreamManager;
  preview: PreviewEncoder;
  uploader: ImageUploader;
}
