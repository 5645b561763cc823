// backend/services/systemd-control/src/types/express.ts

import type { AppRuntime } from "../runtime/RuntimeHolder";

declare global {
  namespace Express {
    interface Request {
      /** Snapshot bound by runtimeScope(); stable for the whole request. */
      runtime?: AppRuntime;
    }
  }
}

export {}; // must be a module
