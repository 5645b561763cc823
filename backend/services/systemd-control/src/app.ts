// backend/services/systemd-control/src/app.ts

/**
 * Why:
 * - Assemble on the shared builder: requestId → httpLogger → runtimeScope →
 *   CORS → /health (open) → gated service routes → 404 → error.
 * - The app never holds config itself; every request reads the holder once
 *   (runtimeScope), so SIGHUP reloads apply without rebuilding the app.
 */

import cors, { type CorsOptionsDelegate } from "cors";
import type { Express, Request } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import { SERVICE_NAME } from "./serviceName";
import type { RuntimeHolder } from "./runtime/RuntimeHolder";
import { runtimeOf, runtimeScope } from "./middleware/runtimeScope";
import { corsOptionsFor, corsOrigins } from "./security/cors";
import { health } from "./controllers/services/handlers/health";
import serviceRoutes from "./routes/serviceRoutes";

const corsFromRuntime: CorsOptionsDelegate<Request> = (req, cb) => {
  cb(null, corsOptionsFor(corsOrigins(runtimeOf(req).config.security)));
};

export function createApp(holder: RuntimeHolder): Express {
  return createServiceApp({
    serviceName: SERVICE_NAME,
    preRoutes: [runtimeScope(holder), cors(corsFromRuntime)],
    mountOpen: (r) => {
      r.get("/health", health);
      r.get("/healthz", health);
    },
    mountRoutes: (r) => {
      r.use(serviceRoutes);
    },
  });
}
