// backend/services/shared/src/app/createServiceApp.ts

/**
 * Why:
 * - One assembly order for every service so logging, correlation ids and
 *   error envelopes behave the same everywhere:
 *     requestId → http logger → pre-route middleware (e.g. CORS) →
 *     open routes (health) → guarded routes → 404 → error handler.
 *
 * Notes:
 * - No body parsers: mount them in `mountRoutes` where a route needs one.
 * - Guards belong to the routes they guard, so unknown paths still 404.
 */

import express, { type Express, type RequestHandler } from "express";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import { notFoundHandler, errorHandler } from "../middleware/problemJson";

export type CreateServiceAppOptions = {
  /** Service slug; tags access logs. */
  serviceName: string;
  /** Runs for every request after logging, before any route. */
  preRoutes?: RequestHandler[];
  /** Open routes (health/liveness). */
  mountOpen?: (router: express.Router) => void;
  /** The service's own routes; guards are attached per route. */
  mountRoutes: (router: express.Router) => void;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(opts.serviceName));
  for (const mw of opts.preRoutes ?? []) app.use(mw);

  // ── Open routes ─────────────────────────────────────────────────────────────
  if (opts.mountOpen) {
    const open = express.Router();
    opts.mountOpen(open);
    app.use(open);
  }

  // ── Routes ──────────────────────────────────────────────────────────────────
  const api = express.Router();
  opts.mountRoutes(api);
  app.use(api);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
