// backend/services/systemd-control/src/controllers/services/handlers/health.ts
import type { Request, Response } from "express";
import { runtimeOf } from "../../../middleware/runtimeScope";

// Liveness only: no policy, no backend.
export function health(req: Request, res: Response): void {
  res.json(runtimeOf(req).gateway.health());
}
