// backend/services/systemd-control/src/controllers/services/handlers/control.ts

/**
 * POST /service/:serviceName/:action
 *
 * Check order after the gate: action (422) → known service (404) → backend.
 * A backend failure is still 200 with `success:false`.
 */

import type { Request, Response } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { UnprocessableError } from "@shared/problem/problem";
import {
  SERVICE_ACTIONS,
  zServiceAction,
} from "../../../contracts/service.contract";
import { runtimeOf } from "../../../middleware/runtimeScope";

export const invalidActionDetail = (action: string) =>
  `Invalid action '${action}'. Allowed: ${SERVICE_ACTIONS.join(", ")}`;

export const control = asyncHandler(async (req: Request, res: Response) => {
  const { serviceName, action } = req.params;

  const parsed = zServiceAction.safeParse(action);
  if (!parsed.success) throw new UnprocessableError(invalidActionDetail(action));

  const result = await runtimeOf(req).gateway.performAction(
    serviceName,
    parsed.data
  );
  res.json(result);
});
