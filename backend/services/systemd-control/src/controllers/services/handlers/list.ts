// backend/services/systemd-control/src/controllers/services/handlers/list.ts
import type { Request, Response } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import type { ServicesResponse } from "../../../contracts/service.contract";
import { runtimeOf } from "../../../middleware/runtimeScope";

export const list = asyncHandler(async (req: Request, res: Response) => {
  const { gateway } = runtimeOf(req);
  const services = await gateway.listServices();
  const body: ServicesResponse = {
    last_updated: gateway.timestamp(),
    services,
  };
  res.json(body);
});
