// backend/services/systemd-control/src/routes/serviceRoutes.ts
import { Router } from "express";
import { list } from "../controllers/services/handlers/list";
import { control } from "../controllers/services/handlers/control";
import { securityGate } from "../middleware/securityGate";

const router = Router();
const gate = securityGate();

// one-liners only; /health is mounted open in app.ts
router.get("/services", gate, list);
router.post("/service/:serviceName/:action", gate, control);

export default router;
