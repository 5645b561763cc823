// backend/services/systemd-control/src/log.init.ts
import { initLogger } from "@shared/utils/logger";
import { SERVICE_NAME } from "./serviceName";

/**
 * Side-effect module: initializes the shared logger with this service's name.
 * Import ONCE, right after ./bootstrap, so LOG_LEVEL from the env file applies.
 */
initLogger(SERVICE_NAME);
