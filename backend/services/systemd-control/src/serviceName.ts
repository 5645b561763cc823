// backend/services/systemd-control/src/serviceName.ts
export const SERVICE_NAME = "systemd-control" as const;
