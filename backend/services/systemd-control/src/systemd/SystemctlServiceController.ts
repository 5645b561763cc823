// backend/services/systemd-control/src/systemd/SystemctlServiceController.ts

/**
 * systemctl subprocess variant.
 *
 * Notes:
 * - execFile with an argument array; unit names never reach a shell.
 * - `is-active`/`is-enabled` exit non-zero for inactive/disabled units; only
 *   stdout matters for status.
 * - The runner is injectable so tests never spawn processes.
 */

import { execFile } from "node:child_process";
import { logger } from "@shared/utils/logger";
import type { ServiceAction } from "../contracts/service.contract";
import {
  messageOf,
  successMessage,
  TIMED_OUT_MESSAGE,
  type ControlResult,
  type ServiceController,
  type ServiceState,
} from "./ServiceController";

export type CommandResult = Readonly<{
  code: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}>;

/** Resolves for any exit status; rejects only when the process can't run. */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  timeoutMs: number
) => Promise<CommandResult>;

export const execFileRunner: CommandRunner = (file, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      [...args],
      { timeout: timeoutMs, encoding: "utf8", windowsHide: true },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ code: 0, stdout, stderr, timedOut: false });
        } else if (err.killed) {
          resolve({ code: -1, stdout, stderr, timedOut: true });
        } else if (typeof err.code === "number") {
          resolve({ code: err.code, stdout, stderr, timedOut: false });
        } else {
          reject(err);
        }
      }
    );
  });

export class SystemctlServiceController implements ServiceController {
  public readonly backend = "systemctl";

  private readonly run: CommandRunner;
  private readonly bin: string;

  public constructor(opts: { runner?: CommandRunner; bin?: string } = {}) {
    this.run = opts.runner ?? execFileRunner;
    this.bin = opts.bin ?? "systemctl";
  }

  public async getStatus(unit: string, timeoutMs: number): Promise<ServiceState> {
    try {
      const [active, enabled] = await Promise.all([
        this.run(this.bin, ["is-active", unit], timeoutMs),
        this.run(this.bin, ["is-enabled", unit], timeoutMs),
      ]);
      if (active.timedOut || enabled.timedOut) {
        return { status: "unknown", enabled: false };
      }
      return {
        status: active.stdout.trim(),
        enabled: enabled.stdout.trim() === "enabled",
      };
    } catch (err) {
      logger.warn({ unit, err: messageOf(err) }, "systemctl status failed");
      return { status: "error", enabled: false, error: messageOf(err) };
    }
  }

  public async control(
    unit: string,
    action: ServiceAction,
    timeoutMs: number
  ): Promise<ControlResult> {
    let res: CommandResult;
    try {
      res = await this.run(this.bin, [action, unit], timeoutMs);
    } catch (err) {
      logger.error({ unit, action, err: messageOf(err) }, "systemctl failed to run");
      return { success: false, message: messageOf(err) };
    }

    if (res.timedOut) {
      logger.warn({ unit, action, timeoutMs }, "systemctl timed out");
      return { success: false, message: TIMED_OUT_MESSAGE };
    }
    if (res.code !== 0) {
      logger.warn({ unit, action, code: res.code }, "systemctl action failed");
      return {
        success: false,
        message: `Service ${action} failed: ${res.stderr.trim()}`,
      };
    }

    logger.info({ unit, action }, "service action applied");
    return { success: true, message: successMessage(action) };
  }

  public close(): void {
    // nothing held between calls
  }
}
