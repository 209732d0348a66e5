/**
 * lsusb Source
 * Runs `lsusb -v -d vid:pid` and returns its output
 */

import { spawn } from "child_process";
import { config } from "../config";
import { createLogger } from "../logger";
import type { DescriptorSource, SourceResult } from "./interface";

const log = createLogger("lsusb");

export interface DeviceSpec {
  vendorId: number;
  productId: number;
}

/**
 * "1234:abcd" to ids, or null when malformed
 */
export function parseDeviceSpec(spec: string): DeviceSpec | null {
  const match = /^([0-9a-f]{1,4}):([0-9a-f]{1,4})$/i.exec(spec.trim());
  if (!match) return null;
  return { vendorId: parseInt(match[1], 16), productId: parseInt(match[2], 16) };
}

export function formatDeviceSpec(spec: DeviceSpec): string {
  const id = (value: number) => value.toString(16).padStart(4, "0");
  return `${id(spec.vendorId)}:${id(spec.productId)}`;
}

export interface LsusbOptions {
  command?: string;
  timeoutMs?: number;
}

export class LsusbSource implements DescriptorSource {
  readonly origin = "lsusb";
  private readonly command: string;
  private readonly timeoutMs: number;

  constructor(private readonly device: DeviceSpec, options: LsusbOptions = {}) {
    this.command = options.command ?? config.LSUSB_PATH;
    this.timeoutMs = options.timeoutMs ?? config.LSUSB_TIMEOUT;
  }

  get args(): string[] {
    return ["-v", "-d", formatDeviceSpec(this.device)];
  }

  read(): Promise<SourceResult> {
    const origin = this.origin;
    log.debug(`${this.command} ${this.args.join(" ")}`);

    return new Promise((resolve) => {
      const proc = spawn(this.command, this.args);
      let output = "";
      let errors = "";
      let settled = false;

      const finish = (result: SourceResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        resolve(result);
      };

      const timeout = setTimeout(() => {
        proc.kill("SIGKILL");
        finish({ ok: false, error: `${this.command} timed out after ${this.timeoutMs}ms`, origin });
      }, this.timeoutMs);

      // The decoder carries partial UTF-8 sequences over to the next chunk
      proc.stdout.setEncoding("utf-8");
      proc.stderr.setEncoding("utf-8");

      proc.stdout.on("data", (data: string) => {
        output += data;
      });

      proc.stderr.on("data", (data: string) => {
        errors += data;
      });

      proc.on("error", (err) => {
        finish({ ok: false, error: `Cannot run ${this.command}: ${err.message}`, origin });
      });

      proc.on("close", (code) => {
        if (code === 0 || output.trim()) {
          // lsusb -v exits non-zero when some descriptors are unreadable without root
          if (code !== 0) log.warn(errors.trim() || `${this.command} exited with code ${code}`);
          finish({ ok: true, text: output, origin });
        } else {
          const reason = errors.trim() || `exit code ${code}`;
          finish({ ok: false, error: `${this.command} failed: ${reason}`, origin });
        }
      });
    });
  }
}
