/**
 * Input Sources
 * Re-exports all source components
 */

export * from "./interface";
export * from "./file";
export * from "./lsusb";
export * from "./mock";

import type { DescriptorSource } from "./interface";
import { FileSource, StreamSource, type InputStream } from "./file";
import { LsusbSource, type DeviceSpec, type LsusbOptions } from "./lsusb";

export interface SourceOptions {
  file?: string;
  device?: DeviceSpec;
  stdin?: InputStream;
  lsusb?: LsusbOptions;
}

/**
 * A file wins over a device, which wins over stdin
 */
export function createSource(options: SourceOptions = {}): DescriptorSource {
  if (options.file && options.file !== "-") return new FileSource(options.file);
  if (options.device) return new LsusbSource(options.device, options.lsusb);
  return new StreamSource(options.stdin);
}
