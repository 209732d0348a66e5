/**
 * USB Audio Device
 * Parsed device with every configuration and one active selection
 */

import { createDeviceDescriptor } from "./entities";
import { hex } from "./terminal-types";
import {
  UacVersion,
  type AlternateSetting,
  type AudioControlInterface,
  type AudioStreamingInterface,
  type ConfigurationDescriptor,
  type DeviceDescriptor,
} from "./types";

// Higher rank wins the default selection
const VERSION_RANK: Record<UacVersion, number> = {
  [UacVersion.UNKNOWN]: 0,
  [UacVersion.UAC_1_0]: 1,
  [UacVersion.UAC_2_0]: 2,
  [UacVersion.UAC_3_0]: 3,
};

function defaultConfigurationIndex(configurations: readonly ConfigurationDescriptor[]): number {
  if (configurations.length === 0) return -1;

  let best = 0;
  configurations.forEach((config, index) => {
    if (VERSION_RANK[config.uacVersion] > VERSION_RANK[configurations[best].uacVersion]) {
      best = index;
    }
  });
  return best;
}

export class UsbAudioDevice {
  readonly descriptor: DeviceDescriptor;
  readonly configurations: readonly ConfigurationDescriptor[];
  private activeIndex: number;

  constructor(
    descriptor: DeviceDescriptor = createDeviceDescriptor(),
    configurations: readonly ConfigurationDescriptor[] = []
  ) {
    this.descriptor = descriptor;
    this.configurations = configurations;
    this.activeIndex = defaultConfigurationIndex(configurations);
  }

  get activeConfiguration(): ConfigurationDescriptor | null {
    return this.activeIndex >= 0 ? this.configurations[this.activeIndex] : null;
  }

  get uacVersion(): UacVersion {
    return this.activeConfiguration?.uacVersion ?? UacVersion.UNKNOWN;
  }

  get audioControl(): AudioControlInterface | null {
    return this.activeConfiguration?.audioControl ?? null;
  }

  get streamingInterfaces(): readonly AudioStreamingInterface[] {
    return this.activeConfiguration?.streamingInterfaces ?? [];
  }

  get alternateSettings(): readonly AlternateSetting[] {
    return this.activeConfiguration?.alternateSettings ?? [];
  }

  /**
   * Distinct known versions across all configurations, in input order
   */
  get availableUacVersions(): UacVersion[] {
    const versions: UacVersion[] = [];
    for (const config of this.configurations) {
      if (config.uacVersion !== UacVersion.UNKNOWN && !versions.includes(config.uacVersion)) {
        versions.push(config.uacVersion);
      }
    }
    return versions;
  }

  get hasAudio(): boolean {
    return this.configurations.some(
      (config) => config.audioControl !== null || config.streamingInterfaces.length > 0
    );
  }

  get deviceName(): string {
    if (this.descriptor.product) return this.descriptor.product;
    return `USB Audio Device ${hex(this.descriptor.vendorId, 4)}:${hex(this.descriptor.productId, 4)}`;
  }

  get manufacturerName(): string {
    return this.descriptor.manufacturer || "Unknown";
  }

  /**
   * Make the first configuration tagged with `version` active.
   * Returns false and keeps the current selection when none carries it.
   */
  selectConfiguration(version: UacVersion): boolean {
    if (version === UacVersion.UNKNOWN) return false;

    const index = this.configurations.findIndex((config) => config.uacVersion === version);
    if (index < 0) return false;

    this.activeIndex = index;
    return true;
  }
}
