/**
 * Bandwidth Analysis
 * Per alternate setting reservation from the streaming endpoints
 */

import { findEntity, sampleRateRange, streamingFormatName } from "../model/entities";
import { terminalTypeName } from "../model/terminal-types";
import type { UsbAudioDevice } from "../model/device";
import type {
  AlternateSetting,
  AudioControlInterface,
  Direction,
  SyncType,
  UsageType,
} from "../model/types";

// USB 2.0 high speed: 480 Mbit/s
export const USB_HIGH_SPEED_BYTES_PER_SECOND = 480_000_000 / 8;

const MICROFRAMES_PER_SECOND = 8000;
const FRAMES_PER_SECOND = 1000;

export interface FormatInfo {
  channels: number;
  bitDepth: number;
  sampleRates: number[];
  sampleRateRange: [number, number];
  formatName: string;
}

export interface BandwidthInfo {
  interfaceNumber: number;
  alternateSetting: number;
  direction: Direction | null;
  format: FormatInfo | null;
  endpointAddress: number;
  maxPacketSize: number;
  syncType: SyncType;
  usageType: UsageType;
  bytesPerFrame: number;
  bytesPerSecond: number;
  bandwidthPercent: number;
  terminalId: number;
  terminalType: string;
}

export interface InterfaceBandwidth {
  interfaceNumber: number;
  direction: Direction | null;
  terminalId: number;
  terminalType: string;
  alternateSettings: BandwidthInfo[];
}

export interface BandwidthAnalysis {
  interfaces: InterfaceBandwidth[];
  playbackInterfaces: InterfaceBandwidth[];
  captureInterfaces: InterfaceBandwidth[];
  maxPlaybackBandwidth: number;
  maxCaptureBandwidth: number;
  maxTotalBandwidth: number;
}

function terminalType(ac: AudioControlInterface | null, id: number): string {
  const entity = ac ? findEntity(ac, id) : undefined;
  if (entity?.kind === "input_terminal" || entity?.kind === "output_terminal") {
    return terminalTypeName(entity.terminalType);
  }
  return "";
}

export function analyzeAlternateSetting(
  alt: AlternateSetting,
  ac: AudioControlInterface | null
): BandwidthInfo {
  const streaming = alt.streamingInterface;
  const info: BandwidthInfo = {
    interfaceNumber: alt.interfaceNumber,
    alternateSetting: alt.alternateSetting,
    direction: null,
    format: null,
    endpointAddress: 0,
    maxPacketSize: 0,
    syncType: "none",
    usageType: "data",
    bytesPerFrame: 0,
    bytesPerSecond: 0,
    bandwidthPercent: 0,
    terminalId: streaming?.terminalLink ?? 0,
    terminalType: streaming ? terminalType(ac, streaming.terminalLink) : "",
  };

  if (streaming && alt.format) {
    info.format = {
      channels: alt.format.nrChannels,
      bitDepth: alt.format.bitResolution,
      sampleRates: [...alt.format.sampleFrequencies],
      sampleRateRange: sampleRateRange(alt.format),
      formatName: streamingFormatName(streaming),
    };
  }

  const endpoint = alt.endpoint;
  if (endpoint) {
    info.endpointAddress = endpoint.address;
    info.direction = endpoint.direction;
    info.maxPacketSize = endpoint.maxPacketSize;
    info.syncType = endpoint.syncType;
    info.usageType = endpoint.usageType;
    info.bytesPerFrame = endpoint.maxPacketSize * endpoint.transactionsPerMicroframe;

    // bInterval 1 is read as a high-speed microframe, anything longer as a full-speed frame
    const perSecond = endpoint.interval <= 1 ? MICROFRAMES_PER_SECOND : FRAMES_PER_SECOND;
    info.bytesPerSecond = info.bytesPerFrame * perSecond;
    info.bandwidthPercent = (info.bytesPerSecond / USB_HIGH_SPEED_BYTES_PER_SECOND) * 100;
  }

  return info;
}

export function isDisabled(info: BandwidthInfo): boolean {
  return info.maxPacketSize === 0;
}

/**
 * Non-zero setting with the highest bytes per second
 */
export function maxBandwidthSetting(iface: InterfaceBandwidth): BandwidthInfo | null {
  let best: BandwidthInfo | null = null;
  for (const setting of iface.alternateSettings) {
    if (isDisabled(setting)) continue;
    if (!best || setting.bytesPerSecond > best.bytesPerSecond) best = setting;
  }
  return best;
}

/**
 * Unique (channels, bit depth, rates) formats offered by an interface
 */
export function availableFormats(iface: InterfaceBandwidth): FormatInfo[] {
  const seen = new Set<string>();
  const formats: FormatInfo[] = [];
  for (const setting of iface.alternateSettings) {
    if (!setting.format || isDisabled(setting)) continue;
    const key = `${setting.format.channels}/${setting.format.bitDepth}/${setting.format.sampleRates.join(",")}`;
    if (seen.has(key)) continue;
    seen.add(key);
    formats.push(setting.format);
  }
  return formats;
}

export function analyzeBandwidth(device: UsbAudioDevice): BandwidthAnalysis {
  const byInterface = new Map<number, BandwidthInfo[]>();

  for (const alt of device.alternateSettings) {
    const settings = byInterface.get(alt.interfaceNumber) ?? [];
    settings.push(analyzeAlternateSetting(alt, device.audioControl));
    byInterface.set(alt.interfaceNumber, settings);
  }

  const interfaces = [...byInterface.entries()]
    .sort(([a], [b]) => a - b)
    .map(([interfaceNumber, settings]): InterfaceBandwidth => {
      const active = settings.find((setting) => !isDisabled(setting));
      return {
        interfaceNumber,
        direction: active?.direction ?? null,
        terminalId: active?.terminalId ?? 0,
        terminalType: active?.terminalType ?? "",
        alternateSettings: [...settings].sort((a, b) => a.alternateSetting - b.alternateSetting),
      };
    });

  const playbackInterfaces = interfaces.filter((iface) => iface.direction === "OUT");
  const captureInterfaces = interfaces.filter((iface) => iface.direction === "IN");
  const total = (list: InterfaceBandwidth[]) =>
    list.reduce((sum, iface) => sum + (maxBandwidthSetting(iface)?.bytesPerSecond ?? 0), 0);

  const maxPlaybackBandwidth = total(playbackInterfaces);
  const maxCaptureBandwidth = total(captureInterfaces);

  return {
    interfaces,
    playbackInterfaces,
    captureInterfaces,
    maxPlaybackBandwidth,
    maxCaptureBandwidth,
    maxTotalBandwidth: maxPlaybackBandwidth + maxCaptureBandwidth,
  };
}

// Text helpers

const SYNC_TYPE_TEXT: Record<SyncType, string> = {
  none: "None",
  async: "Asynchronous",
  adaptive: "Adaptive",
  sync: "Synchronous",
};

export function syncTypeText(syncType: SyncType): string {
  return SYNC_TYPE_TEXT[syncType];
}

const kHz = (rate: number): string => (rate / 1000).toFixed(1);

/**
 * "48.0 kHz", "44.1, 48.0 kHz", "44.1-96.0 kHz" or "Unknown"
 */
export function sampleRateText(format: FormatInfo): string {
  if (format.sampleRates.length === 1) return `${kHz(format.sampleRates[0])} kHz`;
  if (format.sampleRates.length > 1) {
    return `${[...format.sampleRates].sort((a, b) => a - b).map(kHz).join(", ")} kHz`;
  }
  const [low, high] = format.sampleRateRange;
  if (low && high) return `${kHz(low)}-${kHz(high)} kHz`;
  return "Unknown";
}

export function formatText(format: FormatInfo): string {
  return `${format.channels}ch ${format.bitDepth}-bit ${format.formatName}`;
}

export function bytesPerSecondText(bytes: number): string {
  if (bytes >= 1_000_000) return `${(bytes / 1_000_000).toFixed(2)} MB/s`;
  if (bytes >= 1_000) return `${(bytes / 1_000).toFixed(1)} KB/s`;
  return `${bytes} B/s`;
}

export function bandwidthText(info: BandwidthInfo): string {
  return info.bytesPerSecond === 0 ? "0 (disabled)" : bytesPerSecondText(info.bytesPerSecond);
}
