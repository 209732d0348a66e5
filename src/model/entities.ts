/**
 * Entity Helpers
 * Empty records for the parser and derived properties of parsed entities
 */

import {
  UacVersion,
  USB_STREAMING_TERMINAL,
  type AlternateSetting,
  type AudioControlInterface,
  type AudioEntity,
  type AudioStreamingInterface,
  type ClockSource,
  type ConfigurationDescriptor,
  type DeviceDescriptor,
  type EndpointDescriptor,
  type FeatureUnit,
  type FormatTypeDescriptor,
  type InputTerminal,
  type InterfaceDescriptor,
  type OutputTerminal,
} from "./types";
import { hex } from "./terminal-types";

/**
 * Writable view of a model record while the parser fills it in
 */
export type Draft<T> = {
  -readonly [K in keyof T]: T[K] extends readonly (infer U)[] ? U[] : T[K];
};

export interface InterfaceDraft extends Draft<InterfaceDescriptor> {
  endpoints: Draft<EndpointDescriptor>[];
}

export interface ConfigurationDraft extends Draft<ConfigurationDescriptor> {
  audioControl: Draft<AudioControlInterface> | null;
  streamingInterfaces: Draft<AudioStreamingInterface>[];
}

export function createDeviceDescriptor(): Draft<DeviceDescriptor> {
  return {
    vendorId: 0,
    productId: 0,
    bcdDevice: 0,
    manufacturer: "",
    product: "",
    serialNumber: "",
    deviceClass: 0,
    deviceSubclass: 0,
    deviceProtocol: 0,
    maxPacketSize0: 0,
    numConfigurations: 0,
    usbVersion: "",
  };
}

export function createConfiguration(): ConfigurationDraft {
  return {
    configValue: 0,
    numInterfaces: 0,
    name: "",
    attributes: 0,
    maxPowerMa: 0,
    interfaces: [],
    uacVersion: UacVersion.UNKNOWN,
    audioControl: null,
    streamingInterfaces: [],
    alternateSettings: [],
  };
}

export function createInterface(): InterfaceDraft {
  return {
    interfaceNumber: 0,
    alternateSetting: 0,
    numEndpoints: 0,
    interfaceClass: 0,
    interfaceSubclass: 0,
    interfaceProtocol: 0,
    name: "",
    endpoints: [],
  };
}

export function createEndpoint(): Draft<EndpointDescriptor> {
  return {
    address: 0,
    direction: "OUT",
    transferType: "Control",
    syncType: "none",
    usageType: "data",
    maxPacketSize: 0,
    transactionsPerMicroframe: 1,
    interval: 0,
    refresh: 0,
    synchAddress: 0,
    lockDelayUnits: 0,
    lockDelay: 0,
    maxPacketsOnly: false,
  };
}

export function createAudioControl(): Draft<AudioControlInterface> {
  return {
    header: null,
    inputTerminals: [],
    outputTerminals: [],
    featureUnits: [],
    mixerUnits: [],
    selectorUnits: [],
    processingUnits: [],
    extensionUnits: [],
    clockSources: [],
    clockSelectors: [],
    clockMultipliers: [],
  };
}

export function createStreamingInterface(
  interfaceNumber: number,
  alternateSetting: number
): Draft<AudioStreamingInterface> {
  return {
    interfaceNumber,
    alternateSetting,
    terminalLink: 0,
    delay: 0,
    formatTag: 0,
    controls: 0,
    clockSourceId: 0,
    formats: 0,
    nrChannels: 0,
    format: null,
    endpoint: null,
  };
}

export function createFormatType(): Draft<FormatTypeDescriptor> {
  return {
    formatType: 0,
    nrChannels: 0,
    subframeSize: 0,
    bitResolution: 0,
    sampleFrequencies: [],
    freqMin: 0,
    freqMax: 0,
  };
}

/**
 * All entities of an AudioControl interface in declaration order:
 * terminals, units, then clock entities
 */
export function allEntities(ac: AudioControlInterface): AudioEntity[] {
  return [
    ...ac.inputTerminals,
    ...ac.outputTerminals,
    ...ac.featureUnits,
    ...ac.mixerUnits,
    ...ac.selectorUnits,
    ...ac.processingUnits,
    ...ac.extensionUnits,
    ...ac.clockSources,
    ...ac.clockSelectors,
    ...ac.clockMultipliers,
  ];
}

export function findEntity(
  ac: AudioControlInterface,
  id: number
): AudioEntity | undefined {
  return allEntities(ac).find((entity) => entity.id === id);
}

export function isUsbStreaming(terminal: InputTerminal | OutputTerminal): boolean {
  return terminal.terminalType === USB_STREAMING_TERMINAL;
}

// Feature unit controls, in bit order
const FEATURE_CONTROLS = [
  "Mute",
  "Volume",
  "Bass",
  "Mid",
  "Treble",
  "Graphic EQ",
  "AGC",
  "Delay",
  "Bass Boost",
  "Loudness",
  // Only addressable with the paired (UAC 2.0+) layout
  "Input Gain",
  "Input Gain Pad",
  "Phase Inverter",
  "Underflow",
  "Overflow",
] as const;

const BITMAP_CONTROL_COUNT = 10;

/**
 * Names of the master-channel controls a feature unit exposes
 */
export function featureControlNames(unit: FeatureUnit): string[] {
  if (unit.controls.length === 0) return [];
  const master = unit.controls[0];

  if (unit.controlEncoding === "paired") {
    return FEATURE_CONTROLS.filter((_, bit) => Math.floor(master / 4 ** bit) % 4 !== 0);
  }

  return FEATURE_CONTROLS.slice(0, BITMAP_CONTROL_COUNT).filter(
    (_, bit) => (master & (1 << bit)) !== 0
  );
}

export function hasMute(unit: FeatureUnit): boolean {
  return featureControlNames(unit).includes("Mute");
}

export function hasVolume(unit: FeatureUnit): boolean {
  return featureControlNames(unit).includes("Volume");
}

const CLOCK_TYPES = ["External", "Internal Fixed", "Internal Variable", "Internal Programmable"];

export function clockTypeName(clock: ClockSource): string {
  return CLOCK_TYPES[clock.attributes & 0x03];
}

export function isSyncedToSof(clock: ClockSource): boolean {
  return (clock.attributes & 0x04) !== 0;
}

const PROCESS_TYPES: Record<number, string> = {
  0x00: "Undefined",
  0x01: "Up/Downmix",
  0x02: "Dolby Prologic",
  0x03: "Stereo Extender",
};

export function processTypeName(processType: number): string {
  return PROCESS_TYPES[processType] ?? `Process 0x${hex(processType, 2)}`;
}

// UAC 1.0 wFormatTag values
const FORMAT_TAGS: Record<number, string> = {
  0x0000: "Undefined",
  0x0001: "PCM",
  0x0002: "PCM8",
  0x0003: "IEEE Float",
  0x0004: "A-Law",
  0x0005: "μ-Law",
};

// UAC 2.0 bmFormats bits (Type I)
const FORMAT_BITS: Array<[number, string]> = [
  [0x00000001, "PCM"],
  [0x00000002, "PCM8"],
  [0x00000004, "IEEE Float"],
  [0x00000008, "A-Law"],
  [0x00000010, "μ-Law"],
  [0x80000000, "Raw Data"],
];

/**
 * Format name of a streaming interface, from bmFormats when present
 * and from wFormatTag otherwise
 */
export function streamingFormatName(streaming: AudioStreamingInterface): string {
  if (streaming.formats) {
    const names = FORMAT_BITS.filter(([bit]) => (streaming.formats & bit) >>> 0 !== 0).map(
      ([, name]) => name
    );
    return names.length > 0 ? names.join("/") : `Unknown (0x${hex(streaming.formats, 8)})`;
  }
  return FORMAT_TAGS[streaming.formatTag] ?? `Unknown (0x${hex(streaming.formatTag, 4)})`;
}

export function sampleRateRange(format: FormatTypeDescriptor): [number, number] {
  if (format.sampleFrequencies.length > 0) {
    return [Math.min(...format.sampleFrequencies), Math.max(...format.sampleFrequencies)];
  }
  if (format.freqMin && format.freqMax) {
    return [format.freqMin, format.freqMax];
  }
  return [0, 0];
}

export function isZeroBandwidth(alt: AlternateSetting): boolean {
  return alt.endpoint === null || alt.endpoint.maxPacketSize === 0;
}
