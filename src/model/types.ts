/**
 * USB Audio Class Type Definitions
 * Descriptor records produced by the lsusb parser, read-only once parsed
 */

// UAC specification versions
export const UacVersion = {
  UAC_1_0: "1.0",
  UAC_2_0: "2.0",
  UAC_3_0: "3.0",
  UNKNOWN: "unknown",
} as const;

export type UacVersion = (typeof UacVersion)[keyof typeof UacVersion];

export type SyncType = "none" | "async" | "adaptive" | "sync";

export type UsageType = "data" | "feedback" | "implicit_feedback";

export type Direction = "IN" | "OUT";

export type TransferType = "Control" | "Isochronous" | "Bulk" | "Interrupt";

// Basic USB descriptors

export interface DeviceDescriptor {
  readonly vendorId: number;
  readonly productId: number;
  readonly bcdDevice: number;
  readonly manufacturer: string;
  readonly product: string;
  readonly serialNumber: string;
  readonly deviceClass: number;
  readonly deviceSubclass: number;
  readonly deviceProtocol: number;
  readonly maxPacketSize0: number;
  readonly numConfigurations: number;
  readonly usbVersion: string; // "2.00" as printed
}

export interface EndpointDescriptor {
  readonly address: number;
  readonly direction: Direction;
  readonly transferType: TransferType;
  readonly syncType: SyncType;
  readonly usageType: UsageType;
  readonly maxPacketSize: number; // low 11 bits of wMaxPacketSize
  readonly transactionsPerMicroframe: number;
  readonly interval: number;
  readonly refresh: number;
  readonly synchAddress: number;
  // From the class-specific endpoint descriptor
  readonly lockDelayUnits: number;
  readonly lockDelay: number;
  readonly maxPacketsOnly: boolean;
}

export interface InterfaceDescriptor {
  readonly interfaceNumber: number;
  readonly alternateSetting: number;
  readonly numEndpoints: number;
  readonly interfaceClass: number;
  readonly interfaceSubclass: number;
  readonly interfaceProtocol: number;
  readonly name: string;
  readonly endpoints: readonly EndpointDescriptor[];
}

// Audio control entities

export interface AudioControlHeader {
  readonly uacVersion: UacVersion;
  readonly bcdAdc: number;
  readonly totalLength: number;
  readonly inCollection: number;
  readonly interfaceNumbers: readonly number[];
  readonly category: number;
  readonly controls: number;
}

export interface InputTerminal {
  readonly kind: "input_terminal";
  readonly id: number;
  readonly terminalType: number;
  readonly assocTerminal: number;
  readonly nrChannels: number;
  readonly channelConfig: number;
  readonly channelNames: string;
  readonly name: string;
  readonly clockSourceId: number;
  readonly controls: number;
}

export interface OutputTerminal {
  readonly kind: "output_terminal";
  readonly id: number;
  readonly terminalType: number;
  readonly assocTerminal: number;
  readonly sourceId: number;
  readonly name: string;
  readonly clockSourceId: number;
  readonly controls: number;
}

/**
 * How bmaControls bitmaps are laid out.
 * UAC 1.0 uses one bit per control, UAC 2.0 and 3.0 use a two-bit pair.
 */
export type ControlEncoding = "bitmap" | "paired";

export interface FeatureUnit {
  readonly kind: "feature_unit";
  readonly id: number;
  readonly sourceId: number;
  readonly nrChannels: number;
  readonly controls: readonly number[]; // index 0 = master, then one per channel
  readonly controlEncoding: ControlEncoding;
  readonly name: string;
}

export interface MixerUnit {
  readonly kind: "mixer_unit";
  readonly id: number;
  readonly nrInPins: number;
  readonly sourceIds: readonly number[];
  readonly nrChannels: number;
  readonly channelConfig: number;
  readonly channelNames: string;
  readonly name: string;
}

export interface SelectorUnit {
  readonly kind: "selector_unit";
  readonly id: number;
  readonly nrInPins: number;
  readonly sourceIds: readonly number[];
  readonly name: string;
}

export interface ProcessingUnit {
  readonly kind: "processing_unit";
  readonly id: number;
  readonly processType: number;
  readonly nrInPins: number;
  readonly sourceIds: readonly number[];
  readonly nrChannels: number;
  readonly channelConfig: number;
  readonly channelNames: string;
  readonly controls: number;
  readonly name: string;
}

export interface ExtensionUnit {
  readonly kind: "extension_unit";
  readonly id: number;
  readonly extensionCode: number;
  readonly nrInPins: number;
  readonly sourceIds: readonly number[];
  readonly nrChannels: number;
  readonly channelConfig: number;
  readonly channelNames: string;
  readonly controls: number;
  readonly name: string;
}

export interface ClockSource {
  readonly kind: "clock_source";
  readonly id: number;
  readonly attributes: number;
  readonly controls: number;
  readonly assocTerminal: number;
  readonly name: string;
}

export interface ClockSelector {
  readonly kind: "clock_selector";
  readonly id: number;
  readonly nrInPins: number;
  readonly clockPinIds: readonly number[];
  readonly controls: number;
  readonly name: string;
}

export interface ClockMultiplier {
  readonly kind: "clock_multiplier";
  readonly id: number;
  readonly clockSourceId: number;
  readonly controls: number;
  readonly name: string;
}

export type AudioUnit =
  | FeatureUnit
  | MixerUnit
  | SelectorUnit
  | ProcessingUnit
  | ExtensionUnit;

export type ClockEntity = ClockSource | ClockSelector | ClockMultiplier;

export type AudioEntity = InputTerminal | OutputTerminal | AudioUnit | ClockEntity;

export type AudioEntityKind = AudioEntity["kind"];

export interface AudioControlInterface {
  readonly header: AudioControlHeader | null;
  readonly inputTerminals: readonly InputTerminal[];
  readonly outputTerminals: readonly OutputTerminal[];
  readonly featureUnits: readonly FeatureUnit[];
  readonly mixerUnits: readonly MixerUnit[];
  readonly selectorUnits: readonly SelectorUnit[];
  readonly processingUnits: readonly ProcessingUnit[];
  readonly extensionUnits: readonly ExtensionUnit[];
  // UAC 2.0+
  readonly clockSources: readonly ClockSource[];
  readonly clockSelectors: readonly ClockSelector[];
  readonly clockMultipliers: readonly ClockMultiplier[];
}

// Audio streaming

export interface FormatTypeDescriptor {
  readonly formatType: number;
  readonly nrChannels: number;
  readonly subframeSize: number; // bSubframeSize (1.0) or bSubslotSize (2.0)
  readonly bitResolution: number;
  readonly sampleFrequencies: readonly number[];
  readonly freqMin: number;
  readonly freqMax: number;
}

export interface AudioStreamingInterface {
  readonly interfaceNumber: number;
  readonly alternateSetting: number;
  readonly terminalLink: number;
  readonly delay: number;
  readonly formatTag: number; // UAC 1.0 wFormatTag
  readonly controls: number;
  readonly clockSourceId: number;
  readonly formats: number; // UAC 2.0 bmFormats
  readonly nrChannels: number; // UAC 2.0 carries the channel count here
  readonly format: FormatTypeDescriptor | null;
  readonly endpoint: EndpointDescriptor | null;
}

/**
 * One alternate setting of an AudioStreaming interface
 */
export interface AlternateSetting {
  readonly interfaceNumber: number;
  readonly alternateSetting: number;
  readonly streamingInterface: AudioStreamingInterface | null;
  readonly format: FormatTypeDescriptor | null;
  readonly endpoint: EndpointDescriptor | null;
}

export interface ConfigurationDescriptor {
  readonly configValue: number;
  readonly numInterfaces: number;
  readonly name: string;
  readonly attributes: number;
  readonly maxPowerMa: number;
  readonly interfaces: readonly InterfaceDescriptor[];
  readonly uacVersion: UacVersion;
  readonly audioControl: AudioControlInterface | null;
  readonly streamingInterfaces: readonly AudioStreamingInterface[];
  readonly alternateSettings: readonly AlternateSetting[];
}

// Interface class codes
export const USB_CLASS_AUDIO = 0x01;

export const AudioSubclass = {
  CONTROL: 0x01,
  STREAMING: 0x02,
  MIDI_STREAMING: 0x03,
} as const;

// bInterfaceProtocol values that announce the class version
export const AudioProtocol = {
  UAC_1_0: 0x00,
  UAC_2_0: 0x20,
  UAC_3_0: 0x30,
} as const;

export const USB_STREAMING_TERMINAL = 0x0101;
