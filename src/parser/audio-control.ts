/**
 * AudioControl Descriptors
 * Subtype numbering per class version and field tables for each entity
 */

import {
  AudioProtocol,
  UacVersion,
  type AudioControlHeader,
  type AudioControlInterface,
  type ClockMultiplier,
  type ClockSelector,
  type ClockSource,
  type ExtensionUnit,
  type FeatureUnit,
  type InputTerminal,
  type MixerUnit,
  type OutputTerminal,
  type ProcessingUnit,
  type SelectorUnit,
} from "../model/types";
import type { Draft } from "../model/entities";
import { applyFields, defineFields, type FieldRule } from "./fields";
import type { Line } from "./lines";

export type Dialect = Exclude<UacVersion, "unknown">;

export type AcDescriptor =
  | "header"
  | "input_terminal"
  | "output_terminal"
  | "mixer_unit"
  | "selector_unit"
  | "feature_unit"
  | "processing_unit"
  | "extension_unit"
  | "clock_source"
  | "clock_selector"
  | "clock_multiplier";

// bDescriptorSubtype values; UAC 2.0 effect units (7) and
// sample rate converters (13) have no entity here
const AC_SUBTYPES: Record<Dialect, Record<number, AcDescriptor>> = {
  [UacVersion.UAC_1_0]: {
    0x01: "header",
    0x02: "input_terminal",
    0x03: "output_terminal",
    0x04: "mixer_unit",
    0x05: "selector_unit",
    0x06: "feature_unit",
    0x07: "processing_unit",
    0x08: "extension_unit",
    0x0a: "clock_source",
    0x0b: "clock_selector",
    0x0c: "clock_multiplier",
  },
  [UacVersion.UAC_2_0]: {
    0x01: "header",
    0x02: "input_terminal",
    0x03: "output_terminal",
    0x04: "mixer_unit",
    0x05: "selector_unit",
    0x06: "feature_unit",
    0x08: "processing_unit",
    0x09: "extension_unit",
    0x0a: "clock_source",
    0x0b: "clock_selector",
    0x0c: "clock_multiplier",
  },
  [UacVersion.UAC_3_0]: {
    0x01: "header",
    0x02: "input_terminal",
    0x03: "output_terminal",
    0x05: "mixer_unit",
    0x06: "selector_unit",
    0x07: "feature_unit",
    0x09: "processing_unit",
    0x0a: "extension_unit",
    0x0b: "clock_source",
    0x0c: "clock_selector",
    0x0d: "clock_multiplier",
  },
};

export function acDescriptorFor(dialect: Dialect, subtype: number): AcDescriptor | undefined {
  return AC_SUBTYPES[dialect][subtype];
}

export function dialectFromProtocol(protocol: number): Dialect {
  switch (protocol) {
    case AudioProtocol.UAC_2_0:
      return UacVersion.UAC_2_0;
    case AudioProtocol.UAC_3_0:
      return UacVersion.UAC_3_0;
    default:
      return UacVersion.UAC_1_0;
  }
}

/**
 * Dialect used to number AudioControl subtypes: the parsed header wins,
 * then the interface protocol
 */
export function dialectOf(ac: AudioControlInterface | null, protocol: number): Dialect {
  const version = ac?.header?.uacVersion;
  if (version && version !== UacVersion.UNKNOWN) return version;
  return dialectFromProtocol(protocol);
}

// Rules shared by several entities

function channelRules<T extends { nrChannels: number; channelConfig: number; channelNames: string }>(): FieldRule<T>[] {
  return [
    { prefix: "bNrChannels", decode: "int", set: (t, v) => { t.nrChannels = v; } },
    { prefix: "wChannelConfig", decode: "hex", set: (t, v) => { t.channelConfig = v; } },
    { prefix: "bmChannelConfig", decode: "hex", set: (t, v) => { t.channelConfig = v; } },
    { prefix: "iChannelNames", decode: "string", set: (t, v) => { t.channelNames = v; } },
  ];
}

function pinRules<T extends { nrInPins: number; sourceIds: number[] }>(): FieldRule<T>[] {
  return [
    { prefix: "bNrInPins", decode: "int", set: (t, v) => { t.nrInPins = v; } },
    { prefix: "baSourceID", decode: "int", indexed: true, set: (t, v) => { t.sourceIds.push(v); } },
  ];
}

const HEADER_FIELDS = defineFields<Draft<AudioControlHeader>>([
  { prefix: "bcdADC", decode: "bcd", set: (t, v) => { t.bcdAdc = v; } },
  { prefix: "wTotalLength", decode: "auto", set: (t, v) => { t.totalLength = v; } },
  { prefix: "bInCollection", decode: "int", set: (t, v) => { t.inCollection = v; } },
  { prefix: "baInterfaceNr", decode: "int", indexed: true, set: (t, v) => { t.interfaceNumbers.push(v); } },
  { prefix: "bCategory", decode: "hex", set: (t, v) => { t.category = v; } },
  { prefix: "bmControls", decode: "hex", set: (t, v) => { t.controls = v; } },
]);

const INPUT_TERMINAL_FIELDS = defineFields<Draft<InputTerminal>>([
  { prefix: "bTerminalID", decode: "int", set: (t, v) => { t.id = v; } },
  { prefix: "wTerminalType", decode: "hex", set: (t, v) => { t.terminalType = v; } },
  { prefix: "bAssocTerminal", decode: "int", set: (t, v) => { t.assocTerminal = v; } },
  { prefix: "bCSourceID", decode: "int", set: (t, v) => { t.clockSourceId = v; } },
  { prefix: "bmControls", decode: "hex", set: (t, v) => { t.controls = v; } },
  { prefix: "iTerminal", decode: "string", set: (t, v) => { t.name = v; } },
  ...channelRules<Draft<InputTerminal>>(),
]);

const OUTPUT_TERMINAL_FIELDS = defineFields<Draft<OutputTerminal>>([
  { prefix: "bTerminalID", decode: "int", set: (t, v) => { t.id = v; } },
  { prefix: "wTerminalType", decode: "hex", set: (t, v) => { t.terminalType = v; } },
  { prefix: "bAssocTerminal", decode: "int", set: (t, v) => { t.assocTerminal = v; } },
  { prefix: "bSourceID", decode: "int", set: (t, v) => { t.sourceId = v; } },
  { prefix: "bCSourceID", decode: "int", set: (t, v) => { t.clockSourceId = v; } },
  { prefix: "bmControls", decode: "hex", set: (t, v) => { t.controls = v; } },
  { prefix: "iTerminal", decode: "string", set: (t, v) => { t.name = v; } },
]);

const FEATURE_UNIT_FIELDS = defineFields<Draft<FeatureUnit>>([
  { prefix: "bUnitID", decode: "int", set: (t, v) => { t.id = v; } },
  { prefix: "bSourceID", decode: "int", set: (t, v) => { t.sourceId = v; } },
  { prefix: "bmaControls", decode: "hex", indexed: true, set: (t, v) => { t.controls.push(v); } },
  { prefix: "iFeature", decode: "string", set: (t, v) => { t.name = v; } },
]);

const MIXER_UNIT_FIELDS = defineFields<Draft<MixerUnit>>([
  { prefix: "bUnitID", decode: "int", set: (t, v) => { t.id = v; } },
  { prefix: "iMixer", decode: "string", set: (t, v) => { t.name = v; } },
  ...pinRules<Draft<MixerUnit>>(),
  ...channelRules<Draft<MixerUnit>>(),
]);

const SELECTOR_UNIT_FIELDS = defineFields<Draft<SelectorUnit>>([
  { prefix: "bUnitID", decode: "int", set: (t, v) => { t.id = v; } },
  { prefix: "iSelector", decode: "string", set: (t, v) => { t.name = v; } },
  ...pinRules<Draft<SelectorUnit>>(),
]);

const PROCESSING_UNIT_FIELDS = defineFields<Draft<ProcessingUnit>>([
  { prefix: "bUnitID", decode: "int", set: (t, v) => { t.id = v; } },
  { prefix: "wProcessType", decode: "hex", set: (t, v) => { t.processType = v; } },
  { prefix: "bmControls", decode: "hex", set: (t, v) => { t.controls = v; } },
  { prefix: "iProcessing", decode: "string", set: (t, v) => { t.name = v; } },
  ...pinRules<Draft<ProcessingUnit>>(),
  ...channelRules<Draft<ProcessingUnit>>(),
]);

const EXTENSION_UNIT_FIELDS = defineFields<Draft<ExtensionUnit>>([
  { prefix: "bUnitID", decode: "int", set: (t, v) => { t.id = v; } },
  { prefix: "wExtensionCode", decode: "hex", set: (t, v) => { t.extensionCode = v; } },
  { prefix: "bmControls", decode: "hex", set: (t, v) => { t.controls = v; } },
  { prefix: "iExtension", decode: "string", set: (t, v) => { t.name = v; } },
  ...pinRules<Draft<ExtensionUnit>>(),
  ...channelRules<Draft<ExtensionUnit>>(),
]);

const CLOCK_SOURCE_FIELDS = defineFields<Draft<ClockSource>>([
  { prefix: "bClockID", decode: "int", set: (t, v) => { t.id = v; } },
  { prefix: "bmAttributes", decode: "hex", set: (t, v) => { t.attributes = v; } },
  { prefix: "bmControls", decode: "hex", set: (t, v) => { t.controls = v; } },
  { prefix: "bAssocTerminal", decode: "int", set: (t, v) => { t.assocTerminal = v; } },
  { prefix: "iClockSource", decode: "string", set: (t, v) => { t.name = v; } },
]);

const CLOCK_SELECTOR_FIELDS = defineFields<Draft<ClockSelector>>([
  { prefix: "bClockID", decode: "int", set: (t, v) => { t.id = v; } },
  { prefix: "bNrInPins", decode: "int", set: (t, v) => { t.nrInPins = v; } },
  { prefix: "baCSourceID", decode: "int", indexed: true, set: (t, v) => { t.clockPinIds.push(v); } },
  { prefix: "bmControls", decode: "hex", set: (t, v) => { t.controls = v; } },
  { prefix: "iClockSelector", decode: "string", set: (t, v) => { t.name = v; } },
]);

const CLOCK_MULTIPLIER_FIELDS = defineFields<Draft<ClockMultiplier>>([
  { prefix: "bClockID", decode: "int", set: (t, v) => { t.id = v; } },
  { prefix: "bCSourceID", decode: "int", set: (t, v) => { t.clockSourceId = v; } },
  { prefix: "bmControls", decode: "hex", set: (t, v) => { t.controls = v; } },
  { prefix: "iClockMultiplier", decode: "string", set: (t, v) => { t.name = v; } },
]);

function readHeader(lines: readonly Line[], protocol: number): AudioControlHeader {
  const header: Draft<AudioControlHeader> = {
    uacVersion: UacVersion.UNKNOWN,
    bcdAdc: 0,
    totalLength: 0,
    inCollection: 0,
    interfaceNumbers: [],
    category: 0,
    controls: 0,
  };
  applyFields(HEADER_FIELDS, header, lines);

  // UAC 3.0 headers carry no bcdADC; only a 2.0 or 3.0 protocol stands in for it
  if (header.bcdAdc === 0) {
    const announced = protocol === AudioProtocol.UAC_2_0 || protocol === AudioProtocol.UAC_3_0;
    header.uacVersion = announced ? dialectFromProtocol(protocol) : UacVersion.UNKNOWN;
  } else {
    header.uacVersion = header.bcdAdc >= 0x0200 ? UacVersion.UAC_2_0 : UacVersion.UAC_1_0;
  }
  return header;
}

function readFeatureUnit(lines: readonly Line[], dialect: Dialect): FeatureUnit {
  const unit: Draft<FeatureUnit> = {
    kind: "feature_unit",
    id: 0,
    sourceId: 0,
    nrChannels: 0,
    controls: [],
    controlEncoding: dialect === UacVersion.UAC_1_0 ? "bitmap" : "paired",
    name: "",
  };
  applyFields(FEATURE_UNIT_FIELDS, unit, lines);
  // bmaControls(0) is the master channel
  unit.nrChannels = Math.max(unit.controls.length - 1, 0);
  return unit;
}

/**
 * Decode one AudioControl descriptor body into ac
 */
export function readAudioControl(
  ac: Draft<AudioControlInterface>,
  descriptor: AcDescriptor,
  lines: readonly Line[],
  dialect: Dialect,
  protocol: number
): void {
  switch (descriptor) {
    case "header":
      ac.header = readHeader(lines, protocol);
      break;
    case "input_terminal": {
      const terminal: Draft<InputTerminal> = {
        kind: "input_terminal",
        id: 0,
        terminalType: 0,
        assocTerminal: 0,
        nrChannels: 0,
        channelConfig: 0,
        channelNames: "",
        name: "",
        clockSourceId: 0,
        controls: 0,
      };
      ac.inputTerminals.push(applyFields(INPUT_TERMINAL_FIELDS, terminal, lines));
      break;
    }
    case "output_terminal": {
      const terminal: Draft<OutputTerminal> = {
        kind: "output_terminal",
        id: 0,
        terminalType: 0,
        assocTerminal: 0,
        sourceId: 0,
        name: "",
        clockSourceId: 0,
        controls: 0,
      };
      ac.outputTerminals.push(applyFields(OUTPUT_TERMINAL_FIELDS, terminal, lines));
      break;
    }
    case "feature_unit":
      ac.featureUnits.push(readFeatureUnit(lines, dialect));
      break;
    case "mixer_unit": {
      const unit: Draft<MixerUnit> = {
        kind: "mixer_unit",
        id: 0,
        nrInPins: 0,
        sourceIds: [],
        nrChannels: 0,
        channelConfig: 0,
        channelNames: "",
        name: "",
      };
      ac.mixerUnits.push(applyFields(MIXER_UNIT_FIELDS, unit, lines));
      break;
    }
    case "selector_unit": {
      const unit: Draft<SelectorUnit> = { kind: "selector_unit", id: 0, nrInPins: 0, sourceIds: [], name: "" };
      ac.selectorUnits.push(applyFields(SELECTOR_UNIT_FIELDS, unit, lines));
      break;
    }
    case "processing_unit": {
      const unit: Draft<ProcessingUnit> = {
        kind: "processing_unit",
        id: 0,
        processType: 0,
        nrInPins: 0,
        sourceIds: [],
        nrChannels: 0,
        channelConfig: 0,
        channelNames: "",
        controls: 0,
        name: "",
      };
      ac.processingUnits.push(applyFields(PROCESSING_UNIT_FIELDS, unit, lines));
      break;
    }
    case "extension_unit": {
      const unit: Draft<ExtensionUnit> = {
        kind: "extension_unit",
        id: 0,
        extensionCode: 0,
        nrInPins: 0,
        sourceIds: [],
        nrChannels: 0,
        channelConfig: 0,
        channelNames: "",
        controls: 0,
        name: "",
      };
      ac.extensionUnits.push(applyFields(EXTENSION_UNIT_FIELDS, unit, lines));
      break;
    }
    case "clock_source": {
      const clock: Draft<ClockSource> = {
        kind: "clock_source",
        id: 0,
        attributes: 0,
        controls: 0,
        assocTerminal: 0,
        name: "",
      };
      ac.clockSources.push(applyFields(CLOCK_SOURCE_FIELDS, clock, lines));
      break;
    }
    case "clock_selector": {
      const clock: Draft<ClockSelector> = {
        kind: "clock_selector",
        id: 0,
        nrInPins: 0,
        clockPinIds: [],
        controls: 0,
        name: "",
      };
      ac.clockSelectors.push(applyFields(CLOCK_SELECTOR_FIELDS, clock, lines));
      break;
    }
    case "clock_multiplier": {
      const clock: Draft<ClockMultiplier> = {
        kind: "clock_multiplier",
        id: 0,
        clockSourceId: 0,
        controls: 0,
        name: "",
      };
      ac.clockMultipliers.push(applyFields(CLOCK_MULTIPLIER_FIELDS, clock, lines));
      break;
    }
  }
}
