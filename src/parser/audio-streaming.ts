/**
 * AudioStreaming Descriptors
 * AS general and format type field tables
 */

import { createFormatType, createStreamingInterface, type Draft } from "../model/entities";
import type { AudioStreamingInterface, FormatTypeDescriptor } from "../model/types";
import { applyFields, defineFields } from "./fields";
import type { Line } from "./lines";

export type AsDescriptor = "general" | "format_type";

const AS_SUBTYPES: Record<number, AsDescriptor> = {
  0x01: "general",
  0x02: "format_type",
};

export function asDescriptorFor(subtype: number): AsDescriptor | undefined {
  return AS_SUBTYPES[subtype];
}

const GENERAL_FIELDS = defineFields<Draft<AudioStreamingInterface>>([
  { prefix: "bTerminalLink", decode: "int", set: (t, v) => { t.terminalLink = v; } },
  { prefix: "bDelay", decode: "int", set: (t, v) => { t.delay = v; } },
  { prefix: "wFormatTag", decode: "hex", set: (t, v) => { t.formatTag = v; } },
  { prefix: "bmControls", decode: "hex", set: (t, v) => { t.controls = v; } },
  { prefix: "bmFormats", decode: "hex", set: (t, v) => { t.formats = v; } },
  { prefix: "bNrChannels", decode: "int", set: (t, v) => { t.nrChannels = v; } },
  { prefix: "bClockSourceID", decode: "int", set: (t, v) => { t.clockSourceId = v; } },
]);

const FORMAT_FIELDS = defineFields<Draft<FormatTypeDescriptor>>([
  { prefix: "bFormatType", decode: "int", set: (t, v) => { t.formatType = v; } },
  { prefix: "bNrChannels", decode: "int", set: (t, v) => { t.nrChannels = v; } },
  { prefix: "bSubframeSize", decode: "int", set: (t, v) => { t.subframeSize = v; } },
  { prefix: "bSubslotSize", decode: "int", set: (t, v) => { t.subframeSize = v; } },
  { prefix: "bBitResolution", decode: "int", set: (t, v) => { t.bitResolution = v; } },
  { prefix: "tSamFreq", decode: "int", indexed: true, set: (t, v) => { t.sampleFrequencies.push(v); } },
  { prefix: "tLowerSamFreq", decode: "int", set: (t, v) => { t.freqMin = v; } },
  { prefix: "tUpperSamFreq", decode: "int", set: (t, v) => { t.freqMax = v; } },
]);

export function readGeneral(
  lines: readonly Line[],
  interfaceNumber: number,
  alternateSetting: number
): Draft<AudioStreamingInterface> {
  return applyFields(
    GENERAL_FIELDS,
    createStreamingInterface(interfaceNumber, alternateSetting),
    lines
  );
}

/**
 * Decode a format type body. A zero channel count falls back to the
 * AS general descriptor's, where UAC 2.0 keeps it.
 */
export function readFormatType(
  lines: readonly Line[],
  streaming: AudioStreamingInterface | null
): FormatTypeDescriptor {
  const format = applyFields(FORMAT_FIELDS, createFormatType(), lines);
  if (format.nrChannels === 0 && streaming) {
    format.nrChannels = streaming.nrChannels;
  }
  return format;
}
