/**
 * lsusb Text Parsing
 */

import { UsbAudioDevice } from "../model/device";
import { ParseError } from "../errors";
import { DescriptorParser } from "./lsusb";

function assertText(text: unknown): asserts text is string {
  if (typeof text !== "string") {
    throw new ParseError(`expected lsusb text, got ${text === null ? "null" : typeof text}`);
  }
}

/**
 * Every device in the dump, one per Device Descriptor section
 */
export function parseDevices(text: string): UsbAudioDevice[] {
  assertText(text);
  return new DescriptorParser(text).parse();
}

/**
 * The first device carrying audio data, else the first device,
 * else an empty device
 */
export function parse(text: string): UsbAudioDevice {
  const devices = parseDevices(text);
  return devices.find((device) => device.hasAudio) ?? devices[0] ?? new UsbAudioDevice();
}

export { DescriptorParser } from "./lsusb";
export { tokenize, LineCursor, type Line } from "./lines";
export {
  decodeAuto,
  decodeBcd,
  decodeHex,
  decodeInt,
  decodeString,
  applyField,
  applyFields,
  defineFields,
  type FieldRule,
  type FieldTable,
} from "./fields";
