/**
 * Model Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import {
  UsbAudioDevice,
  clockTypeName,
  createAudioControl,
  createConfiguration,
  createDeviceDescriptor,
  createFormatType,
  createStreamingInterface,
  featureControlNames,
  findEntity,
  hasMute,
  hasVolume,
  hex,
  isSyncedToSof,
  isZeroBandwidth,
  processTypeName,
  sampleRateRange,
  streamingFormatName,
  terminalTypeName,
  type ClockSource,
  type FeatureUnit,
  type UacVersion,
} from "../../src/model";

function featureUnit(controls: number[], controlEncoding: FeatureUnit["controlEncoding"]): FeatureUnit {
  return {
    kind: "feature_unit",
    id: 1,
    sourceId: 0,
    nrChannels: 0,
    controls,
    controlEncoding,
    name: "",
  };
}

function clock(attributes: number): ClockSource {
  return { kind: "clock_source", id: 1, attributes, controls: 0, assocTerminal: 0, name: "" };
}

function configuration(uacVersion: UacVersion, configValue: number) {
  return { ...createConfiguration(), uacVersion, configValue };
}

describe("terminalTypeName", () => {
  it("names known terminal types", () => {
    assert.strictEqual(terminalTypeName(0x0101), "USB Streaming");
    assert.strictEqual(terminalTypeName(0x0201), "Microphone");
    assert.strictEqual(terminalTypeName(0x0302), "Headphones");
  });

  it("falls back to the category of unknown codes", () => {
    assert.strictEqual(terminalTypeName(0x02ff), "Input (0x02FF)");
    assert.strictEqual(terminalTypeName(0x0999), "Unknown (0x0999)");
  });

  it("hex pads and upper-cases", () => {
    assert.strictEqual(hex(0xab, 4), "00AB");
  });
});

describe("feature unit controls", () => {
  it("reads one bit per control", () => {
    const unit = featureUnit([0x0201], "bitmap");
    assert.deepStrictEqual(featureControlNames(unit), ["Mute", "Loudness"]);
    assert.strictEqual(hasMute(unit), true);
    assert.strictEqual(hasVolume(unit), false);
  });

  it("reads two-bit pairs", () => {
    // Volume read-only, Input Gain read/write
    const unit = featureUnit([0x4 | (0x3 << 20)], "paired");
    assert.deepStrictEqual(featureControlNames(unit), ["Volume", "Input Gain"]);
    assert.strictEqual(hasVolume(unit), true);
  });

  it("decodes the same bitmap differently per layout", () => {
    assert.deepStrictEqual(featureControlNames(featureUnit([0x0f], "bitmap")), [
      "Mute",
      "Volume",
      "Bass",
      "Mid",
    ]);
    assert.deepStrictEqual(featureControlNames(featureUnit([0x0f], "paired")), ["Mute", "Volume"]);
  });

  it("has no controls without a master entry", () => {
    assert.deepStrictEqual(featureControlNames(featureUnit([], "paired")), []);
  });
});

describe("clock sources", () => {
  it("names the clock type and SOF sync", () => {
    assert.strictEqual(clockTypeName(clock(0)), "External");
    assert.strictEqual(clockTypeName(clock(0x05)), "Internal Fixed");
    assert.strictEqual(isSyncedToSof(clock(0x05)), true);
    assert.strictEqual(isSyncedToSof(clock(0x03)), false);
  });
});

describe("processTypeName", () => {
  it("names known processes and formats others", () => {
    assert.strictEqual(processTypeName(0x01), "Up/Downmix");
    assert.strictEqual(processTypeName(0x1f), "Process 0x1F");
  });
});

describe("streaming formats", () => {
  it("prefers bmFormats bits", () => {
    const streaming = { ...createStreamingInterface(1, 1), formats: 0x80000005 };
    assert.strictEqual(streamingFormatName(streaming), "PCM/IEEE Float/Raw Data");
  });

  it("reports unknown bmFormats bits", () => {
    const streaming = { ...createStreamingInterface(1, 1), formats: 0x100 };
    assert.strictEqual(streamingFormatName(streaming), "Unknown (0x00000100)");
  });

  it("falls back to wFormatTag", () => {
    assert.strictEqual(streamingFormatName({ ...createStreamingInterface(1, 1), formatTag: 2 }), "PCM8");
    assert.strictEqual(
      streamingFormatName({ ...createStreamingInterface(1, 1), formatTag: 0x2001 }),
      "Unknown (0x2001)"
    );
  });

  it("computes sample rate ranges", () => {
    assert.deepStrictEqual(
      sampleRateRange({ ...createFormatType(), sampleFrequencies: [96000, 44100, 48000] }),
      [44100, 96000]
    );
    assert.deepStrictEqual(
      sampleRateRange({ ...createFormatType(), freqMin: 8000, freqMax: 96000 }),
      [8000, 96000]
    );
    assert.deepStrictEqual(sampleRateRange(createFormatType()), [0, 0]);
  });

  it("flags zero-bandwidth alternate settings", () => {
    const alt = { interfaceNumber: 1, alternateSetting: 0, streamingInterface: null, format: null, endpoint: null };
    assert.strictEqual(isZeroBandwidth(alt), true);
  });
});

describe("findEntity", () => {
  it("finds the first entity with an id across kinds", () => {
    const ac = createAudioControl();
    ac.clockSources.push(clock(1));
    assert.strictEqual(findEntity(ac, 1)?.kind, "clock_source");
    assert.strictEqual(findEntity(ac, 2), undefined);
  });
});

describe("UsbAudioDevice", () => {
  it("defaults to the highest version, first on ties", () => {
    const device = new UsbAudioDevice(createDeviceDescriptor(), [
      configuration("2.0", 1),
      configuration("1.0", 2),
      configuration("2.0", 3),
    ]);
    assert.strictEqual(device.activeConfiguration?.configValue, 1);
    assert.deepStrictEqual(device.availableUacVersions, ["2.0", "1.0"]);
  });

  it("has no active configuration when empty", () => {
    const device = new UsbAudioDevice();
    assert.strictEqual(device.activeConfiguration, null);
    assert.deepStrictEqual(device.streamingInterfaces, []);
    assert.deepStrictEqual(device.alternateSettings, []);
    assert.strictEqual(device.manufacturerName, "Unknown");
  });

  it("names unnamed devices by their ids", () => {
    const descriptor = { ...createDeviceDescriptor(), vendorId: 0x1a2b, productId: 0x3c };
    assert.strictEqual(new UsbAudioDevice(descriptor).deviceName, "USB Audio Device 1A2B:003C");
  });

  it("reports audio only for configurations with audio interfaces", () => {
    const config = configuration("unknown", 1);
    assert.strictEqual(new UsbAudioDevice(createDeviceDescriptor(), [config]).hasAudio, false);
    config.audioControl = createAudioControl();
    assert.strictEqual(new UsbAudioDevice(createDeviceDescriptor(), [config]).hasAudio, true);
  });
});
