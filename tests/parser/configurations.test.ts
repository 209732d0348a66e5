/**
 * Multi-configuration Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import { parse } from "../../src/parser";
import { buildTopology } from "../../src/topology/graph";
import { fixture } from "../helpers";

describe("multi-configuration devices", () => {
  it("keeps every configuration with its own class version", () => {
    const device = parse(fixture("multi-config.txt"));
    assert.deepStrictEqual(
      device.configurations.map((c) => [c.configValue, c.name, c.uacVersion]),
      [
        [1, "Legacy Mode", "1.0"],
        [2, "High Resolution", "2.0"],
      ]
    );
    assert.deepStrictEqual(device.availableUacVersions, ["1.0", "2.0"]);
  });

  it("activates the highest class version by default", () => {
    const device = parse(fixture("multi-config.txt"));
    assert.strictEqual(device.uacVersion, "2.0");
    assert.strictEqual(device.activeConfiguration?.configValue, 2);
    assert.strictEqual(device.audioControl?.clockSources[0].id, 5);
  });

  it("switches configurations by class version", () => {
    const device = parse(fixture("multi-config.txt"));
    assert.strictEqual(device.selectConfiguration("1.0"), true);
    assert.strictEqual(device.uacVersion, "1.0");
    assert.strictEqual(device.audioControl?.clockSources.length, 0);
    assert.deepStrictEqual(
      buildTopology(device).signalPaths.map((p) => p.description),
      ["USB Streaming -> Speaker"]
    );
  });

  it("keeps the selection when the version is missing", () => {
    const device = parse(fixture("multi-config.txt"));
    assert.strictEqual(device.selectConfiguration("3.0"), false);
    assert.strictEqual(device.selectConfiguration("unknown"), false);
    assert.strictEqual(device.uacVersion, "2.0");
  });

  it("keeps a non-default selection when the version is missing", () => {
    const device = parse(fixture("multi-config.txt"));
    assert.strictEqual(device.selectConfiguration("1.0"), true);
    assert.strictEqual(device.selectConfiguration("3.0"), false);
    assert.strictEqual(device.uacVersion, "1.0");
    assert.strictEqual(device.activeConfiguration?.configValue, 1);
  });

  it("builds each configuration's topology separately", () => {
    const device = parse(fixture("multi-config.txt"));
    assert.deepStrictEqual(
      buildTopology(device).signalPaths.map((p) => p.description),
      ["USB Streaming -> Feature (Volume) -> Speaker"]
    );
  });

  it("reads names from the ID database when string indexes are zero", () => {
    const device = parse(fixture("multi-config.txt"));
    assert.strictEqual(device.deviceName, "Dual Mode DAC");
    assert.strictEqual(device.manufacturerName, "Placeholder Audio");
  });
});

describe("class version from bcdADC", () => {
  function versionOf(bcdAdc: string): string {
    const text = [
      "Configuration Descriptor:",
      "  Interface Descriptor:",
      "    bInterfaceClass 1 Audio",
      "    bInterfaceSubClass 1 Control Device",
      "    AudioControl Interface Descriptor:",
      "      bDescriptorSubtype 1 (HEADER)",
      `      bcdADC ${bcdAdc}`,
    ].join("\n");
    return parse(text).uacVersion;
  }

  it("reads versions below 2.00 as UAC 1.0", () => {
    assert.strictEqual(versionOf("1.00"), "1.0");
    assert.strictEqual(versionOf("1.99"), "1.0");
  });

  it("reads 2.00 as UAC 2.0", () => {
    assert.strictEqual(versionOf("2.00"), "2.0");
  });
});
