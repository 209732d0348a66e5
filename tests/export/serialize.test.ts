/**
 * Export Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import yaml from "js-yaml";
import { toDocument, toJson, toYaml } from "../../src/export/serialize";
import { parse } from "../../src/parser";
import { fixture } from "../helpers";

describe("toDocument", () => {
  const doc = toDocument(parse(fixture("uac1-headset.txt")));

  it("describes the device", () => {
    assert.deepStrictEqual(doc.device, {
      name: "Test Headset Pro",
      manufacturer: "Example Audio",
      vendorId: "1234",
      productId: "5678",
      usbVersion: "1.10",
      serialNumber: "",
    });
    assert.strictEqual(doc.uacVersion, "1.0");
    assert.deepStrictEqual(doc.availableUacVersions, ["1.0"]);
  });

  it("lists nodes, edges and classified paths", () => {
    assert.deepStrictEqual(
      doc.nodes.map((n) => n.id),
      [1, 2, 6, 7, 5, 4]
    );
    assert.deepStrictEqual(doc.nodes[4], {
      id: 5,
      type: "feature_unit",
      name: "Feature Unit 5",
      description: "Feature Unit",
      channels: 2,
      usbStreaming: false,
      controls: ["Mute", "Volume"],
    });
    assert.deepStrictEqual(doc.edges[0], { source: 5, target: 6, channels: 2, clock: false });
    assert.deepStrictEqual(
      doc.paths.map((p) => [p.kind, p.nodes]),
      [
        ["playback", [1, 5, 6]],
        ["capture", [2, 4, 7]],
      ]
    );
  });

  it("summarizes bandwidth", () => {
    assert.deepStrictEqual(doc.bandwidth.interfaces[0], {
      interface: 1,
      direction: "OUT",
      terminal: "USB Streaming",
      maxBytesPerSecond: 1_536_000,
      alternateSettings: [
        { alternateSetting: 0, bytesPerSecond: 0, maxPacketSize: 0, sampleRates: null },
        { alternateSetting: 1, bytesPerSecond: 1_536_000, maxPacketSize: 192, sampleRates: "48.0 kHz" },
      ],
    });
    assert.strictEqual(doc.bandwidth.maxTotalBytesPerSecond, 2_336_000);
  });
});

describe("serializers", () => {
  const doc = toDocument(parse(fixture("uac2-interface.txt")));

  it("writes indented JSON", () => {
    const text = toJson(doc);
    assert.deepStrictEqual(JSON.parse(text), doc);
    assert.ok(text.startsWith('{\n  "device": {\n    "name": "Studio 2x2",'));
  });

  it("writes YAML", () => {
    const text = toYaml(doc);
    const lines = text.split("\n");
    assert.strictEqual(lines[0], "device:");
    assert.strictEqual(lines[1], "  name: Studio 2x2");
    assert.ok(lines.includes("uacVersion: '2.0'"));
    assert.deepStrictEqual(yaml.load(text), doc);
  });
});
