/**
 * CLI Tests
 */

import { describe, it, afterEach } from "node:test";
import assert from "node:assert";
import { USAGE, parseUacVersion, runCli, type CliIo } from "../../src/cli/run";
import type { Config } from "../../src/config";
import { MockSource, type SourceOptions } from "../../src/input";
import { getLogLevel, setLogLevel } from "../../src/logger";
import { parse } from "../../src/parser";
import { renderSummary } from "../../src/render";
import { fixture } from "../helpers";

const TEST_CONFIG: Config = {
  LOG_LEVEL: "warn",
  FORMAT: "full",
  RENDER_WIDTH: 80,
  LSUSB_PATH: "lsusb",
  LSUSB_TIMEOUT: 5000,
  QUIET: false,
};

interface Harness {
  io: CliIo;
  stdout: string[];
  stderr: string[];
  sources: SourceOptions[];
}

function harness(source: MockSource, config: Config = TEST_CONFIG): Harness {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const sources: SourceOptions[] = [];
  return {
    stdout,
    stderr,
    sources,
    io: {
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      config,
      createSource: (options) => {
        sources.push(options);
        return source;
      },
    },
  };
}

describe("runCli", () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
  });

  describe("informational flags", () => {
    it("prints usage", async () => {
      const h = harness(MockSource.text(""));
      assert.strictEqual(await runCli(["--help"], h.io), 0);
      assert.deepStrictEqual(h.stdout, [USAGE]);
    });

    it("prints the version without reading input", async () => {
      const source = MockSource.text("");
      const h = harness(source);
      assert.strictEqual(await runCli(["-v"], h.io), 0);
      assert.deepStrictEqual(h.stdout, ["uac-analyzer 0.1.0"]);
      assert.strictEqual(source.readCalls, 0);
    });

    it("prints the effective configuration", async () => {
      const h = harness(MockSource.text(""), { ...TEST_CONFIG, RENDER_WIDTH: 100 });
      assert.strictEqual(await runCli(["--show-config"], h.io), 0);
      assert.strictEqual(h.stdout[0], "UAC Analyzer Configuration:");
      assert.ok(h.stdout.includes("  Render Width:   100"));
    });
  });

  describe("usage errors", () => {
    const cases: Array<[string, string[], string]> = [
      ["format", ["-f", "xml"], 'Error: Unknown format "xml" (choose from full, topology, report, bandwidth, summary, json, yaml)'],
      ["class version", ["-u", "4"], 'Error: Unknown UAC version "4" (choose from 1.0, 2.0, 3.0)'],
      ["device", ["-d", "usb1"], 'Error: Invalid device "usb1" (expected vid:pid in hex)'],
      ["file count", ["a.txt", "b.txt"], "Error: Expected at most one input file, got 2"],
    ];

    for (const [name, argv, message] of cases) {
      it(`rejects a bad ${name} with exit code 2`, async () => {
        const h = harness(MockSource.text(""));
        assert.strictEqual(await runCli(argv, h.io), 2);
        assert.deepStrictEqual(h.stderr, [message, "Try --help for usage."]);
        assert.deepStrictEqual(h.stdout, []);
      });
    }

    it("rejects unknown flags", async () => {
      const h = harness(MockSource.text(""));
      assert.strictEqual(await runCli(["--bogus"], h.io), 2);
      assert.strictEqual(h.stderr[1], "Try --help for usage.");
    });
  });

  describe("input", () => {
    it("passes the file and device to the source", async () => {
      const h = harness(MockSource.text(fixture("uac1-headset.txt")));
      await runCli(["-d", "1234:5678", "dump.txt"], h.io);
      assert.strictEqual(h.sources[0].file, "dump.txt");
      assert.deepStrictEqual(h.sources[0].device, { vendorId: 0x1234, productId: 0x5678 });
      assert.deepStrictEqual(h.sources[0].lsusb, { command: "lsusb", timeoutMs: 5000 });
    });

    it("fails when the source fails", async () => {
      const h = harness(MockSource.failing("Cannot read dump.txt: not found"));
      assert.strictEqual(await runCli(["dump.txt"], h.io), 1);
      assert.deepStrictEqual(h.stderr, ["Error: Cannot read dump.txt: not found"]);
    });

    it("fails on empty input", async () => {
      const h = harness(MockSource.text("  \n\n"));
      assert.strictEqual(await runCli([], h.io), 1);
      assert.deepStrictEqual(h.stderr, ["Error: Empty input"]);
    });

    it("warns when no audio descriptors are found", async () => {
      const h = harness(MockSource.text("Bus 001 Device 001: ID 1d6b:0002 root hub\n"));
      assert.strictEqual(await runCli(["-f", "summary"], h.io), 0);
      assert.deepStrictEqual(h.stderr, [
        "Warning: No USB Audio Class descriptors found in input.",
        "Make sure the input is from a USB audio device.",
      ]);
    });

    it("stays quiet with -q", async () => {
      const h = harness(MockSource.text("Bus 001 Device 001: ID 1d6b:0002 root hub\n"));
      assert.strictEqual(await runCli(["-q", "-f", "summary"], h.io), 0);
      assert.deepStrictEqual(h.stderr, []);
      assert.strictEqual(getLogLevel(), "error");
    });

    it("stays quiet when configured", async () => {
      const h = harness(MockSource.text("no descriptors here"), { ...TEST_CONFIG, QUIET: true });
      await runCli([], h.io);
      assert.deepStrictEqual(h.stderr, []);
    });
  });

  describe("output", () => {
    it("renders the requested format", async () => {
      const text = fixture("uac1-headset.txt");
      const h = harness(MockSource.text(text));
      assert.strictEqual(await runCli(["--format", "summary"], h.io), 0);
      assert.deepStrictEqual(h.stdout, [renderSummary(parse(text))]);
    });

    it("takes the default format from the configuration", async () => {
      const h = harness(MockSource.text(fixture("uac2-interface.txt")), { ...TEST_CONFIG, FORMAT: "json" });
      assert.strictEqual(await runCli([], h.io), 0);
      const doc: unknown = JSON.parse(h.stdout[0]);
      assert.strictEqual(Reflect.get(Object(doc), "uacVersion"), "2.0");
    });

    it("renders YAML", async () => {
      const h = harness(MockSource.text(fixture("uac2-interface.txt")));
      assert.strictEqual(await runCli(["-f", "yaml"], h.io), 0);
      assert.ok(h.stdout[0].split("\n").includes("uacVersion: '2.0'"));
    });

    it("selects a configuration by class version", async () => {
      const h = harness(MockSource.text(fixture("multi-config.txt")));
      assert.strictEqual(await runCli(["-u", "1", "-f", "summary"], h.io), 0);
      assert.deepStrictEqual(h.stdout[0].split("\n").slice(2, 4), [
        "UAC Version: 1.0",
        "Note: Device also supports UAC 2.0. Use --uac-version to select.",
      ]);
    });

    it("names the available versions when selection fails", async () => {
      const h = harness(MockSource.text(fixture("multi-config.txt")));
      assert.strictEqual(await runCli(["--uac-version", "3.0"], h.io), 1);
      assert.deepStrictEqual(h.stderr, [
        "Error: UAC 3.0 configuration not found. Available versions: 1.0, 2.0",
      ]);
      assert.deepStrictEqual(h.stdout, []);
    });
  });
});

describe("parseUacVersion", () => {
  it("accepts short and long spellings", () => {
    assert.strictEqual(parseUacVersion("2"), "2.0");
    assert.strictEqual(parseUacVersion("3.0"), "3.0");
    assert.strictEqual(parseUacVersion("UAC1"), "1.0");
    assert.strictEqual(parseUacVersion("2.1"), null);
  });
});
