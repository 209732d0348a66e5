/**
 * Input Source Tests
 */

import { describe, it, before, after, afterEach } from "node:test";
import assert from "node:assert";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { Readable } from "stream";
import { fileURLToPath } from "url";
import {
  FileSource,
  LsusbSource,
  MockSource,
  StreamSource,
  createSource,
  formatDeviceSpec,
  parseDeviceSpec,
} from "../../src/input";
import { LogLevel, getLogLevel, resetLogSink, setLogLevel, setLogSink } from "../../src/logger";

const FIXTURE = fileURLToPath(new URL("../fixtures/multi-config.txt", import.meta.url));

describe("FileSource", () => {
  it("reads a file", async () => {
    const result = await new FileSource(FIXTURE).read();
    assert.strictEqual(result.ok, true);
    assert.strictEqual(result.origin, "file");
    assert.ok(result.text?.startsWith("Bus 002 Device 004"));
  });

  it("reports a missing file", async () => {
    const result = await new FileSource("/nonexistent/lsusb-dump.txt").read();
    assert.strictEqual(result.ok, false);
    assert.ok(result.error?.startsWith("Cannot read /nonexistent/lsusb-dump.txt: "));
  });
});

describe("StreamSource", () => {
  it("reads a piped stream to its end", async () => {
    const result = await new StreamSource(Readable.from(["Device ", "Descriptor:\n"])).read();
    assert.deepStrictEqual(result, { ok: true, text: "Device Descriptor:\n", origin: "stdin" });
  });

  it("keeps a character split across chunks intact", async () => {
    const bytes = Buffer.from("iProduct 2 Kopfhörer\n", "utf-8");
    const cut = bytes.indexOf(0xc3) + 1; // between the two bytes of "ö"
    const stream = Readable.from([bytes.subarray(0, cut), bytes.subarray(cut)]);
    const result = await new StreamSource(stream).read();
    assert.strictEqual(result.text, "iProduct 2 Kopfhörer\n");
  });

  it("refuses an interactive terminal", async () => {
    const tty = Object.assign(Readable.from([]), { isTTY: true });
    const result = await new StreamSource(tty).read();
    assert.strictEqual(result.ok, false);
    assert.strictEqual(result.error, "No input: pipe lsusb -v output, pass a file, or use --device");
  });
});

describe("device specs", () => {
  it("parses vid:pid pairs", () => {
    assert.deepStrictEqual(parseDeviceSpec("1234:ABCD"), { vendorId: 0x1234, productId: 0xabcd });
    assert.deepStrictEqual(parseDeviceSpec(" 1:2 "), { vendorId: 1, productId: 2 });
    assert.strictEqual(parseDeviceSpec("1234"), null);
    assert.strictEqual(parseDeviceSpec("12345:0001"), null);
  });

  it("formats specs for lsusb", () => {
    assert.strictEqual(formatDeviceSpec({ vendorId: 1, productId: 0xab }), "0001:00ab");
  });
});

describe("LsusbSource", () => {
  it("passes the device to lsusb", () => {
    const source = new LsusbSource({ vendorId: 0x1234, productId: 0xabcd });
    assert.deepStrictEqual(source.args, ["-v", "-d", "1234:abcd"]);
  });

  it("reports a missing executable", async () => {
    const source = new LsusbSource(
      { vendorId: 1, productId: 2 },
      { command: "/nonexistent/lsusb", timeoutMs: 1000 }
    );
    const result = await source.read();
    assert.strictEqual(result.ok, false);
    assert.strictEqual(result.origin, "lsusb");
    assert.ok(result.error?.startsWith("Cannot run /nonexistent/lsusb: "));
  });
});

describe("LsusbSource with a stand-in command", () => {
  const device = { vendorId: 0x1234, productId: 0xabcd };
  const initialLevel = getLogLevel();
  let dir: string;

  // Shell scripts standing in for lsusb
  async function script(name: string, body: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    return path;
  }

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), "uac-lsusb-"));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    resetLogSink();
    setLogLevel(initialLevel);
  });

  it("runs the configured command with the device filter", async () => {
    const command = await script("echo-args", 'echo "$@"');
    const result = await new LsusbSource(device, { command, timeoutMs: 5000 }).read();
    assert.deepStrictEqual(result, { ok: true, text: "-v -d 1234:abcd\n", origin: "lsusb" });
  });

  it("keeps the output of a non-zero exit and warns", async () => {
    const warnings: string[] = [];
    setLogLevel(LogLevel.WARN);
    setLogSink((line) => warnings.push(line));
    const command = await script(
      "partial",
      [
        'echo "Device Descriptor:"',
        'echo "  iProduct 2 Kopfhörer"',
        `echo "Couldn't open device, some information will be missing" >&2`,
        "exit 1",
      ].join("\n")
    );

    const result = await new LsusbSource(device, { command, timeoutMs: 5000 }).read();
    assert.deepStrictEqual(result, {
      ok: true,
      text: "Device Descriptor:\n  iProduct 2 Kopfhörer\n",
      origin: "lsusb",
    });
    assert.deepStrictEqual(warnings, [
      "[lsusb] warn: Couldn't open device, some information will be missing",
    ]);
  });

  it("reports a non-zero exit without output", async () => {
    const command = await script("missing-device", 'echo "lsusb: device not found" >&2\nexit 1');
    const result = await new LsusbSource(device, { command, timeoutMs: 5000 }).read();
    assert.deepStrictEqual(result, {
      ok: false,
      error: `${command} failed: lsusb: device not found`,
      origin: "lsusb",
    });
  });

  it("names the exit code when stderr is empty", async () => {
    const command = await script("silent-failure", "exit 3");
    const result = await new LsusbSource(device, { command, timeoutMs: 5000 }).read();
    assert.strictEqual(result.error, `${command} failed: exit code 3`);
  });

  it("gives up after the timeout", async () => {
    const command = await script("hang", "exec sleep 10");
    const result = await new LsusbSource(device, { command, timeoutMs: 100 }).read();
    assert.deepStrictEqual(result, {
      ok: false,
      error: `${command} timed out after 100ms`,
      origin: "lsusb",
    });
  });
});

describe("MockSource", () => {
  it("counts reads and can be updated", async () => {
    const source = MockSource.text("abc");
    assert.deepStrictEqual(await source.read(), { origin: "mock", ok: true, text: "abc" });
    source.setResult({ ok: false, error: "gone" });
    assert.deepStrictEqual(await source.read(), { origin: "mock", ok: false, error: "gone" });
    assert.strictEqual(source.readCalls, 2);
  });
});

describe("createSource", () => {
  it("prefers a file, then a device, then stdin", () => {
    const device = { vendorId: 1, productId: 2 };
    assert.ok(createSource({ file: FIXTURE, device }) instanceof FileSource);
    assert.ok(createSource({ file: "-", device }) instanceof LsusbSource);
    assert.ok(createSource({ file: "-" }) instanceof StreamSource);
    assert.ok(createSource() instanceof StreamSource);
  });
});
