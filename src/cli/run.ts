/**
 * CLI Runner
 * Flags to source, parse, render; returns the exit code
 */

import { parseArgs } from "util";
import { analyzeBandwidth } from "../bandwidth/analyzer";
import { config as defaultConfig, printConfig, type Config } from "../config";
import { CliUsageError } from "../errors";
import { toDocument, toJson, toYaml } from "../export/serialize";
import { createSource, parseDeviceSpec, type DescriptorSource, type InputStream, type SourceOptions } from "../input";
import { isLogLevel, setLogLevel } from "../logger";
import type { UsbAudioDevice } from "../model/device";
import { UacVersion } from "../model/types";
import { parse } from "../parser";
import { renderBandwidthTable, renderFull, renderReport, renderSummary, renderTopologyOnly } from "../render";
import { buildTopology } from "../topology/graph";
import { VERSION } from "../version";

export const OutputFormat = {
  FULL: "full",
  TOPOLOGY: "topology",
  REPORT: "report",
  BANDWIDTH: "bandwidth",
  SUMMARY: "summary",
  JSON: "json",
  YAML: "yaml",
} as const;

export type OutputFormat = (typeof OutputFormat)[keyof typeof OutputFormat];

const FORMATS: readonly string[] = Object.values(OutputFormat);

function isOutputFormat(value: string): value is OutputFormat {
  return FORMATS.includes(value);
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  stdin?: InputStream;
  config?: Config;
  /** Replaces the file/stdin/lsusb choice (tests pass a MockSource) */
  createSource?: (options: SourceOptions) => DescriptorSource;
}

export const USAGE = `
USB Audio Class Topology Analyzer

Usage:
  uac-analyzer [options] [file]
  lsusb -v -d 1234:5678 | uac-analyzer [options]

Options:
  -f, --format <name>       full, topology, report, bandwidth, summary, json, yaml (default: full)
  -u, --uac-version <ver>   Analyze the configuration for UAC 1.0, 2.0 or 3.0
  -d, --device <vid:pid>    Run lsusb -v for this device instead of reading input
  -q, --quiet               Suppress warnings
  -v, --version             Show version and exit
  --show-config             Print the effective configuration and exit
  --help                    Show this help

Environment Variables (overridden by CLI args):
  UAC_FORMAT            Default output format (default: full)
  UAC_LOG_LEVEL         Log level: debug, info, warn, error, silent (default: warn)
  UAC_RENDER_WIDTH      Topology diagram width (default: 80)
  UAC_LSUSB_PATH        lsusb executable (default: lsusb)
  UAC_LSUSB_TIMEOUT     lsusb timeout in ms (default: 5000)
  UAC_QUIET             Suppress warnings (default: false)
`;

/**
 * "2", "2.0" and "uac2" all name UAC 2.0
 */
export function parseUacVersion(value: string): UacVersion | null {
  const match = /^(?:uac)?([123])(?:\.0)?$/i.exec(value.trim());
  if (!match) return null;
  switch (match[1]) {
    case "1":
      return UacVersion.UAC_1_0;
    case "2":
      return UacVersion.UAC_2_0;
    default:
      return UacVersion.UAC_3_0;
  }
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        format: { type: "string", short: "f" },
        "uac-version": { type: "string", short: "u" },
        device: { type: "string", short: "d" },
        quiet: { type: "boolean", short: "q", default: false },
        version: { type: "boolean", short: "v", default: false },
        "show-config": { type: "boolean", default: false },
        help: { type: "boolean", default: false },
      },
    });
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }
}

export function renderOutput(device: UsbAudioDevice, format: OutputFormat, width: number): string {
  switch (format) {
    case OutputFormat.FULL:
      return renderFull(device, width);
    case OutputFormat.TOPOLOGY:
      return renderTopologyOnly(device, width);
    case OutputFormat.REPORT:
      return renderReport(device, buildTopology(device), analyzeBandwidth(device));
    case OutputFormat.BANDWIDTH:
      return renderBandwidthTable(analyzeBandwidth(device));
    case OutputFormat.SUMMARY:
      return renderSummary(device);
    case OutputFormat.JSON:
      return toJson(toDocument(device));
    case OutputFormat.YAML:
      return toYaml(toDocument(device));
  }
}

interface Options {
  format: OutputFormat;
  version: UacVersion | null;
  source: SourceOptions;
  quiet: boolean;
}

function resolveOptions(values: ReturnType<typeof parseFlags>, current: Config, stdin?: InputStream): Options {
  const { positionals } = values;
  if (positionals.length > 1) {
    throw new CliUsageError(`Expected at most one input file, got ${positionals.length}`);
  }

  const format = values.values.format ?? current.FORMAT;
  if (!isOutputFormat(format)) {
    throw new CliUsageError(`Unknown format "${format}" (choose from ${FORMATS.join(", ")})`);
  }

  let version: UacVersion | null = null;
  const requested = values.values["uac-version"];
  if (requested !== undefined) {
    version = parseUacVersion(requested);
    if (!version) throw new CliUsageError(`Unknown UAC version "${requested}" (choose from 1.0, 2.0, 3.0)`);
  }

  const source: SourceOptions = {
    file: positionals[0],
    stdin,
    lsusb: { command: current.LSUSB_PATH, timeoutMs: current.LSUSB_TIMEOUT },
  };
  const deviceSpec = values.values.device;
  if (deviceSpec !== undefined) {
    const device = parseDeviceSpec(deviceSpec);
    if (!device) throw new CliUsageError(`Invalid device "${deviceSpec}" (expected vid:pid in hex)`);
    source.device = device;
  }

  return {
    format,
    version,
    source,
    quiet: values.values.quiet || current.QUIET,
  };
}

/**
 * Run the analyzer with the given arguments (without node and script)
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const current = io.config ?? defaultConfig;

  let options: Options;
  try {
    const flags = parseFlags(argv);
    if (flags.values.help) {
      io.stdout(USAGE);
      return 0;
    }
    if (flags.values.version) {
      io.stdout(`uac-analyzer ${VERSION}`);
      return 0;
    }
    if (flags.values["show-config"]) {
      printConfig(current, io.stdout);
      return 0;
    }
    options = resolveOptions(flags, current, io.stdin);
  } catch (err) {
    if (err instanceof CliUsageError) {
      io.stderr(`Error: ${err.message}`);
      io.stderr("Try --help for usage.");
      return err.exitCode;
    }
    throw err;
  }

  if (options.quiet) {
    setLogLevel("error");
  } else if (isLogLevel(current.LOG_LEVEL)) {
    setLogLevel(current.LOG_LEVEL);
  }

  const source = (io.createSource ?? createSource)(options.source);
  const result = await source.read();
  if (!result.ok) {
    io.stderr(`Error: ${result.error ?? "Cannot read input"}`);
    return 1;
  }

  const text = result.text ?? "";
  if (!text.trim()) {
    io.stderr("Error: Empty input");
    return 1;
  }

  const device = parse(text);

  if (!device.hasAudio && !options.quiet) {
    io.stderr("Warning: No USB Audio Class descriptors found in input.");
    io.stderr("Make sure the input is from a USB audio device.");
  }

  if (options.version && !device.selectConfiguration(options.version)) {
    const available = device.availableUacVersions;
    const list = available.length > 0 ? available.join(", ") : "none";
    io.stderr(`Error: UAC ${options.version} configuration not found. Available versions: ${list}`);
    return 1;
  }

  io.stdout(renderOutput(device, options.format, current.RENDER_WIDTH));
  return 0;
}
