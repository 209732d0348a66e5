/**
 * USB Audio Class Topology Analyzer
 * Library entry point
 */

export * from "./model";
export { parse, parseDevices, DescriptorParser } from "./parser";
export * from "./topology";
export * from "./bandwidth/analyzer";
export * from "./render";
export { toDocument, toJson, toYaml, type DeviceDocument } from "./export/serialize";
export * from "./input";
export { ParseError, CliUsageError } from "./errors";
export { runCli, renderOutput, OutputFormat, type CliIo } from "./cli/run";
export { VERSION } from "./version";
