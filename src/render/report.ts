/**
 * Device Report
 * Structured text description of the active configuration
 */

import {
  analyzeBandwidth,
  availableFormats,
  formatText,
  sampleRateText,
  type BandwidthAnalysis,
} from "../bandwidth/analyzer";
import type { UsbAudioDevice } from "../model/device";
import { hex } from "../model/terminal-types";
import { buildTopology, type TopologyGraph, type TopologyNode } from "../topology/graph";
import { capturePaths, inputNode, outputNode, playbackPaths } from "../topology/paths";
import { heading, otherVersionsNote, section } from "./layout";

/**
 * "feature_unit" reads "Feature Unit"
 */
export function typeTitle(node: TopologyNode): string {
  return node.type
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

function deviceSummary(device: UsbAudioDevice): string[] {
  const { vendorId, productId, usbVersion } = device.descriptor;
  const lines = [
    ...section("DEVICE SUMMARY"),
    `  Product:      ${device.deviceName}`,
    `  Manufacturer: ${device.manufacturerName}`,
    `  VID:PID:      ${hex(vendorId, 4)}:${hex(productId, 4)}`,
    `  USB Version:  ${usbVersion}`,
    `  UAC Version:  ${device.uacVersion}`,
  ];
  if (device.availableUacVersions.length > 1) {
    const note = otherVersionsNote(device.uacVersion, device.availableUacVersions);
    if (note) lines.push(`  ${note}`);
  }
  lines.push("");
  return lines;
}

function signalFlow(graph: TopologyGraph): string[] {
  if (graph.signalPaths.length === 0) return [];

  const lines = section("SIGNAL FLOW SUMMARY");
  const playback = playbackPaths(graph);
  const capture = capturePaths(graph);

  if (playback.length > 0) {
    lines.push("  Playback:");
    for (const path of playback) {
      const node = outputNode(path);
      if (node) lines.push(`    -> ${node.description}`);
    }
  }
  if (capture.length > 0) {
    lines.push("  Capture:");
    for (const path of capture) {
      const node = inputNode(path);
      if (node) lines.push(`    <- ${node.description}`);
    }
  }
  lines.push("");
  return lines;
}

function entityLists(graph: TopologyGraph): string[] {
  const lines: string[] = [];
  const usb = (node: TopologyNode) => (node.isUsbStreaming ? " [USB]" : "");

  if (graph.inputTerminals.length > 0) {
    lines.push(...section("INPUT TERMINALS"));
    for (const node of graph.inputTerminals) {
      const channels = node.channels ? ` (${node.channels}ch)` : "";
      lines.push(`  ID ${node.id}: ${node.description}${channels}${usb(node)}`);
    }
    lines.push("");
  }

  if (graph.outputTerminals.length > 0) {
    lines.push(...section("OUTPUT TERMINALS"));
    for (const node of graph.outputTerminals) {
      lines.push(`  ID ${node.id}: ${node.description}${usb(node)}`);
    }
    lines.push("");
  }

  if (graph.units.length > 0) {
    lines.push(...section("PROCESSING UNITS"));
    for (const node of graph.units) {
      const controls = node.controls.length > 0 ? ` - Controls: ${node.controls.join(", ")}` : "";
      lines.push(`  ID ${node.id}: ${typeTitle(node)}${controls}`);
    }
    lines.push("");
  }

  if (graph.clockEntities.length > 0) {
    lines.push(...section("CLOCK ENTITIES"));
    for (const node of graph.clockEntities) {
      lines.push(`  ID ${node.id}: ${typeTitle(node)} - ${node.description}`);
    }
    lines.push("");
  }

  return lines;
}

function streamingInterfaces(analysis: BandwidthAnalysis): string[] {
  if (analysis.interfaces.length === 0) return [];

  const lines = section("STREAMING INTERFACES");
  for (const iface of analysis.interfaces) {
    lines.push(
      `  Interface ${iface.interfaceNumber}: ${iface.direction === "OUT" ? "Playback" : "Capture"}`,
      `    Terminal: ${iface.terminalType}`
    );
    const formats = availableFormats(iface);
    if (formats.length > 0) {
      lines.push("    Formats:");
      for (const format of formats) {
        lines.push(`      - ${formatText(format)} @ ${sampleRateText(format)}`);
      }
    }
    lines.push("");
  }
  return lines;
}

export function renderReport(
  device: UsbAudioDevice,
  graph: TopologyGraph = buildTopology(device),
  analysis: BandwidthAnalysis = analyzeBandwidth(device)
): string {
  return [
    ...heading("USB AUDIO DEVICE REPORT", 80),
    "",
    ...deviceSummary(device),
    ...signalFlow(graph),
    ...entityLists(graph),
    ...streamingInterfaces(analysis),
  ].join("\n");
}
