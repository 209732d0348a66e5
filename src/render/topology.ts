/**
 * Topology Diagram
 * Signal paths drawn as rows of ASCII boxes
 */

import type { TopologyGraph, TopologyNode } from "../topology/graph";
import { capturePaths, playbackPaths, type SignalPath } from "../topology/paths";
import { center, heading, rule, section } from "./layout";

const MIN_BOX_WIDTH = 12;
const ARROW = " --> ";

function boxLabels(node: TopologyNode): [string, string] {
  switch (node.type) {
    case "input_terminal":
      if (node.isUsbStreaming) return ["USB OUT", "(from host)"];
      return [node.description.slice(0, 15), node.channels ? `${node.channels}ch` : ""];
    case "output_terminal":
      if (node.isUsbStreaming) return ["USB IN", "(to host)"];
      return [node.description.slice(0, 15), ""];
    case "feature_unit": {
      if (node.controls.length === 0) return ["Feature", `ID ${node.id}`];
      const shown = node.controls.slice(0, 2).join(", ");
      return ["Feature", node.controls.length > 2 ? `${shown}...` : shown];
    }
    case "mixer_unit":
      return ["Mixer", node.description];
    case "selector_unit":
      return ["Selector", node.description];
    case "processing_unit":
      return ["Process", node.description.slice(0, 12)];
    case "extension_unit":
      return ["Extension", `ID ${node.id}`];
    default:
      return [node.name.slice(0, 12), ""];
  }
}

export function nodeBox(node: TopologyNode): string[] {
  const [label, sublabel] = boxLabels(node);
  const width = Math.max(label.length + 4, sublabel.length + 4, MIN_BOX_WIDTH);
  const border = `+${rule(width - 2)}+`;

  const box = [border, `|${center(label, width - 2)}|`];
  if (sublabel) box.push(`|${center(sublabel, width - 2)}|`);
  box.push(border);
  return box;
}

/**
 * Boxes side by side, joined by an arrow on the middle row
 */
export function renderSignalPath(path: SignalPath): string[] {
  if (path.nodes.length === 0) return ["  (empty path)"];

  const boxes = path.nodes.map(nodeBox);
  const height = Math.max(...boxes.map((box) => box.length));
  const middle = Math.floor(height / 2);

  const lines: string[] = [];
  for (let row = 0; row < height; row++) {
    const cells = boxes.map((box) => box[row] ?? " ".repeat(box[0].length));
    const gap = row === middle ? ARROW : " ".repeat(ARROW.length);
    lines.push(`  ${cells.join(gap)}`);
  }
  return lines;
}

function renderPaths(title: string, paths: SignalPath[]): string[] {
  if (paths.length === 0) return [];
  const lines = section(title);
  paths.forEach((path, index) => {
    lines.push(`Path ${index + 1}:`, ...renderSignalPath(path), "");
  });
  return lines;
}

function renderClocks(graph: TopologyGraph): string[] {
  const lines: string[] = [];
  for (const clock of graph.clockEntities) {
    switch (clock.type) {
      case "clock_source":
        lines.push(`  [Clock Source ${clock.id}] ${clock.name}`, `    Type: ${clock.description}`);
        break;
      case "clock_selector":
        lines.push(`  [Clock Selector ${clock.id}] ${clock.name}`);
        break;
      case "clock_multiplier":
        lines.push(`  [Clock Multiplier ${clock.id}] ${clock.name}`);
        break;
    }
  }
  return lines;
}

function renderEntities(graph: TopologyGraph): string[] {
  const lines: string[] = [];
  const usb = (node: TopologyNode) => (node.isUsbStreaming ? " (USB Streaming)" : "");

  if (graph.inputTerminals.length > 0) {
    lines.push("  Input Terminals:");
    for (const node of graph.inputTerminals) lines.push(`    [${node.id}] ${node.description}${usb(node)}`);
  }
  if (graph.outputTerminals.length > 0) {
    lines.push("  Output Terminals:");
    for (const node of graph.outputTerminals) lines.push(`    [${node.id}] ${node.description}${usb(node)}`);
  }
  if (graph.units.length > 0) {
    lines.push("  Units:");
    for (const node of graph.units) lines.push(`    [${node.id}] ${node.type}: ${node.name}`);
  }
  return lines;
}

export function renderTopology(graph: TopologyGraph, width = 80): string {
  const playback = playbackPaths(graph);
  const capture = capturePaths(graph);

  const lines = [
    ...heading("AUDIO TOPOLOGY", width),
    "",
    ...renderPaths("PLAYBACK PATHS (Host -> Device)", playback),
    ...renderPaths("CAPTURE PATHS (Device -> Host)", capture),
  ];

  if (graph.clockEntities.length > 0) {
    lines.push(...section("CLOCK TOPOLOGY"), ...renderClocks(graph), "");
  }

  if (playback.length === 0 && capture.length === 0) {
    lines.push(...section("ENTITIES"), ...renderEntities(graph), "");
  }

  return lines.join("\n");
}
