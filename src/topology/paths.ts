/**
 * Signal Path Tracer
 * Input-to-output paths found by walking signal edges backwards
 */

import type { TopologyGraph, TopologyNode } from "./graph";

export interface SignalPath {
  nodes: TopologyNode[]; // input terminal first, output terminal last
  description: string;
}

export type PathKind = "playback" | "capture" | "loopback" | "internal";

export function describePath(nodes: readonly TopologyNode[]): string {
  const parts: string[] = [];
  for (const node of nodes) {
    switch (node.type) {
      case "input_terminal":
      case "output_terminal":
      case "processing_unit":
        parts.push(node.description);
        break;
      case "feature_unit":
        parts.push(node.controls.length > 0 ? `Feature (${node.controls.join(", ")})` : "Feature");
        break;
      case "mixer_unit":
        parts.push("Mixer");
        break;
      case "selector_unit":
        parts.push("Selector");
        break;
      case "extension_unit":
        parts.push("Extension");
        break;
      default:
        // Clock entities never sit on a signal path
        break;
    }
  }
  return parts.join(" -> ");
}

/**
 * All id sequences ending at nodeId that start at an input terminal.
 * onPath holds the ids already on the branch being walked.
 */
function traceBack(
  graph: TopologyGraph,
  nodeId: number,
  suffix: number[],
  onPath: ReadonlySet<number>
): number[][] {
  if (onPath.has(nodeId)) return [];

  const node = graph.getNode(nodeId);
  if (!node) return [];

  const path = [nodeId, ...suffix];
  if (node.type === "input_terminal") return [path];

  const branch = new Set(onPath).add(nodeId);
  return graph.getSources(nodeId).flatMap((source) => traceBack(graph, source.id, path, branch));
}

export function traceSignalPaths(graph: TopologyGraph): SignalPath[] {
  const paths: SignalPath[] = [];

  for (const output of graph.outputTerminals) {
    for (const ids of traceBack(graph, output.id, [], new Set())) {
      const nodes = ids.flatMap((id) => graph.getNode(id) ?? []);
      if (nodes.length > 0) {
        paths.push({ nodes, description: describePath(nodes) });
      }
    }
  }

  return paths;
}

export function inputNode(path: SignalPath): TopologyNode | undefined {
  return path.nodes[0];
}

export function outputNode(path: SignalPath): TopologyNode | undefined {
  return path.nodes[path.nodes.length - 1];
}

export function isPlayback(path: SignalPath): boolean {
  return inputNode(path)?.isUsbStreaming ?? false;
}

export function isCapture(path: SignalPath): boolean {
  return outputNode(path)?.isUsbStreaming ?? false;
}

export function classifyPath(path: SignalPath): PathKind {
  const playback = isPlayback(path);
  const capture = isCapture(path);
  if (playback && capture) return "loopback";
  if (playback) return "playback";
  if (capture) return "capture";
  return "internal";
}

/**
 * Paths starting at a USB streaming input terminal (host to device)
 */
export function playbackPaths(graph: TopologyGraph): SignalPath[] {
  return graph.signalPaths.filter(isPlayback);
}

/**
 * Paths ending at a USB streaming output terminal (device to host)
 */
export function capturePaths(graph: TopologyGraph): SignalPath[] {
  return graph.signalPaths.filter(isCapture);
}

export function internalPaths(graph: TopologyGraph): SignalPath[] {
  return graph.signalPaths.filter((path) => !isPlayback(path) && !isCapture(path));
}
