/**
 * Renderers
 * Full and topology-only output built from one device
 */

import { analyzeBandwidth } from "../bandwidth/analyzer";
import type { UsbAudioDevice } from "../model/device";
import { buildTopology } from "../topology/graph";
import { renderBandwidthTable } from "./bandwidth-table";
import { renderReport } from "./report";
import { renderTopology } from "./topology";

/**
 * Topology diagram, report and bandwidth table
 */
export function renderFull(device: UsbAudioDevice, width = 80): string {
  const graph = buildTopology(device);
  const analysis = analyzeBandwidth(device);
  return [
    renderTopology(graph, width),
    renderReport(device, graph, analysis),
    renderBandwidthTable(analysis),
  ].join("\n");
}

export function renderTopologyOnly(device: UsbAudioDevice, width = 80): string {
  return renderTopology(buildTopology(device), width);
}

export { renderTopology, renderSignalPath, nodeBox } from "./topology";
export { renderReport } from "./report";
export { renderSummary } from "./summary";
export { renderBandwidthTable } from "./bandwidth-table";
