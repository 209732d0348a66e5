/**
 * One-screen device summary
 */

import type { UsbAudioDevice } from "../model/device";
import { buildTopology } from "../topology/graph";
import { capturePaths, playbackPaths } from "../topology/paths";
import { otherVersionsNote } from "./layout";

export function renderSummary(device: UsbAudioDevice): string {
  const lines = [
    `Device: ${device.deviceName}`,
    `Manufacturer: ${device.manufacturerName}`,
    `UAC Version: ${device.uacVersion}`,
  ];

  const note = otherVersionsNote(device.uacVersion, device.availableUacVersions);
  if (note) lines.push(note);

  const graph = buildTopology(device);
  const playback = playbackPaths(graph).length;
  const capture = capturePaths(graph).length;

  const capabilities: string[] = [];
  if (playback) capabilities.push(`${playback} playback path(s)`);
  if (capture) capabilities.push(`${capture} capture path(s)`);
  if (capabilities.length > 0) lines.push(`Capabilities: ${capabilities.join(", ")}`);

  const controls = new Set(graph.units.flatMap((node) => node.controls));
  if (controls.size > 0) lines.push(`Controls: ${[...controls].sort().join(", ")}`);

  return lines.join("\n");
}
