/**
 * Bandwidth Table
 * Alternate settings per streaming interface with their reservations
 */

import {
  bandwidthText,
  bytesPerSecondText,
  formatText,
  isDisabled,
  sampleRateText,
  syncTypeText,
  type BandwidthAnalysis,
  type BandwidthInfo,
} from "../bandwidth/analyzer";
import { heading, rule } from "./layout";

const TABLE_WIDTH = 85;

function row(alt: string, format: string, rate: string, sync: string, bandwidth: string): string {
  return [
    alt.padStart(4),
    format.padEnd(25),
    rate.padEnd(20),
    sync.padEnd(12),
    bandwidth.padEnd(12),
  ].join(" | ");
}

function settingRow(setting: BandwidthInfo): string {
  const alt = String(setting.alternateSetting);
  if (isDisabled(setting)) return row(alt, "(zero bandwidth - disabled)", "", "", "0");

  return row(
    alt,
    setting.format ? formatText(setting.format) : "Unknown",
    setting.format ? sampleRateText(setting.format) : "Unknown",
    syncTypeText(setting.syncType),
    bandwidthText(setting)
  );
}

export function renderBandwidthTable(analysis: BandwidthAnalysis): string {
  if (analysis.interfaces.length === 0) return "No streaming interfaces found.\n";

  const lines = heading("STREAMING INTERFACES AND BANDWIDTH", TABLE_WIDTH);

  for (const iface of analysis.interfaces) {
    lines.push("", `Interface ${iface.interfaceNumber}: ${iface.direction === "OUT" ? "Playback" : "Capture"}`);
    if (iface.terminalType) {
      lines.push(`  Terminal: ${iface.terminalType} (ID ${iface.terminalId})`);
    }
    lines.push(
      rule(TABLE_WIDTH),
      row("Alt", "Format", "Sample Rate", "Sync", "Bandwidth"),
      rule(TABLE_WIDTH),
      ...iface.alternateSettings.map(settingRow)
    );
  }

  lines.push("", rule(TABLE_WIDTH, "="), "BANDWIDTH SUMMARY", rule(TABLE_WIDTH));
  if (analysis.maxPlaybackBandwidth) {
    lines.push(`Max Playback Bandwidth: ${bytesPerSecondText(analysis.maxPlaybackBandwidth)}`);
  }
  if (analysis.maxCaptureBandwidth) {
    lines.push(`Max Capture Bandwidth:  ${bytesPerSecondText(analysis.maxCaptureBandwidth)}`);
  }
  lines.push(`Max Total Bandwidth:    ${bytesPerSecondText(analysis.maxTotalBandwidth)}`, "");

  return lines.join("\n");
}
