/**
 * JSON and YAML export
 * Plain-object view of the device, its topology and bandwidth
 */

import yaml from "js-yaml";
import {
  analyzeBandwidth,
  maxBandwidthSetting,
  sampleRateText,
  type BandwidthAnalysis,
} from "../bandwidth/analyzer";
import type { UsbAudioDevice } from "../model/device";
import { hex } from "../model/terminal-types";
import { buildTopology, type TopologyGraph } from "../topology/graph";
import { classifyPath, type PathKind } from "../topology/paths";

export interface DeviceDocument {
  device: {
    name: string;
    manufacturer: string;
    vendorId: string;
    productId: string;
    usbVersion: string;
    serialNumber: string;
  };
  uacVersion: string;
  availableUacVersions: string[];
  nodes: Array<{
    id: number;
    type: string;
    name: string;
    description: string;
    channels: number;
    usbStreaming: boolean;
    controls: string[];
  }>;
  edges: Array<{ source: number; target: number; channels: number; clock: boolean }>;
  paths: Array<{ kind: PathKind; nodes: number[]; description: string }>;
  bandwidth: {
    interfaces: Array<{
      interface: number;
      direction: string | null;
      terminal: string;
      maxBytesPerSecond: number;
      alternateSettings: Array<{
        alternateSetting: number;
        bytesPerSecond: number;
        maxPacketSize: number;
        sampleRates: string | null;
      }>;
    }>;
    maxPlaybackBytesPerSecond: number;
    maxCaptureBytesPerSecond: number;
    maxTotalBytesPerSecond: number;
  };
}

export function toDocument(
  device: UsbAudioDevice,
  graph: TopologyGraph = buildTopology(device),
  analysis: BandwidthAnalysis = analyzeBandwidth(device)
): DeviceDocument {
  const { descriptor } = device;

  return {
    device: {
      name: device.deviceName,
      manufacturer: device.manufacturerName,
      vendorId: hex(descriptor.vendorId, 4),
      productId: hex(descriptor.productId, 4),
      usbVersion: descriptor.usbVersion,
      serialNumber: descriptor.serialNumber,
    },
    uacVersion: device.uacVersion,
    availableUacVersions: device.availableUacVersions,
    nodes: [...graph.nodes.values()].map((node) => ({
      id: node.id,
      type: node.type,
      name: node.name,
      description: node.description,
      channels: node.channels,
      usbStreaming: node.isUsbStreaming,
      controls: node.controls,
    })),
    edges: graph.edges.map((edge) => ({
      source: edge.sourceId,
      target: edge.targetId,
      channels: edge.channels,
      clock: edge.isClock,
    })),
    paths: graph.signalPaths.map((path) => ({
      kind: classifyPath(path),
      nodes: path.nodes.map((node) => node.id),
      description: path.description,
    })),
    bandwidth: {
      interfaces: analysis.interfaces.map((iface) => ({
        interface: iface.interfaceNumber,
        direction: iface.direction,
        terminal: iface.terminalType,
        maxBytesPerSecond: maxBandwidthSetting(iface)?.bytesPerSecond ?? 0,
        alternateSettings: iface.alternateSettings.map((setting) => ({
          alternateSetting: setting.alternateSetting,
          bytesPerSecond: setting.bytesPerSecond,
          maxPacketSize: setting.maxPacketSize,
          sampleRates: setting.format ? sampleRateText(setting.format) : null,
        })),
      })),
      maxPlaybackBytesPerSecond: analysis.maxPlaybackBandwidth,
      maxCaptureBytesPerSecond: analysis.maxCaptureBandwidth,
      maxTotalBytesPerSecond: analysis.maxTotalBandwidth,
    },
  };
}

export function toJson(document: DeviceDocument): string {
  return JSON.stringify(document, null, 2);
}

export function toYaml(document: DeviceDocument): string {
  return yaml.dump(document, { noRefs: true, lineWidth: 120 });
}
