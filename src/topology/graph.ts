/**
 * Topology Graph
 * Nodes for every AudioControl entity and edges for their source references
 */

import {
  allEntities,
  clockTypeName,
  featureControlNames,
  isUsbStreaming,
  processTypeName,
} from "../model/entities";
import { hex, terminalTypeName } from "../model/terminal-types";
import type { UsbAudioDevice } from "../model/device";
import type { AudioControlInterface, AudioEntity, AudioEntityKind } from "../model/types";
import { traceSignalPaths, type SignalPath } from "./paths";

export type NodeType = AudioEntityKind;

export interface TopologyNode {
  id: number;
  type: NodeType;
  name: string;
  description: string;
  channels: number;
  isUsbStreaming: boolean;
  controls: string[]; // feature unit control names
  entity: AudioEntity;
}

export interface TopologyEdge {
  sourceId: number;
  targetId: number;
  channels: number;
  isClock: boolean;
}

const UNIT_TYPES: ReadonlySet<NodeType> = new Set([
  "feature_unit",
  "mixer_unit",
  "selector_unit",
  "processing_unit",
  "extension_unit",
]);

const CLOCK_TYPES: ReadonlySet<NodeType> = new Set([
  "clock_source",
  "clock_selector",
  "clock_multiplier",
]);

export class TopologyGraph {
  readonly nodes: ReadonlyMap<number, TopologyNode>;
  readonly edges: readonly TopologyEdge[];
  readonly signalPaths: readonly SignalPath[];

  constructor(nodes: Map<number, TopologyNode>, edges: TopologyEdge[]) {
    this.nodes = nodes;
    this.edges = edges;
    this.signalPaths = traceSignalPaths(this);
  }

  private ofType(predicate: (node: TopologyNode) => boolean): TopologyNode[] {
    return [...this.nodes.values()].filter(predicate);
  }

  get inputTerminals(): TopologyNode[] {
    return this.ofType((node) => node.type === "input_terminal");
  }

  get outputTerminals(): TopologyNode[] {
    return this.ofType((node) => node.type === "output_terminal");
  }

  get units(): TopologyNode[] {
    return this.ofType((node) => UNIT_TYPES.has(node.type));
  }

  get clockEntities(): TopologyNode[] {
    return this.ofType((node) => CLOCK_TYPES.has(node.type));
  }

  // Host to device (playback)
  get usbInputTerminals(): TopologyNode[] {
    return this.inputTerminals.filter((node) => node.isUsbStreaming);
  }

  // Device to host (capture)
  get usbOutputTerminals(): TopologyNode[] {
    return this.outputTerminals.filter((node) => node.isUsbStreaming);
  }

  getNode(id: number): TopologyNode | undefined {
    return this.nodes.get(id);
  }

  /**
   * Nodes feeding into id over signal edges
   */
  getSources(id: number): TopologyNode[] {
    return this.signalNeighbours(
      (edge) => edge.targetId === id,
      (edge) => edge.sourceId
    );
  }

  /**
   * Nodes fed by id over signal edges
   */
  getTargets(id: number): TopologyNode[] {
    return this.signalNeighbours(
      (edge) => edge.sourceId === id,
      (edge) => edge.targetId
    );
  }

  private signalNeighbours(
    matches: (edge: TopologyEdge) => boolean,
    other: (edge: TopologyEdge) => number
  ): TopologyNode[] {
    const result: TopologyNode[] = [];
    for (const edge of this.edges) {
      if (edge.isClock || !matches(edge)) continue;
      const node = this.nodes.get(other(edge));
      if (node) result.push(node);
    }
    return result;
  }
}

function toNode(entity: AudioEntity): TopologyNode {
  const base = { id: entity.id, entity, isUsbStreaming: false, controls: [] };

  switch (entity.kind) {
    case "input_terminal":
      return {
        ...base,
        type: entity.kind,
        name: entity.name || terminalTypeName(entity.terminalType),
        description: terminalTypeName(entity.terminalType),
        channels: entity.nrChannels,
        isUsbStreaming: isUsbStreaming(entity),
      };
    case "output_terminal":
      return {
        ...base,
        type: entity.kind,
        name: entity.name || terminalTypeName(entity.terminalType),
        description: terminalTypeName(entity.terminalType),
        // Output terminals declare no channel count
        channels: 0,
        isUsbStreaming: isUsbStreaming(entity),
      };
    case "feature_unit":
      return {
        ...base,
        type: entity.kind,
        name: entity.name || `Feature Unit ${entity.id}`,
        description: "Feature Unit",
        channels: entity.nrChannels,
        controls: featureControlNames(entity),
      };
    case "mixer_unit":
      return {
        ...base,
        type: entity.kind,
        name: entity.name || `Mixer Unit ${entity.id}`,
        description: `Mixer (${entity.nrInPins} inputs)`,
        channels: entity.nrChannels,
      };
    case "selector_unit":
      return {
        ...base,
        type: entity.kind,
        name: entity.name || `Selector Unit ${entity.id}`,
        description: `Selector (${entity.nrInPins} inputs)`,
        channels: 0,
      };
    case "processing_unit":
      return {
        ...base,
        type: entity.kind,
        name: entity.name || `Processing Unit ${entity.id}`,
        description: processTypeName(entity.processType),
        channels: entity.nrChannels,
      };
    case "extension_unit":
      return {
        ...base,
        type: entity.kind,
        name: entity.name || `Extension Unit ${entity.id}`,
        description: `Extension (0x${hex(entity.extensionCode, 4)})`,
        channels: entity.nrChannels,
      };
    case "clock_source":
      return {
        ...base,
        type: entity.kind,
        name: entity.name || `Clock Source ${entity.id}`,
        description: clockTypeName(entity),
        channels: 0,
      };
    case "clock_selector":
      return {
        ...base,
        type: entity.kind,
        name: entity.name || `Clock Selector ${entity.id}`,
        description: `Clock Selector (${entity.nrInPins} inputs)`,
        channels: 0,
      };
    case "clock_multiplier":
      return {
        ...base,
        type: entity.kind,
        name: entity.name || `Clock Multiplier ${entity.id}`,
        description: "Clock Multiplier",
        channels: 0,
      };
  }
}

/**
 * Source references of an entity as (id, clock?) pairs
 */
function sourceRefs(entity: AudioEntity): Array<{ id: number; isClock: boolean }> {
  const signal = (ids: readonly number[]) => ids.map((id) => ({ id, isClock: false }));
  const clock = (ids: readonly number[]) => ids.map((id) => ({ id, isClock: true }));

  switch (entity.kind) {
    case "output_terminal":
    case "feature_unit":
      return entity.sourceId ? signal([entity.sourceId]) : [];
    case "mixer_unit":
    case "selector_unit":
    case "processing_unit":
    case "extension_unit":
      return signal(entity.sourceIds);
    case "clock_selector":
      return clock(entity.clockPinIds);
    case "clock_multiplier":
      return entity.clockSourceId ? clock([entity.clockSourceId]) : [];
    case "input_terminal":
    case "clock_source":
      return [];
  }
}

export function buildTopologyFromAudioControl(ac: AudioControlInterface | null): TopologyGraph {
  const nodes = new Map<number, TopologyNode>();
  const edges: TopologyEdge[] = [];
  if (!ac) return new TopologyGraph(nodes, edges);

  const entities = allEntities(ac);
  for (const entity of entities) {
    // First entity of a duplicated id wins
    if (!nodes.has(entity.id)) nodes.set(entity.id, toNode(entity));
  }

  for (const entity of entities) {
    if (nodes.get(entity.id)?.entity !== entity) continue;

    for (const ref of sourceRefs(entity)) {
      const source = nodes.get(ref.id);
      if (!source) continue;
      edges.push({
        sourceId: ref.id,
        targetId: entity.id,
        channels: ref.isClock ? 0 : source.channels,
        isClock: ref.isClock,
      });
    }
  }

  return new TopologyGraph(nodes, edges);
}

/**
 * Topology of the device's active configuration
 */
export function buildTopology(device: UsbAudioDevice): TopologyGraph {
  return buildTopologyFromAudioControl(device.audioControl);
}
