export {
  TopologyGraph,
  buildTopology,
  buildTopologyFromAudioControl,
  type NodeType,
  type TopologyEdge,
  type TopologyNode,
} from "./graph";
export {
  capturePaths,
  classifyPath,
  describePath,
  inputNode,
  internalPaths,
  outputNode,
  playbackPaths,
  traceSignalPaths,
  type PathKind,
  type SignalPath,
} from "./paths";
