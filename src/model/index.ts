export * from "./types";
export * from "./entities";
export { terminalTypeName, hex } from "./terminal-types";
export { UsbAudioDevice } from "./device";
