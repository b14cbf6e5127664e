export { FmpBridge, createFmpToolCaller, decodeToolResult, defaultServerPath } from './fmp-bridge.js';
export type { FmpBridgeConfig, FmpToolCaller } from './fmp-bridge.js';
