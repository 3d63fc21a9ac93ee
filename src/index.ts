// Public API of the register bridge library

export * from "./backend/index.ts";
export {
  type RunningBridge,
  type StartBridgeOptions,
  startBridge,
} from "./bridge.ts";
export * from "./client/index.ts";
export { type BridgeConfig, loadConfig } from "./config.ts";
export * from "./connection/index.ts";
export * from "./dsp/index.ts";
export * from "./errors.ts";
export { EventEmitter } from "./events.ts";
export { AsyncLock } from "./lock.ts";
export {
  createLogger,
  type LogEntry,
  type Logger,
  type LoggerContext,
  type LoggerOptions,
  type LogLevel,
  silentLogger,
} from "./logger.ts";
export * from "./protocol/index.ts";
export * from "./server/index.ts";
export {
  formatAddress,
  formatHexBytes,
  formatHexDump,
  parseHexByteList,
  parseHexData,
  parseNumber,
  toHexString,
} from "./utils/hex.ts";
