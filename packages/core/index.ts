export { DebugLogger } from './src/debug/DebugLogger.js';
export {
  ConfigurationManager,
  DEBUG_NAMESPACE_ROOT,
  isLogLevel,
} from './src/debug/ConfigurationManager.js';
export type {
  DebugOutput,
  DebugSettings,
  LogEntry,
  LogLevel,
} from './src/debug/types.js';
