export {
  clearDebugLogs,
  DEBUG_ENV_VAR,
  debugEnd,
  debugError,
  debugStart,
  getDebugLogs,
  isDebugEnabled,
  popParent,
  pushParent,
  reinitDebugMode,
  summarize,
  type DebugEvent,
} from "./debug";
