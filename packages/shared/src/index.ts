export { buildDynamic, lazilyValidate, variables } from "./environment";
export {
  logger,
  StructuredLogger,
  createStructuredLogger,
  getLogMetrics,
  loggerOptions,
  namespaces,
} from "./logs";
export type { Namespace, LogLevel, LogMeta } from "./logs";
