export {
  analyticsConfigSchema,
  defaultConfig,
  loadConfig,
  resolveConfig,
  LOG_LEVELS,
} from "./config"
export type { AnalyticsConfig, LogLevel } from "./config"
