export { createLogger, componentLogger, silentLogger, timed } from "./logger"
export type { Logger, Component } from "./logger"
