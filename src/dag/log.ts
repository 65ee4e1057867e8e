import { getNodeConfig, type NodeConfig } from "../config/nodeConfig.js";
import { StructuredLogger } from "../logger.js";

/** Logger injected by the caller, takes precedence over the default one. */
let injectedLogger: StructuredLogger | null = null;
/** Default logger and the configuration it was built from. */
let defaultLogger: { logger: StructuredLogger; config: NodeConfig } | null = null;

/**
 * Updates the logger used by the node layer. Passing `null` reinstates the
 * default logger derived from the active {@link NodeConfig}.
 */
export function configureNodeLogger(logger: StructuredLogger | null | undefined): void {
  injectedLogger = logger ?? null;
}

/**
 * Returns the logger the node layer writes to. The default logger is rebuilt
 * whenever the active configuration object changes.
 */
export function getNodeLogger(): StructuredLogger {
  if (injectedLogger) {
    return injectedLogger;
  }
  const config = getNodeConfig();
  if (!defaultLogger || defaultLogger.config !== config) {
    defaultLogger = {
      logger: new StructuredLogger({ minLevel: config.logLevel, logFile: config.logFile }),
      config,
    };
  }
  return defaultLogger.logger;
}
