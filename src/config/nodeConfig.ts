import { z } from "zod";

import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { readEnum, readNumber, readOptionalString } from "./env.js";

/** Relative tolerance applied to float parameters of standard gates. */
export const DEFAULT_PARAMETER_TOLERANCE = 1e-10;

/** Upper bound accepted for the parameter tolerance. */
export const MAX_PARAMETER_TOLERANCE = 1e-3;

/** Resolved configuration of the node layer. */
export interface NodeConfig {
  /** Relative tolerance used when comparing standard gate float parameters. */
  readonly parameterTolerance: number;
  /** Minimum level of the default node logger. */
  readonly logLevel: LogLevel;
  /** Optional file the default node logger mirrors its entries to. */
  readonly logFile: string | null;
}

const NodeConfigOverridesSchema = z
  .object({
    parameterTolerance: z.number().positive().max(MAX_PARAMETER_TOLERANCE),
    logLevel: z.enum(LOG_LEVELS),
    logFile: z.string().min(1).nullable(),
  })
  .strict()
  .partial();

export type NodeConfigOverrides = z.infer<typeof NodeConfigOverridesSchema>;

/**
 * Reads the node configuration from the environment:
 *
 * - `DAG_NODE_PARAM_TOLERANCE` (default `1e-10`, accepted range `(0, 1e-3]`)
 * - `DAG_NODE_LOG_LEVEL` (default `info`)
 * - `DAG_NODE_LOG_FILE` (unset by default)
 */
export function loadNodeConfigFromEnv(): NodeConfig {
  return {
    parameterTolerance: readNumber("DAG_NODE_PARAM_TOLERANCE", DEFAULT_PARAMETER_TOLERANCE, {
      min: 0,
      exclusiveMin: true,
      max: MAX_PARAMETER_TOLERANCE,
    }),
    logLevel: readEnum("DAG_NODE_LOG_LEVEL", LOG_LEVELS, "info"),
    logFile: readOptionalString("DAG_NODE_LOG_FILE") ?? null,
  };
}

let activeConfig: NodeConfig | null = null;

/** Returns the active configuration, reading the environment on first use. */
export function getNodeConfig(): NodeConfig {
  if (!activeConfig) {
    activeConfig = loadNodeConfigFromEnv();
  }
  return activeConfig;
}

/**
 * Overrides part of the active configuration. Overrides are validated; an
 * invalid tolerance or level throws a `ZodError` without touching the active
 * configuration.
 */
export function configureNodes(overrides: NodeConfigOverrides): NodeConfig {
  const parsed = NodeConfigOverridesSchema.parse(overrides);
  const current = getNodeConfig();
  activeConfig = {
    parameterTolerance: parsed.parameterTolerance ?? current.parameterTolerance,
    logLevel: parsed.logLevel ?? current.logLevel,
    logFile: parsed.logFile !== undefined ? parsed.logFile : current.logFile,
  };
  return activeConfig;
}

/** Drops overrides so the next read goes back to the environment. */
export function resetNodeConfig(): void {
  activeConfig = null;
}
