import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { ZodError } from "zod";

import {
  DEFAULT_PARAMETER_TOLERANCE,
  configureNodes,
  getNodeConfig,
  loadNodeConfigFromEnv,
  resetNodeConfig,
} from "../../src/config/nodeConfig.js";

const KEYS = ["DAG_NODE_PARAM_TOLERANCE", "DAG_NODE_LOG_LEVEL", "DAG_NODE_LOG_FILE"] as const;

describe("config/nodeConfig", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    resetNodeConfig();
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetNodeConfig();
  });

  it("falls back to the defaults when the environment is silent", () => {
    expect(loadNodeConfigFromEnv()).to.deep.equal({
      parameterTolerance: DEFAULT_PARAMETER_TOLERANCE,
      logLevel: "info",
      logFile: null,
    });
    expect(DEFAULT_PARAMETER_TOLERANCE).to.equal(1e-10);
  });

  it("reads overrides from the environment", () => {
    process.env.DAG_NODE_PARAM_TOLERANCE = "1e-8";
    process.env.DAG_NODE_LOG_LEVEL = "DEBUG";
    process.env.DAG_NODE_LOG_FILE = "/tmp/nodes.log";
    expect(loadNodeConfigFromEnv()).to.deep.equal({
      parameterTolerance: 1e-8,
      logLevel: "debug",
      logFile: "/tmp/nodes.log",
    });
  });

  it("ignores tolerances outside (0, 1e-3]", () => {
    for (const raw of ["0", "-1e-9", "0.01", "abc"]) {
      process.env.DAG_NODE_PARAM_TOLERANCE = raw;
      expect(loadNodeConfigFromEnv().parameterTolerance, raw).to.equal(DEFAULT_PARAMETER_TOLERANCE);
    }
    process.env.DAG_NODE_PARAM_TOLERANCE = "1e-3";
    expect(loadNodeConfigFromEnv().parameterTolerance).to.equal(1e-3);
  });

  it("caches the configuration until it is reset", () => {
    const first = getNodeConfig();
    process.env.DAG_NODE_PARAM_TOLERANCE = "1e-6";
    expect(getNodeConfig()).to.equal(first);
    resetNodeConfig();
    expect(getNodeConfig().parameterTolerance).to.equal(1e-6);
  });

  it("merges validated programmatic overrides", () => {
    const updated = configureNodes({ parameterTolerance: 1e-9 });
    expect(updated.parameterTolerance).to.equal(1e-9);
    expect(updated.logLevel).to.equal("info");
    expect(getNodeConfig()).to.equal(updated);

    expect(configureNodes({ logFile: "/tmp/a.log" }).logFile).to.equal("/tmp/a.log");
    expect(configureNodes({ logFile: null }).logFile).to.equal(null);
    expect(getNodeConfig().parameterTolerance).to.equal(1e-9);
  });

  it("rejects invalid overrides without touching the active configuration", () => {
    const before = getNodeConfig();
    expect(() => configureNodes({ parameterTolerance: 0 })).to.throw(ZodError);
    expect(() => configureNodes({ parameterTolerance: 0.5 })).to.throw(ZodError);
    expect(getNodeConfig()).to.equal(before);
  });
});
