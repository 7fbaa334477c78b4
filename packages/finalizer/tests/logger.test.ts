/**
 * Tests for logger.ts — createLogger.
 */

import { describe, it, expect } from "vitest";
import { createLogger, loggerOptionsFromConfig } from "../src/logger.js";
import { loadFinalizerConfig } from "../src/config.js";
import { Finalizer } from "../src/finalizer.js";
import { InMemoryExecutionTarget } from "../src/execution-target.js";
import { FakeL1Source, l1, l2 } from "./helpers.js";

describe("createLogger", () => {
  it("applies the configured level", () => {
    expect(createLogger({ level: "warn" }).level).toBe("warn");
    expect(createLogger({ level: "silent" }).level).toBe("silent");
  });

  it("binds the module name to every line", () => {
    expect(createLogger({ level: "info" }).bindings()).toEqual({ module: "finalizer" });
  });

  it("is accepted by the finalizer", async () => {
    const engine = new InMemoryExecutionTarget();
    const finalizer = new Finalizer({
      logger: createLogger({ level: "silent" }),
      l1Source: new FakeL1Source(),
      engine,
    });

    finalizer.recordProvenance(l2(100, l1(10)), l1(10));
    await finalizer.finalize(l1(10));

    expect(engine.currentFinalized().number).toBe(100);
  });
});

describe("loggerOptionsFromConfig", () => {
  it("pretty-prints in development", () => {
    const config = loadFinalizerConfig({ LOG_LEVEL: "debug" });

    expect(loggerOptionsFromConfig(config)).toEqual({ level: "debug", pretty: true });
  });

  it("logs JSON outside development", () => {
    const config = loadFinalizerConfig({ LOG_LEVEL: "warn", NODE_ENV: "production" });
    const options = loggerOptionsFromConfig(config);

    expect(options).toEqual({ level: "warn", pretty: false });
    expect(createLogger(options).level).toBe("warn");
  });
});
