import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { loadValidatorConfig } from "../config";
import { createRootLogger } from "../logger";

describe("loadValidatorConfig", () => {
  it("applies defaults", () => {
    assert.deepEqual(loadValidatorConfig({}), { logLevel: "info", serviceName: "provtag-validator" });
  });

  it("reads overrides", () => {
    const cfg = loadValidatorConfig({ PROVTAG_LOG_LEVEL: "silent", PROVTAG_SERVICE_NAME: "ingest" });
    assert.deepEqual(cfg, { logLevel: "silent", serviceName: "ingest" });
  });

  it("rejects an unknown log level", () => {
    assert.throws(() => loadValidatorConfig({ PROVTAG_LOG_LEVEL: "loud" }));
  });
});

describe("createRootLogger", () => {
  it("writes JSON lines with service and category bindings", () => {
    const lines: string[] = [];
    const logger = createRootLogger(
      { logLevel: "info", serviceName: "test-service" },
      { write: (msg: string) => void lines.push(msg) }
    );

    logger.child({ category: "validator.must" }).error({ kind: "series" }, "series failed validation");
    logger.debug("below level");

    assert.equal(lines.length, 1);
    const entry: unknown = JSON.parse(lines[0] ?? "");
    assert.ok(entry && typeof entry === "object");
    assert.equal(Reflect.get(entry, "level"), 50);
    assert.equal(Reflect.get(entry, "service"), "test-service");
    assert.equal(Reflect.get(entry, "category"), "validator.must");
    assert.equal(Reflect.get(entry, "kind"), "series");
    assert.equal(Reflect.get(entry, "msg"), "series failed validation");
  });

  it("stays quiet at the silent level", () => {
    const lines: string[] = [];
    const logger = createRootLogger({ logLevel: "silent", serviceName: "test-service" }, { write: (msg: string) => void lines.push(msg) });
    logger.fatal("nope");
    assert.equal(lines.length, 0);
  });
});
