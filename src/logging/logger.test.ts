/**
 * Logger tests.
 *
 * Run: node --import tsx --test src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, test } from "node:test";

import { createLogger, createRunId, formatLogEntry, loggerOptionsFromConfig } from "./index.js";

const tmp = mkdtempSync(join(tmpdir(), "logger-test-"));
after(() => rmSync(tmp, { recursive: true, force: true }));

describe("createRunId", () => {
  test("is the UTC date plus six hex digits", () => {
    assert.match(createRunId(new Date("2025-03-04T23:59:00Z")), /^20250304-[0-9a-f]{6}$/);
  });
});

describe("formatLogEntry", () => {
  test("includes time, level, run id, scope and context", () => {
    assert.equal(
      formatLogEntry({
        time: new Date("2025-01-15T09:30:00.000Z"),
        level: "warn",
        runId: "20250115-abc123",
        scope: "enrich-notes",
        message: "Slow note",
        context: { file: "a.md" },
      }),
      '[2025-01-15T09:30:00.000Z] [WARN ] [20250115-abc123] [enrich-notes] Slow note {"file":"a.md"}'
    );
  });

  test("omits empty context and missing scope", () => {
    assert.equal(
      formatLogEntry({
        time: new Date("2025-01-15T09:30:00.000Z"),
        level: "info",
        runId: "r1",
        message: "Done",
        context: {},
      }),
      "[2025-01-15T09:30:00.000Z] [INFO ] [r1] Done"
    );
  });
});

describe("createLogger", () => {
  test("stamps the given run id on every line", (t) => {
    const info = t.mock.method(console, "info", () => {});
    const logger = createLogger({ runId: "20250101-000000" });

    logger.info("first");
    logger.info("second");

    assert.equal(logger.runId, "20250101-000000");
    assert.ok(String(info.mock.calls[0]?.arguments[0]).endsWith("[20250101-000000] first"));
    assert.ok(String(info.mock.calls[1]?.arguments[0]).endsWith("[20250101-000000] second"));
  });

  test("creates a run id when none is given", () => {
    const logger = createLogger({ console: false });
    assert.match(logger.runId, /^\d{8}-[0-9a-f]{6}$/);
  });

  test("drops messages below the configured level", (t) => {
    const info = t.mock.method(console, "info", () => {});
    const debug = t.mock.method(console, "debug", () => {});
    const logger = createLogger({ level: "info", runId: "r1" });

    logger.debug("hidden");
    logger.info("shown");

    assert.equal(debug.mock.callCount(), 0);
    assert.equal(info.mock.callCount(), 1);
    assert.ok(String(info.mock.calls[0]?.arguments[0]).endsWith("[r1] shown"));
  });

  test("appends to a log file when enabled", () => {
    const logDir = join(tmp, "logs");
    const logger = createLogger({ console: false, file: true, logDir, logFile: "run.log", scope: "test", runId: "r2" });

    logger.error("Write failed", { code: 1 });

    const content = readFileSync(join(logDir, "run.log"), "utf-8");
    assert.ok(content.endsWith(' [ERROR] [r2] [test] Write failed {"code":1}\n'));
  });

  test("options follow the application config", () => {
    assert.deepEqual(
      loggerOptionsFromConfig(
        { logLevel: "debug", logToFile: true, logDir: "logs", appName: "bookmark-enricher" },
        "preview",
        "r3"
      ),
      {
        level: "debug",
        runId: "r3",
        scope: "preview",
        file: true,
        logDir: "logs",
        logFile: "bookmark-enricher.log",
      }
    );
  });
});
