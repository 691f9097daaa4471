import { describe, test, expect } from "vitest";
import { createChildLogger, createLogger } from "./logger.ts";

function memoryLogger(level = "info") {
  const lines: string[] = [];
  const logger = createLogger({ level, destination: { write: (msg: string) => void lines.push(msg) } });
  const records = () => lines.map((line) => JSON.parse(line) as Record<string, unknown>);
  return { logger, records };
}

describe("createLogger", () => {
  test("writes JSON lines tagged with the service name", () => {
    const { logger, records } = memoryLogger();
    logger.info({ candidateCount: 3 }, "Checked candidates");

    expect(records()).toHaveLength(1);
    expect(records()[0]).toMatchObject({
      level: 30,
      service: "issue-duplicate-finder",
      candidateCount: 3,
      msg: "Checked candidates",
    });
  });

  test("redacts credentials", () => {
    const { logger, records } = memoryLogger();
    logger.info(
      {
        apiKey: "test-secret",
        config: { githubToken: "test-token" },
        headers: { authorization: "Bearer test-token" },
      },
      "Configured",
    );

    const [record] = records();
    expect(record?.apiKey).toBe("[Redacted]");
    expect(record?.config).toEqual({ githubToken: "[Redacted]" });
    expect(record?.headers).toEqual({ authorization: "[Redacted]" });
  });

  test("respects the level", () => {
    const { logger, records } = memoryLogger("warn");
    logger.info("dropped");
    logger.warn("kept");
    expect(records().map((r) => r.msg)).toEqual(["kept"]);
  });
});

describe("createChildLogger", () => {
  test("binds request context to every line", () => {
    const { logger, records } = memoryLogger();
    const child = createChildLogger(logger, { requestId: "req-1", route: "duplicates" });
    child.info("first");
    child.info("second");

    expect(records().map((r) => [r.requestId, r.route, r.msg])).toEqual([
      ["req-1", "duplicates", "first"],
      ["req-1", "duplicates", "second"],
    ]);
  });
});
