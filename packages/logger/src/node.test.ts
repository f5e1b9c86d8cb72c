import { describe, expect, test, vi } from "vitest";
import { createNodeLogger, withValidationContext } from "./node";

function captureLines(): { lines: Record<string, unknown>[]; write: (msg: string) => void } {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    write: (msg: string) => {
      lines.push(JSON.parse(msg));
    },
  };
}

describe("createNodeLogger", () => {
  test("writes JSON lines with severity and service bindings", () => {
    const sink = captureLines();
    const logger = createNodeLogger({
      service: "validation-test",
      environment: "ci",
      pretty: false,
      destination: sink,
    });

    logger.info({ code: "UNSORTED_INDEX" }, "rejected");

    expect(sink.lines).toHaveLength(1);
    const line = sink.lines[0];
    expect(line?.severity).toBe("INFO");
    expect(line?.service).toBe("validation-test");
    expect(line?.environment).toBe("ci");
    expect(line?.code).toBe("UNSORTED_INDEX");
    expect(line?.msg).toBe("rejected");
    expect(typeof line?.timestamp).toBe("string");
    expect(line?.pid).toBeUndefined();
    expect(line?.hostname).toBeUndefined();
  });

  test("respects the configured level", () => {
    const sink = captureLines();
    const logger = createNodeLogger({ service: "t", level: "warn", pretty: false, destination: sink });

    logger.info("hidden");
    logger.debug("hidden");
    logger.warn("shown");

    expect(sink.lines.map((l) => l.msg)).toEqual(["shown"]);
  });

  test("refuses pretty output to a custom destination", () => {
    expect(() => createNodeLogger({ service: "t", pretty: true, destination: captureLines() })).toThrow(
      "createNodeLogger: `pretty` output cannot be sent to a custom `destination`"
    );
  });

  test("a destination keeps JSON output in development", () => {
    vi.stubEnv("NODE_ENV", "development");
    try {
      const sink = captureLines();
      createNodeLogger({ service: "t", destination: sink }).info("plain");
      expect(sink.lines.map((l) => l.msg)).toEqual(["plain"]);
    } finally {
      vi.unstubAllEnvs();
    }
  });
});

describe("withValidationContext", () => {
  test("binds validator and parameter to child lines", () => {
    const sink = captureLines();
    const logger = createNodeLogger({ service: "t", pretty: false, destination: sink });

    withValidationContext(logger, { validator: "checkFh", parameter: "fh" }).info("checked");

    expect(sink.lines[0]?.validator).toBe("checkFh");
    expect(sink.lines[0]?.parameter).toBe("fh");
    expect(sink.lines[0]?.service).toBe("t");
  });
});
