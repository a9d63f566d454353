import { describe, it, expect } from "vitest";
import { AuditError, ConfigError, NoSuccessfulPagesError, errorMessage } from "../server/audit/errors";
import { createLogger, silentLogger } from "../server/audit/logger";

describe("createLogger", () => {
  it("prefixes lines with the scope and level", () => {
    const lines: string[] = [];
    const logger = createLogger("saa", { sink: (line) => lines.push(line) });

    logger.info("hello");
    logger.warn("careful");
    logger.error("broken");
    logger.debug("hidden");

    expect(lines).toEqual(["[saa] hello", "[saa] warning: careful", "[saa] error: broken"]);
  });

  it("prints debug lines when verbose and nests child scopes", () => {
    const lines: string[] = [];
    const logger = createLogger("saa", { verbose: true, sink: (line) => lines.push(line) });

    logger.child("crawler").debug("state idle -> running");

    expect(lines).toEqual(["[saa:crawler] state idle -> running"]);
  });

  it("has a silent variant", () => {
    expect(silentLogger.child("x")).toBe(silentLogger);
  });
});

describe("errors", () => {
  it("carry a code and their class name", () => {
    const error = new NoSuccessfulPagesError(3);
    expect(error).toBeInstanceOf(AuditError);
    expect(error.name).toBe("NoSuccessfulPagesError");
    expect(error.code).toBe("NO_SUCCESSFUL_PAGES");
    expect(error.message).toBe("Failed to fetch any pages.");
    expect(error.attempted).toBe(3);
  });

  it("joins config issues into the message", () => {
    expect(new ConfigError("Invalid configuration", ["pacing: bad", "mode: bad"]).message).toBe(
      "Invalid configuration: pacing: bad; mode: bad"
    );
    expect(new ConfigError("Missing setting").message).toBe("Missing setting");
  });

  it("describes unknown thrown values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
