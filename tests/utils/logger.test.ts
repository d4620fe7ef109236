import { describe, it, expect, vi } from "vitest";
import { formatLogLine, formatTimestamp, RunLogger } from "@/lib/utils/logger";

const at = new Date(Date.UTC(2025, 2, 1, 7, 5, 3));

function fakeConsole() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("formatLogLine", () => {
  it("pads the level and prefixes the scope", () => {
    expect(formatTimestamp(at)).toBe("2025-03-01 07:05:03");
    expect(formatLogLine({ at, level: "INFO", scope: "Drive", message: "Listing" })).toBe(
      "2025-03-01 07:05:03 INFO    [Drive] Listing"
    );
  });
});

describe("RunLogger", () => {
  it("keeps every line for the run log and mirrors it to the console", () => {
    const out = fakeConsole();
    const logger = new RunLogger({ now: () => at, console: out });

    logger.scope("Drive").info("Found 2 files");
    logger.scope("OCR").warn("Slow response", { ms: 1200 });
    logger.scope("AI").error("Request failed", new Error("boom"));

    expect(logger.render()).toBe(
      "2025-03-01 07:05:03 INFO    [Drive] Found 2 files\n" +
        '2025-03-01 07:05:03 WARNING [OCR] Slow response {"ms":1200}\n' +
        "2025-03-01 07:05:03 ERROR   [AI] Request failed boom\n"
    );
    expect(out.log).toHaveBeenCalledWith("[Drive] Found 2 files");
    expect(out.warn).toHaveBeenCalledWith("[OCR] Slow response", { ms: 1200 });
    expect(out.error).toHaveBeenCalledTimes(1);
  });

  it("drops debug lines unless debug is on", () => {
    const quiet = new RunLogger({ now: () => at, console: fakeConsole() });
    const verbose = new RunLogger({ now: () => at, console: fakeConsole(), debug: true });

    quiet.scope("X").debug("hidden");
    verbose.scope("X").debug("shown");

    expect(quiet.size).toBe(0);
    expect(quiet.render()).toBe("");
    expect(verbose.render()).toBe("2025-03-01 07:05:03 DEBUG   [X] shown\n");
  });
});
