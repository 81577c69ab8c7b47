import { describe, expect, test } from "vitest";
import { parseCliArgs } from "../cli/args.js";
import { resolveExportOptions } from "../pipeline/config.js";
import { ConfigError } from "../pipeline/errors.js";

const NOW = new Date("2026-03-04T05:06:07.089Z");

describe("parseCliArgs", () => {
  test("leaves terminal events on when --quiet is absent", () => {
    const raw = parseCliArgs(["--input", "site.txt"]);

    expect(raw.agentLogs).toBeUndefined();
    expect(resolveExportOptions(raw, NOW, "/work").agentLogs).toBe(true);
  });

  test("turns terminal events off with --quiet", () => {
    const raw = parseCliArgs(["--input", "site.txt", "--quiet"]);

    expect(raw.agentLogs).toBe(false);
    expect(resolveExportOptions(raw, NOW, "/work").agentLogs).toBe(false);
  });

  test("accepts -q as the short form", () => {
    expect(parseCliArgs(["-q", "site.txt"]).agentLogs).toBe(false);
  });

  test("takes the first positional as the input path", () => {
    const raw = parseCliArgs(["lists/site.txt", "--concurrency", "3"]);

    expect(raw.inputPath).toBe("lists/site.txt");
    expect(raw.concurrency).toBe("3");
  });

  test("prefers --input over a positional", () => {
    expect(parseCliArgs(["other.txt", "--input", "site.txt"]).inputPath).toBe("site.txt");
  });

  test("rejects unknown flags as configuration errors", () => {
    expect(() => parseCliArgs(["--agent-logs"])).toThrow(ConfigError);
  });
});
