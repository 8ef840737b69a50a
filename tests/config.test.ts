import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterAll, describe, expect, it } from "vitest";
import { ConfigError } from "../src/common/errors";
import { loadConfig, parseConfig, resolveConfigPath } from "../src/config";

const dir = mkdtempSync(join(tmpdir(), "sensorvault-config-"));

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(parseConfig({})).toEqual({
      storage: { path: "./data/readings.duckdb", threads: "4" },
      query: { autoPointBudget: 500, gapThresholdMinutes: 60 },
    });
  });

  it("applies mqtt defaults", () => {
    const config = parseConfig({ mqtt: { url: "mqtt://localhost:1883", password: "test-secret" } });
    expect(config.mqtt).toEqual({
      url: "mqtt://localhost:1883",
      topic: "ruuvi/#",
      password: "test-secret",
      keepaliveSec: 30,
    });
  });

  it("lists every invalid path", () => {
    expect(() =>
      parseConfig({ mqtt: { url: "nowhere" }, query: { autoPointBudget: -1 } })
    ).toThrow(/mqtt\.url: .*; query\.autoPointBudget: /);
  });
});

describe("loadConfig", () => {
  it("reads a JSON file", () => {
    const path = join(dir, "ok.json");
    writeFileSync(path, JSON.stringify({ storage: { path: ":memory:" } }));
    expect(loadConfig(path).storage.path).toBe(":memory:");
  });

  it("rejects malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ storage");
    expect(() => loadConfig(path)).toThrow(ConfigError);
  });

  it("rejects a missing file", () => {
    expect(() => loadConfig(join(dir, "absent.json"))).toThrow(/Cannot read configuration/);
  });
});

describe("resolveConfigPath", () => {
  it("prefers CONFIG_PATH over the first argument", () => {
    expect(resolveConfigPath({ CONFIG_PATH: "/etc/a.json" }, ["node", "index.js", "b.json"])).toBe(
      "/etc/a.json"
    );
    expect(resolveConfigPath({}, ["node", "index.js", "b.json"])).toBe("b.json");
    expect(resolveConfigPath({}, ["node", "index.js"])).toBeUndefined();
  });
});
