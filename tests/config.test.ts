import fs from "fs";
import path from "path";
import os from "os";
import { loadConfig } from "../src/config";
import { FakeLogger } from "./helpers/FakeLogger";

function writeTempConfig(contents: string): string {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "device-config-"));
  const configPath = path.join(tempDir, "devices.config.json");
  fs.writeFileSync(configPath, contents);
  return configPath;
}

describe("loadConfig", () => {
  test("returns empty config when file missing", () => {
    const logger = new FakeLogger();
    const { config, path: resolved } = loadConfig("/tmp/non-existent-device-config.json", logger);
    expect(config).toEqual({});
    expect(resolved).toBeUndefined();
    expect(logger.logs).toEqual([]);
  });

  test("reads thermostat settings", () => {
    const configPath = writeTempConfig(
      JSON.stringify({ thermostat: { minTemperature: 12, maxTemperature: 26, initialTemperature: 18 } })
    );

    const { config, path: resolved } = loadConfig(configPath, new FakeLogger());
    expect(resolved).toBe(configPath);
    expect(config).toEqual({
      thermostat: { minTemperature: 12, maxTemperature: 26, initialTemperature: 18 },
    });
  });

  test("drops non-numeric thermostat fields with a warning", () => {
    const logger = new FakeLogger();
    const configPath = writeTempConfig(
      JSON.stringify({ thermostat: { minTemperature: "cold", maxTemperature: 28 } })
    );

    const { config } = loadConfig(configPath, logger);
    expect(config).toEqual({ thermostat: { maxTemperature: 28 } });
    expect(logger.logs).toEqual([
      {
        level: "warn",
        message: "Ignoring thermostat.minTemperature; expected a number.",
        meta: { value: "cold" },
      },
    ]);
  });

  test("ignores a non-object thermostat section", () => {
    const logger = new FakeLogger();
    const configPath = writeTempConfig(JSON.stringify({ thermostat: [1, 2] }));

    expect(loadConfig(configPath, logger).config).toEqual({ thermostat: {} });
    expect(logger.messages("warn")).toEqual(['Invalid "thermostat" configuration; expected an object.']);
  });

  test("warns and falls back to defaults on invalid JSON", () => {
    const logger = new FakeLogger();
    const configPath = writeTempConfig("{ not json");

    const { config, path: resolved } = loadConfig(configPath, logger);
    expect(config).toEqual({});
    expect(resolved).toBeUndefined();
    expect(logger.messages("warn")).toEqual([`Failed to load config from ${configPath}`]);
  });

  test("rejects a non-object root", () => {
    const logger = new FakeLogger();
    const configPath = writeTempConfig("42");

    expect(loadConfig(configPath, logger)).toEqual({ config: {}, path: configPath });
    expect(logger.messages("warn")).toEqual(["Config root must be a JSON object; ignoring it."]);
  });
});
