import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { loadConfig, parseConfig, resolveConfigPath } from "../../src/config";
import { ConfigError } from "../../src/errors";

describe("parseConfig", () => {
  it("should fill in defaults for an empty document", () => {
    expect(parseConfig({}, {})).toEqual({
      server: { host: "0.0.0.0", port: 8080, ssl: { enabled: false, enforce: false } },
      data: { driver: "memory" },
      log: { level: "info", pretty: false },
      metrics: { collectDefaults: true },
      docs: {},
    });
  });

  it("should accept a documentation contact", () => {
    const config = parseConfig({ docs: { contact: { name: "Payments desk", email: "payments@example.com" } } }, {});

    expect(config.docs.contact).toEqual({ name: "Payments desk", email: "payments@example.com" });
  });

  it("should reject a malformed contact email", () => {
    expect(() => parseConfig({ docs: { contact: { email: "nobody" } } }, {})).toThrow(
      "Invalid configuration: docs.contact.email: Invalid email"
    );
  });

  it("should apply postgres defaults", () => {
    const config = parseConfig({ data: { driver: "postgres", databaseUrl: "postgres://localhost/qr" } }, {});

    expect(config.data).toEqual({
      driver: "postgres",
      databaseUrl: "postgres://localhost/qr",
      poolMax: 10,
      migrate: true,
    });
  });

  it("should let the environment override the log level and database url", () => {
    const config = parseConfig(
      { data: { driver: "postgres", databaseUrl: "postgres://localhost/qr" } },
      { LOG_LEVEL: "debug", DATABASE_URL: "postgres://db.internal/qr" }
    );

    expect(config.log.level).toBe("debug");
    expect(config.data).toEqual(expect.objectContaining({ databaseUrl: "postgres://db.internal/qr" }));
  });

  it("should reject an unknown LOG_LEVEL", () => {
    expect(() => parseConfig({}, { LOG_LEVEL: "loud" })).toThrow('Invalid LOG_LEVEL "loud"');
  });

  it("should report every invalid field", () => {
    expect(() => parseConfig({ server: { port: 70000 } }, {})).toThrow(
      "Invalid configuration: server.port: Number must be less than or equal to 65535"
    );
  });

  it("should require a database url for postgres", () => {
    expect(() => parseConfig({ data: { driver: "postgres" } }, {})).toThrow(
      "Invalid configuration: data.databaseUrl: Required"
    );
  });

  it("should require key and certificate files when ssl is enabled", () => {
    expect(() => parseConfig({ server: { ssl: { enabled: true } } }, {})).toThrow(
      "Invalid configuration: server.ssl: keyFile and certFile are required when ssl is enabled"
    );
  });

  it("should freeze the result", () => {
    const config = parseConfig({}, {});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.server.ssl)).toBe(true);
  });

  it("should raise ConfigError", () => {
    expect(() => parseConfig({ log: { level: 3 } }, {})).toThrow(ConfigError);
  });
});

describe("resolveConfigPath", () => {
  it("should prefer the first positional argument", () => {
    expect(resolveConfigPath(["--console", "custom.json"], { CONFIG_PATH: "env.json" })).toBe("custom.json");
  });

  it("should fall back to CONFIG_PATH and then the default", () => {
    expect(resolveConfigPath([], { CONFIG_PATH: "env.json" })).toBe("env.json");
    expect(resolveConfigPath(["--console"], {})).toBe("./config.json");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "qr-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should read and validate a file", async () => {
    const file = path.join(dir, "config.json");
    await fs.writeFile(file, JSON.stringify({ server: { port: 9090 }, log: { pretty: true } }));

    const config = loadConfig(file, {});

    expect(config.server.port).toBe(9090);
    expect(config.log).toEqual({ level: "info", pretty: true });
  });

  it("should fail on a missing file", () => {
    const file = path.join(dir, "missing.json");

    expect(() => loadConfig(file, {})).toThrow(`Cannot read configuration file ${file}`);
  });

  it("should fail on malformed JSON", async () => {
    const file = path.join(dir, "broken.json");
    await fs.writeFile(file, "{ not json");

    expect(() => loadConfig(file, {})).toThrow(`Configuration file ${file} is not valid JSON`);
  });
});
