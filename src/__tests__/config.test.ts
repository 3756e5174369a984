import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  CONFIG_FILE_NAME,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_SYSTEM_PROMPT,
  loadConfig,
  resolveEnvVars,
} from "../config.js";
import { setLogLevel } from "../logger.js";

describe("loadConfig", () => {
  let workDir: string;
  let homeDir: string;

  beforeAll(() => setLogLevel("error"));
  afterAll(() => setLogLevel("info"));

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "vision-relay-cwd-"));
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), "vision-relay-home-"));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
    fs.rmSync(homeDir, { recursive: true, force: true });
  });

  function load(env: NodeJS.ProcessEnv) {
    return loadConfig({ env, cwd: workDir, homeDir });
  }

  it("applies defaults around an API key from the environment", () => {
    expect(load({ VISION_RELAY_API_KEY: "test-secret" })).toEqual({
      provider: {
        apiKey: "test-secret",
        baseUrl: DEFAULT_BASE_URL,
        model: DEFAULT_MODEL,
        temperature: 0.4,
        maxTokens: 400,
        timeoutMs: 30_000,
      },
      image: { maxPixels: 1_700_000, jpegQuality: 85 },
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      httpPort: 5000,
      host: "0.0.0.0",
      bodyLimit: "25mb",
      logLevel: "info",
    });
  });

  it("parses numeric environment values", () => {
    const config = load({
      VISION_RELAY_API_KEY: "test-secret",
      VISION_RELAY_MAX_PIXELS: "250000",
      VISION_RELAY_TEMPERATURE: "0.9",
      VISION_RELAY_HTTP_PORT: "8080",
    });

    expect(config.image.maxPixels).toBe(250_000);
    expect(config.provider.temperature).toBe(0.9);
    expect(config.httpPort).toBe(8080);
  });

  it("returns a frozen config", () => {
    const config = load({ VISION_RELAY_API_KEY: "test-secret" });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.provider)).toBe(true);
    expect(Object.isFrozen(config.image)).toBe(true);
  });

  it("fails without any configuration", () => {
    expect(() => load({})).toThrow(
      `No configuration found. Set VISION_RELAY_API_KEY or create ~/${CONFIG_FILE_NAME}`
    );
  });

  it("rejects out-of-range values", () => {
    expect(() =>
      load({ VISION_RELAY_API_KEY: "test-secret", VISION_RELAY_JPEG_QUALITY: "150" })
    ).toThrow(/^Invalid configuration: jpegQuality: /);
  });

  it("reads the project-local YAML file and resolves variable references", () => {
    fs.writeFileSync(
      path.join(workDir, CONFIG_FILE_NAME),
      ["apiKey: ${PROVIDER_TOKEN}", "model: local/vision-model", "maxTokens: 256"].join("\n")
    );

    const config = load({ PROVIDER_TOKEN: "test-secret" });

    expect(config.provider).toMatchObject({
      apiKey: "test-secret",
      model: "local/vision-model",
      maxTokens: 256,
    });
  });

  it("falls back to the YAML file in the home directory", () => {
    fs.writeFileSync(path.join(homeDir, CONFIG_FILE_NAME), "apiKey: test-secret\nhttpPort: 7000\n");

    expect(load({}).httpPort).toBe(7000);
  });

  it("lets environment variables override the YAML file", () => {
    const configPath = path.join(workDir, "custom.yaml");
    fs.writeFileSync(configPath, "apiKey: test-secret\nlogLevel: debug\nhttpPort: 7000\n");

    const config = load({ VISION_RELAY_CONFIG_PATH: configPath, VISION_RELAY_HTTP_PORT: "9000" });

    expect(config.logLevel).toBe("debug");
    expect(config.httpPort).toBe(9000);
  });

  it("fails when a referenced variable is unset", () => {
    fs.writeFileSync(path.join(workDir, CONFIG_FILE_NAME), "apiKey: ${MISSING_TOKEN}\n");

    expect(() => load({})).toThrow("Environment variable not found: MISSING_TOKEN");
  });
});

describe("resolveEnvVars", () => {
  it("substitutes references inside nested values", () => {
    expect(
      resolveEnvVars({ url: "https://${HOST}/v1", list: ["${HOST}", 3] }, { HOST: "example.test" })
    ).toEqual({ url: "https://example.test/v1", list: ["example.test", 3] });
  });
});
