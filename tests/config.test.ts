import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

const REQUIRED = {
  PERSONIO_CLIENT_ID: "client-id",
  PERSONIO_CLIENT_SECRET: "test-secret",
};

describe("loadConfig", () => {
  it("applies defaults for everything but the credentials", () => {
    expect(loadConfig(REQUIRED)).toEqual({
      personio: {
        clientId: "client-id",
        clientSecret: "test-secret",
        baseUrl: "https://api.personio.de",
      },
      export: { outputPath: "./output", includeDocuments: true },
      http: { timeoutMs: 30_000, retryMaxAttempts: 5, pageSize: 100 },
      documents: { concurrency: 4 },
      schedule: { enabled: false, cron: "0 2 * * *" },
      logLevel: "info",
    });
  });

  it("reads every setting from the environment", () => {
    const config = loadConfig({
      ...REQUIRED,
      PERSONIO_BASE_URL: "https://personio.test/",
      EXPORT_OUTPUT_PATH: "/data/exports",
      EXPORT_INCLUDE_DOCUMENTS: "no",
      HTTP_TIMEOUT_MS: "5000",
      HTTP_RETRY_MAX_ATTEMPTS: "2",
      HTTP_PAGE_SIZE: "50",
      DOCUMENT_CONCURRENCY: "8",
      SCHEDULE_ENABLED: "TRUE",
      SCHEDULE_CRON: "30 3 * * 1-5",
      LOG_LEVEL: "DEBUG",
    });

    expect(config.personio.baseUrl).toBe("https://personio.test");
    expect(config.export).toEqual({ outputPath: "/data/exports", includeDocuments: false });
    expect(config.http).toEqual({ timeoutMs: 5000, retryMaxAttempts: 2, pageSize: 50 });
    expect(config.documents.concurrency).toBe(8);
    expect(config.schedule).toEqual({ enabled: true, cron: "30 3 * * 1-5" });
    expect(config.logLevel).toBe("debug");
  });

  it("treats empty values as unset", () => {
    const config = loadConfig({ ...REQUIRED, HTTP_PAGE_SIZE: "", EXPORT_INCLUDE_DOCUMENTS: "" });

    expect(config.http.pageSize).toBe(100);
    expect(config.export.includeDocuments).toBe(true);
  });

  it("names every missing credential", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow(/PERSONIO_CLIENT_ID.*PERSONIO_CLIENT_SECRET/);
  });

  it("rejects blank credentials", () => {
    expect(() => loadConfig({ ...REQUIRED, PERSONIO_CLIENT_SECRET: "   " })).toThrow(
      /PERSONIO_CLIENT_SECRET is required/
    );
  });

  it.each([
    ["EXPORT_INCLUDE_DOCUMENTS", "maybe"],
    ["HTTP_PAGE_SIZE", "500"],
    ["HTTP_RETRY_MAX_ATTEMPTS", "0"],
    ["HTTP_TIMEOUT_MS", "soon"],
    ["DOCUMENT_CONCURRENCY", "2.5"],
    ["PERSONIO_BASE_URL", "not a url"],
    ["SCHEDULE_CRON", "every night"],
    ["LOG_LEVEL", "verbose"],
  ])("rejects an invalid %s", (key, value) => {
    expect(() => loadConfig({ ...REQUIRED, [key]: value })).toThrow(
      new RegExp(`Invalid configuration: ${key}`)
    );
  });

  it("returns a frozen object", () => {
    const config = loadConfig(REQUIRED);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.http)).toBe(true);
  });
});

describe("loadConfig with a config file", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "config-test-"));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  async function writeFile(contents: string): Promise<string> {
    const file = path.join(dir, "config.yml");
    await fs.promises.writeFile(file, contents);
    return file;
  }

  it("reads settings from the file and lets the environment override them", async () => {
    const file = await writeFile(
      [
        "export:",
        "  output_path: /from-file",
        "  include_documents: false",
        "http:",
        "  page_size: 50",
        "  timeout_ms: 9000",
        "schedule:",
        "  enabled: true",
        '  cron: "30 1 * * *"',
        "logging:",
        "  level: WARN",
      ].join("\n")
    );

    const config = loadConfig({
      ...REQUIRED,
      CONFIG_FILE: file,
      EXPORT_OUTPUT_PATH: "/from-env",
      HTTP_PAGE_SIZE: "20",
      HTTP_TIMEOUT_MS: "",
    });

    expect(config.export).toEqual({ outputPath: "/from-env", includeDocuments: false });
    expect(config.http).toEqual({ timeoutMs: 9000, retryMaxAttempts: 5, pageSize: 20 });
    expect(config.schedule).toEqual({ enabled: true, cron: "30 1 * * *" });
    expect(config.logLevel).toBe("warn");
  });

  it("treats an empty file as no settings", async () => {
    const file = await writeFile("");

    expect(loadConfig({ ...REQUIRED, CONFIG_FILE: file })).toEqual(loadConfig(REQUIRED));
  });

  it("fails when the named file does not exist", () => {
    expect(() =>
      loadConfig({ ...REQUIRED, CONFIG_FILE: path.join(dir, "missing.yml") })
    ).toThrow(/Config file .*missing\.yml not found/);
  });

  it("fails on malformed YAML", async () => {
    const file = await writeFile("export: [");

    expect(() => loadConfig({ ...REQUIRED, CONFIG_FILE: file })).toThrow(
      /Failed to parse config file/
    );
  });

  it("names the offending key when a file value has the wrong type", async () => {
    const file = await writeFile("export:\n  include_documents: maybe\n");

    expect(() => loadConfig({ ...REQUIRED, CONFIG_FILE: file })).toThrow(
      /Invalid config file .*export\.include_documents/
    );
  });

  it("validates file values like their environment counterparts", async () => {
    const file = await writeFile('schedule:\n  cron: "every night"\n');

    expect(() => loadConfig({ ...REQUIRED, CONFIG_FILE: file })).toThrow(
      /Invalid configuration: SCHEDULE_CRON is not a valid cron expression/
    );
  });
});
