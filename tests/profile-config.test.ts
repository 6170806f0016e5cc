import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  defaultConfig,
  listProfiles,
  loadConfig,
  parseBooleanFlag,
  parseConfig,
  resolveSettings,
  splitHostList,
  writeDefaultConfig,
} from "../src/profile-config.js";
import { DEFAULT_RETRY_POLICY } from "../src/transport/backoff.js";
import { ConfigInvalidError } from "../src/errors.js";

describe("resolveSettings", () => {
  it("should fall back to built-in defaults", () => {
    const settings = resolveSettings({ global: null, local: null });

    expect(settings).toEqual({
      profileName: "default",
      profile: {
        endpoint: "http://localhost:11434/v1",
        apiKey: undefined,
        model: "llama3.1",
        temperature: undefined,
        maxTokens: undefined,
        stream: true,
        timeoutMs: 60000,
        systemPrompt: undefined,
        includeUsage: false,
      },
      allowlist: { enforced: false, allowedHosts: ["localhost", "127.0.0.1", "[::1]"] },
      retry: DEFAULT_RETRY_POLICY,
      redact: { enabled: true, terms: {} },
      interceptorPath: undefined,
    });
  });

  it("should apply CLI over environment over file values", () => {
    const global = parseConfig(
      { profiles: { default: { endpoint: "https://global.test/v1", model: "g", temperature: 0.1, maxTokens: 100 } } },
      "global"
    );

    const settings = resolveSettings({
      global,
      local: null,
      env: { CLIAI_MODEL: "e", CLIAI_TEMPERATURE: "0.7" },
      cli: { model: "c" },
    });

    expect(settings.profile).toMatchObject({
      endpoint: "https://global.test/v1",
      model: "c",
      temperature: 0.7,
      maxTokens: 100,
    });
  });

  it("should prefer a local profile over a global one of the same name", () => {
    const global = parseConfig({ profiles: { default: { model: "global-model" } } }, "global");
    const local = parseConfig({ profiles: { default: { model: "local-model" } } }, "local");

    expect(resolveSettings({ global, local }).profile.model).toBe("local-model");
  });

  it("should select a profile from the environment", () => {
    const global = parseConfig(
      { defaultProfile: "default", profiles: { default: { model: "a" }, work: { model: "b" } } },
      "global"
    );

    const settings = resolveSettings({ global, local: null, env: { CLIAI_PROFILE: "work" } });

    expect(settings.profileName).toBe("work");
    expect(settings.profile.model).toBe("b");
  });

  it("should reject an unknown requested profile", () => {
    expect(() => resolveSettings({ global: null, local: null, cli: { profile: "work" } })).toThrow(
      "Profile 'work' not found. Run 'cliai config' to list profiles."
    );
  });

  it("should reject unparseable environment values", () => {
    expect(() => resolveSettings({ global: null, local: null, env: { CLIAI_TEMPERATURE: "warm" } })).toThrow(
      "CLIAI_TEMPERATURE must be a number, got 'warm'"
    );
    expect(() => resolveSettings({ global: null, local: null, env: { CLIAI_STREAM: "maybe" } })).toThrow(
      "CLIAI_STREAM must be true or false, got 'maybe'"
    );
  });

  it("should validate the resolved profile", () => {
    expect(() => resolveSettings({ global: null, local: null, cli: { temperature: 3 } })).toThrow(ConfigInvalidError);
    expect(() => resolveSettings({ global: null, local: null, cli: { endpoint: "ftp://files.test" } })).toThrow(
      "Unsupported protocol 'ftp:' in endpoint ftp://files.test"
    );
    expect(() => resolveSettings({ global: null, local: null, cli: { timeoutMs: 0 } })).toThrow(
      "Timeout must be a positive number of milliseconds, got 0"
    );
  });

  it("should merge allowed hosts from every layer", () => {
    const global = parseConfig({ security: { allowedHosts: ["api.test"] } }, "global");

    const settings = resolveSettings({
      global,
      local: null,
      env: { CLIAI_ALLOWED_HOSTS: "a.test, b.test", CLIAI_ENFORCE_ALLOWLIST: "yes" },
      cli: { allowHosts: ["api.test", "c.test"] },
    });

    expect(settings.allowlist).toEqual({ enforced: true, allowedHosts: ["api.test", "a.test", "b.test", "c.test"] });
  });

  it("should merge retry settings and honour CLIAI_MAX_RETRIES", () => {
    const global = parseConfig({ retry: { maxAttempts: 5 } }, "global");
    const local = parseConfig({ retry: { jitter: 0 } }, "local");

    expect(resolveSettings({ global, local }).retry).toEqual({ ...DEFAULT_RETRY_POLICY, maxAttempts: 5, jitter: 0 });
    expect(resolveSettings({ global, local, env: { CLIAI_MAX_RETRIES: "0" } }).retry.maxAttempts).toBe(1);
  });

  it("should merge redaction terms and let the CLI toggle redaction", () => {
    const global = parseConfig({ redact: { enabled: false, terms: { Falcon: "[PROJECT]" } } }, "global");
    const local = parseConfig({ redact: { terms: { "db-01": "[HOST]" } } }, "local");

    expect(resolveSettings({ global, local }).redact).toEqual({
      enabled: false,
      terms: { Falcon: "[PROJECT]", "db-01": "[HOST]" },
    });
    expect(resolveSettings({ global, local, cli: { redact: true } }).redact.enabled).toBe(true);
  });
});

describe("parseConfig", () => {
  it("should reject values of the wrong type", () => {
    expect(() => parseConfig({ profiles: { default: { temperature: "hot" } } }, "cfg")).toThrow(
      "cfg: profiles.default.temperature must be a number"
    );
    expect(() => parseConfig([], "cfg")).toThrow("cfg: configuration must be a JSON object");
    expect(() => parseConfig({ security: { allowedHosts: [1] } }, "cfg")).toThrow(
      "cfg: security.allowedHosts must be an array of strings"
    );
  });

  it("should keep the interceptor path", () => {
    expect(parseConfig({ interceptor: "./mask.mjs" }, "cfg").interceptor).toBe("./mask.mjs");
  });
});

describe("listProfiles", () => {
  it("should list local profiles first and mark shadowed globals", () => {
    const global = parseConfig({ profiles: { default: {}, work: {} } }, "global");
    const local = parseConfig({ defaultProfile: "work", profiles: { work: {} } }, "local");

    const profiles = listProfiles(global, local);

    expect(profiles.map((p) => [p.scope, p.name, p.isDefault, p.shadowed === true])).toEqual([
      ["local", "work", true, false],
      ["global", "default", false, false],
      ["global", "work", false, true],
    ]);
  });
});

describe("flag helpers", () => {
  it("should parse boolean words", () => {
    expect(parseBooleanFlag("On", "X")).toBe(true);
    expect(parseBooleanFlag("0", "X")).toBe(false);
    expect(() => parseBooleanFlag("sure", "X")).toThrow("X must be true or false, got 'sure'");
  });

  it("should split comma-separated host lists", () => {
    expect(splitHostList(" a.test ,,b.test ")).toEqual(["a.test", "b.test"]);
    expect(splitHostList(undefined)).toEqual([]);
  });
});

describe("config files", () => {
  let dir: string;

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should write the default config once", () => {
    dir = mkdtempSync(join(tmpdir(), "config-test-"));
    const path = join(dir, "nested", "config.json");

    expect(writeDefaultConfig(path)).toBe(true);
    expect(writeDefaultConfig(path)).toBe(false);
    expect(loadConfig(path)).toEqual(defaultConfig());
  });

  it("should return null for a missing file and fail on invalid JSON", () => {
    dir = mkdtempSync(join(tmpdir(), "config-test-"));
    const path = join(dir, "config.json");

    expect(loadConfig(path)).toBeNull();

    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow(/^Failed to parse /);
  });
});
