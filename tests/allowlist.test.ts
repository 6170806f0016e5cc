import { describe, it, expect, vi } from "vitest";
import {
  AllowlistGate,
  extractDestination,
  matchesWildcard,
  normalizeHost,
  parsePattern,
} from "../src/network/allowlist.js";
import { ConfigInvalidError, HostNotAllowedError } from "../src/errors.js";
import { RetryingTransport } from "../src/transport/http-transport.js";
import { fakeResponse, scriptedFetch, testProfile } from "./helpers.js";

const enforced = (...allowedHosts: string[]) => ({ enforced: true, allowedHosts });

describe("AllowlistGate", () => {
  describe("helpers", () => {
    it("should normalize case, brackets and trailing dots", () => {
      expect(normalizeHost("API.Example.COM.")).toBe("api.example.com");
      expect(normalizeHost("[::1]")).toBe("::1");
    });

    it("should default ports by scheme", () => {
      expect(extractDestination("https://api.test/v1")).toEqual({ host: "api.test", port: 443 });
      expect(extractDestination("http://localhost:11434/v1")).toEqual({ host: "localhost", port: 11434 });
      expect(extractDestination("http://[::1]/v1")).toEqual({ host: "::1", port: 80 });
    });

    it("should reject non-http URLs", () => {
      expect(() => extractDestination("ftp://files.test")).toThrow(ConfigInvalidError);
      expect(() => extractDestination("not a url")).toThrow(ConfigInvalidError);
    });

    it("should match exactly one label for wildcards", () => {
      expect(matchesWildcard("api.groq.com", "groq.com")).toBe(true);
      expect(matchesWildcard("groq.com", "groq.com")).toBe(false);
      expect(matchesWildcard("a.b.groq.com", "groq.com")).toBe(false);
      expect(matchesWildcard("evilgroq.com", "groq.com")).toBe(false);
    });

    it("should reject malformed CIDR ranges", () => {
      expect(() => parsePattern("10.0.0.0/33")).toThrow(ConfigInvalidError);
      expect(() => parsePattern("example.com/8")).toThrow(ConfigInvalidError);
    });

    it("should parse host:port and bracketed IPv6 patterns", () => {
      expect(parsePattern("localhost:11434")).toMatchObject({ kind: "exact", host: "localhost", port: 11434 });
      expect(parsePattern("[::1]:8080")).toMatchObject({ kind: "exact", host: "::1", port: 8080 });
      expect(parsePattern("  ")).toBeNull();
    });
  });

  it("should allow everything when not enforced", async () => {
    const gate = new AllowlistGate({ enforced: false, allowedHosts: [] });
    const decision = await gate.check("https://anywhere.test/v1");
    expect(decision).toMatchObject({ allowed: true, matchedBy: "disabled" });
  });

  it("should reject everything when enforced with an empty list", async () => {
    const gate = new AllowlistGate(enforced());
    const decision = await gate.check("http://localhost:11434/v1");
    expect(decision).toMatchObject({ allowed: false, reason: "allowlist is empty" });
  });

  it("should match exact hosts, respecting a pattern port", async () => {
    const gate = new AllowlistGate(enforced("api.openai.com", "localhost:11434"));
    expect(await gate.check("https://API.openai.com/v1")).toMatchObject({ allowed: true, matchedBy: "exact" });
    expect(await gate.check("http://localhost:11434/v1")).toMatchObject({ allowed: true, matchedBy: "exact" });
    expect((await gate.check("http://localhost:8080/v1")).allowed).toBe(false);
  });

  it("should apply wildcard patterns to a single label only", async () => {
    const gate = new AllowlistGate(enforced("*.groq.com"));
    expect(await gate.check("https://api.groq.com/openai/v1")).toMatchObject({
      allowed: true,
      matchedBy: "wildcard",
      pattern: "*.groq.com",
    });
    expect((await gate.check("https://groq.com/v1")).allowed).toBe(false);
    expect((await gate.check("https://a.b.groq.com/v1")).allowed).toBe(false);
  });

  it("should check IP literals against CIDR ranges without resolving", async () => {
    const resolver = vi.fn(async () => ["10.0.0.1"]);
    const gate = new AllowlistGate(enforced("192.168.1.0/24", "fd00::/8"), { resolver });
    expect(await gate.check("http://192.168.1.42:8000/v1")).toMatchObject({ allowed: true, matchedBy: "cidr" });
    expect((await gate.check("http://192.168.2.1/v1")).allowed).toBe(false);
    expect(await gate.check("http://[fd00::5]/v1")).toMatchObject({ allowed: true, matchedBy: "cidr" });
    expect(resolver).not.toHaveBeenCalled();
  });

  it("should require every resolved address to fall inside an allowed range", async () => {
    const gate = new AllowlistGate(enforced("10.0.0.0/8"), {
      resolver: async (host) => (host === "inside.test" ? ["10.1.2.3", "10.9.9.9"] : ["10.1.2.3", "8.8.8.8"]),
    });
    expect(await gate.check("http://inside.test/v1")).toMatchObject({ allowed: true, pattern: "10.0.0.0/8" });
    const mixed = await gate.check("http://mixed.test/v1");
    expect(mixed).toMatchObject({ allowed: false, reason: "resolved address 8.8.8.8 outside allowed ranges" });
  });

  it("should reject when resolution fails", async () => {
    const gate = new AllowlistGate(enforced("10.0.0.0/8"), {
      resolver: async () => {
        throw new Error("getaddrinfo ENOTFOUND");
      },
    });
    const decision = await gate.check("http://missing.test/v1");
    expect(decision).toMatchObject({ allowed: false, reason: "could not resolve host: getaddrinfo ENOTFOUND" });
  });

  it("should throw HostNotAllowedError from assertAllowed", async () => {
    const gate = new AllowlistGate(enforced("api.openai.com"));
    const error = await gate.assertAllowed("https://evil.test/v1").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(HostNotAllowedError);
    expect(error).toMatchObject({ kind: "HostNotAllowed", host: "evil.test", category: "security" });
  });

  it("should make zero network calls for a rejected host", async () => {
    const fetchImpl = scriptedFetch(() => fakeResponse(200, { body: "{}" }));
    const transport = new RetryingTransport({
      profile: testProfile({ endpoint: "https://evil.test/v1" }),
      gate: new AllowlistGate(enforced("api.openai.com")),
      fetch: fetchImpl,
    });

    const payload = { model: "m", messages: [{ role: "user" as const, content: "hi" }], options: {}, stream: true };
    await expect(transport.send(payload)).rejects.toBeInstanceOf(HostNotAllowedError);
    expect(fetchImpl.calls).toHaveLength(0);
  });
});
