/**
 * Host allowlist gate.
 *
 * Every outbound request, and every redirect hop, passes through
 * AllowlistGate.assertAllowed() before a socket is opened.
 *
 * Pattern forms:
 *   - Exact:    "api.openai.com", "localhost:11434", "127.0.0.1", "[::1]:8080"
 *   - Wildcard: "*.groq.com" matches "api.groq.com" (one label only, never "groq.com")
 *   - CIDR:     "192.168.1.0/24", "fd00::/8"
 */

import { lookup } from "node:dns/promises";
import { BlockList, isIP } from "node:net";
import type { AllowlistPolicy } from "../types.js";
import { ConfigInvalidError, HostNotAllowedError } from "../errors.js";
import { logComponent } from "../logger.js";

export type HostResolver = (host: string) => Promise<string[]>;

export type MatchKind = "disabled" | "exact" | "wildcard" | "cidr";

export type GateDecision =
  | { allowed: true; host: string; port: number; matchedBy: MatchKind; pattern?: string }
  | { allowed: false; host: string; port: number; reason: string };

export interface Destination {
  host: string;
  port: number;
}

interface ExactPattern {
  kind: "exact";
  source: string;
  host: string;
  port?: number;
}

interface WildcardPattern {
  kind: "wildcard";
  source: string;
  /** Domain the single label must precede, without the leading dot */
  domain: string;
}

interface CidrPattern {
  kind: "cidr";
  source: string;
  blockList: BlockList;
}

type HostPattern = ExactPattern | WildcardPattern | CidrPattern;

export const defaultResolver: HostResolver = async (host) => {
  const results = await lookup(host, { all: true, verbatim: true });
  return results.map((r) => r.address);
};

/**
 * Lowercase, strip brackets around IPv6 literals and any trailing dot.
 */
export function normalizeHost(host: string): string {
  let h = host.trim().toLowerCase();
  if (h.startsWith("[") && h.endsWith("]")) h = h.slice(1, -1);
  if (h.endsWith(".")) h = h.slice(0, -1);
  return h;
}

/**
 * Resolve the host and effective port of an http(s) URL.
 */
export function extractDestination(url: string): Destination {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigInvalidError(`Invalid endpoint URL: ${url}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigInvalidError(`Unsupported protocol '${parsed.protocol}' in endpoint ${url}`);
  }
  const host = normalizeHost(parsed.hostname);
  if (!host) {
    throw new ConfigInvalidError(`Cannot extract host from URL: ${url}`);
  }
  const port = parsed.port ? Number(parsed.port) : parsed.protocol === "https:" ? 443 : 80;
  return { host, port };
}

/**
 * H matches "*.D" iff H is exactly one non-empty label followed by ".D".
 */
export function matchesWildcard(host: string, domain: string): boolean {
  const suffix = `.${domain}`;
  if (!host.endsWith(suffix)) return false;
  const label = host.slice(0, -suffix.length);
  return label.length > 0 && !label.includes(".");
}

export function parsePattern(raw: string): HostPattern | null {
  const source = raw.trim();
  if (!source) return null;
  const lower = source.toLowerCase();

  if (lower.includes("/")) {
    const [address, prefixText] = lower.split("/", 2);
    const family = isIP(address);
    const prefix = Number(prefixText);
    const maxPrefix = family === 6 ? 128 : 32;
    if (family === 0 || !/^\d+$/.test(prefixText) || prefix > maxPrefix) {
      throw new ConfigInvalidError(`Invalid CIDR range in allowed hosts: '${source}'`);
    }
    const blockList = new BlockList();
    blockList.addSubnet(address, prefix, family === 6 ? "ipv6" : "ipv4");
    return { kind: "cidr", source, blockList };
  }

  if (lower.startsWith("*.")) {
    const domain = normalizeHost(lower.slice(2));
    if (!domain) throw new ConfigInvalidError(`Invalid wildcard pattern in allowed hosts: '${source}'`);
    return { kind: "wildcard", source, domain };
  }

  // [v6]:port
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(lower);
  if (bracketed) {
    return {
      kind: "exact",
      source,
      host: normalizeHost(bracketed[1]),
      port: bracketed[2] ? Number(bracketed[2]) : undefined,
    };
  }

  // host:port (a bare IPv6 literal has more than one colon)
  const hostPort = /^([^:]+):(\d+)$/.exec(lower);
  if (hostPort) {
    return { kind: "exact", source, host: normalizeHost(hostPort[1]), port: Number(hostPort[2]) };
  }

  return { kind: "exact", source, host: normalizeHost(lower) };
}

function ipFamily(address: string): "ipv4" | "ipv6" | null {
  const family = isIP(address);
  if (family === 4) return "ipv4";
  if (family === 6) return "ipv6";
  return null;
}

function cidrContains(pattern: CidrPattern, address: string): boolean {
  const family = ipFamily(address);
  return family !== null && pattern.blockList.check(address, family);
}

export class AllowlistGate {
  readonly enforced: boolean;
  private readonly patterns: HostPattern[];
  private readonly resolveHost: HostResolver;

  constructor(policy: AllowlistPolicy, options: { resolver?: HostResolver } = {}) {
    this.enforced = policy.enforced;
    this.patterns = policy.allowedHosts
      .map(parsePattern)
      .filter((p): p is HostPattern => p !== null);
    this.resolveHost = options.resolver ?? defaultResolver;
  }

  /**
   * Decide whether a URL may be contacted. Never throws for a rejection;
   * malformed URLs still raise ConfigInvalid.
   */
  async check(url: string): Promise<GateDecision> {
    const { host, port } = extractDestination(url);

    if (!this.enforced) {
      return { allowed: true, host, port, matchedBy: "disabled" };
    }
    if (this.patterns.length === 0) {
      return { allowed: false, host, port, reason: "allowlist is empty" };
    }

    // 1. exact literal
    for (const p of this.patterns) {
      if (p.kind === "exact" && p.host === host && (p.port === undefined || p.port === port)) {
        return { allowed: true, host, port, matchedBy: "exact", pattern: p.source };
      }
    }

    // 2. single-label wildcard
    for (const p of this.patterns) {
      if (p.kind === "wildcard" && matchesWildcard(host, p.domain)) {
        return { allowed: true, host, port, matchedBy: "wildcard", pattern: p.source };
      }
    }

    // 3. CIDR containment
    const cidrs = this.patterns.filter((p): p is CidrPattern => p.kind === "cidr");
    if (cidrs.length === 0) {
      return { allowed: false, host, port, reason: "no pattern matched" };
    }

    if (isIP(host) !== 0) {
      const hit = cidrs.find((p) => cidrContains(p, host));
      return hit
        ? { allowed: true, host, port, matchedBy: "cidr", pattern: hit.source }
        : { allowed: false, host, port, reason: "address outside allowed ranges" };
    }

    let addresses: string[];
    try {
      addresses = await this.resolveHost(host);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { allowed: false, host, port, reason: `could not resolve host: ${reason}` };
    }
    if (addresses.length === 0) {
      return { allowed: false, host, port, reason: "host resolved to no addresses" };
    }

    // Every resolved address must be inside an allowed range
    let matched: CidrPattern | undefined;
    for (const address of addresses) {
      const hit = cidrs.find((p) => cidrContains(p, address));
      if (!hit) {
        return { allowed: false, host, port, reason: `resolved address ${address} outside allowed ranges` };
      }
      matched ??= hit;
    }
    return { allowed: true, host, port, matchedBy: "cidr", pattern: matched?.source };
  }

  /**
   * Throw HostNotAllowed unless the URL passes the policy.
   */
  async assertAllowed(url: string): Promise<GateDecision> {
    const decision = await this.check(url);
    if (!decision.allowed) {
      logComponent("allowlist", `Rejected ${decision.host}:${decision.port} (${decision.reason})`);
      throw new HostNotAllowedError(decision.host, url, decision.reason);
    }
    logComponent("allowlist", `Allowed ${decision.host}:${decision.port} via ${decision.matchedBy}`);
    return decision;
  }
}
