/**
 * Reversible redaction of sensitive values (keys, tokens, IPs, emails, ...).
 *
 * The same value always maps to the same placeholder for the life of the
 * Redactor, so masked history stays consistent across turns and retries.
 */

import type { Message, Payload } from "../types.js";
import type { PayloadInterceptor } from "./interceptor.js";
import { log } from "../logger.js";

export interface Redaction {
  original: string;
  placeholder: string;
  category: string;
}

interface PatternRule {
  category: string;
  tag: string;
  pattern: RegExp;
}

// Most specific first; earlier rules claim a value before later ones see it.
const PATTERNS: PatternRule[] = [
  {
    category: "private_key",
    tag: "PRIVKEY",
    pattern:
      /-----BEGIN (?:RSA |EC |DSA |OPENSSH |PGP )?PRIVATE KEY-----[\s\S]*?-----END (?:RSA |EC |DSA |OPENSSH |PGP )?PRIVATE KEY-----/g,
  },
  { category: "jwt", tag: "JWT", pattern: /\beyJ[A-Za-z0-9_-]{10,}\.eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\b/g },
  { category: "bearer_token", tag: "BEARER", pattern: /Bearer\s+[A-Za-z0-9._-]{20,}/g },
  {
    category: "connection_string",
    tag: "CONN",
    pattern: /(?:jdbc:|mongodb(?:\+srv)?:\/\/|postgres(?:ql)?:\/\/|mysql:\/\/|redis:\/\/|amqp:\/\/)[^\s"'`]+/g,
  },
  { category: "github_token", tag: "GHTOKEN", pattern: /\b(?:ghp|gho|ghu|ghs|ghr)_[A-Za-z0-9]{36,}\b/g },
  { category: "slack_token", tag: "SLACK", pattern: /xox[abposr]-(?:\d+-)+[a-z0-9]+/g },
  { category: "aws_key", tag: "KEY", pattern: /\bAKIA[A-Z0-9]{16}\b/g },
  { category: "api_key", tag: "KEY", pattern: /(?:sk-[A-Za-z0-9_-]{20,}|gsk_[A-Za-z0-9]{20,}|token_[A-Za-z0-9]{16,})/g },
  {
    category: "env_secret",
    tag: "ENV",
    pattern: /\b(?:PASSWORD|SECRET|TOKEN|API_KEY|PRIVATE_KEY|AUTH|CREDENTIALS|DB_PASS|DATABASE_URL)=[^\s"'`]+/g,
  },
  {
    category: "uuid",
    tag: "UUID",
    pattern: /\b[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}\b/g,
  },
  { category: "email", tag: "EMAIL", pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g },
  { category: "url", tag: "URL", pattern: /https?:\/\/[^\s"'`<>\])]+/g },
  {
    category: "ipv4",
    tag: "IP",
    pattern: /\b(?:(?:25[0-5]|2[0-4]\d|1?\d\d?)\.){3}(?:25[0-5]|2[0-4]\d|1?\d\d?)\b/g,
  },
];

const HEX_CHARS = "0123456789abcdefABCDEF";
const BASE64_CHARS = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/=-_";
// Hex tops out at log2(16) bits per char, so its threshold only applies to pure-hex tokens
const HEX_THRESHOLD = 3.0;
const BASE64_THRESHOLD = 4.0;
const MIN_ENTROPY_TOKEN_LEN = 16;

/**
 * Shannon entropy of `data` restricted to the characters in `charset`.
 */
export function shannonEntropy(data: string, charset: string): number {
  const filtered = [...data].filter((c) => charset.includes(c));
  if (filtered.length < 2) return 0;
  const freq = new Map<string, number>();
  for (const c of filtered) freq.set(c, (freq.get(c) ?? 0) + 1);
  let entropy = 0;
  for (const count of freq.values()) {
    const p = count / filtered.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

export class Redactor {
  private readonly userTerms: Record<string, string>;
  private readonly mapping = new Map<string, string>();
  private readonly reverse = new Map<string, string>();
  private readonly counters = new Map<string, number>();
  // Values the user chose to send in the clear
  private readonly exempt = new Set<string>();

  constructor(userTerms: Record<string, string> = {}) {
    this.userTerms = userTerms;
  }

  /**
   * Mask every sensitive value in `text`.
   * Returns the masked text and the unique redactions applied.
   */
  redact(text: string): { text: string; redactions: Redaction[] } {
    const found = new Map<string, Redaction>();
    const add = (r: Redaction) => {
      if (!found.has(r.original)) found.set(r.original, r);
    };

    for (const [original, placeholder] of this.mapping) {
      if (text.includes(original)) add({ original, placeholder, category: "cached" });
    }

    for (const [term, placeholder] of Object.entries(this.userTerms)) {
      if (!term || this.exempt.has(term) || !text.includes(term)) continue;
      if (!this.mapping.has(term)) {
        this.mapping.set(term, placeholder);
        this.reverse.set(placeholder, term);
      }
      add({ original: term, placeholder: this.mapping.get(term) ?? placeholder, category: "user_term" });
    }

    for (const rule of PATTERNS) {
      for (const match of text.matchAll(rule.pattern)) {
        const value = match[0];
        if (this.exempt.has(value) || found.has(value) || this.isInsideFound(value, found)) continue;
        add({ original: value, placeholder: this.placeholderFor(value, rule.tag), category: rule.category });
      }
    }

    for (const token of text.match(/[^\s"':;,{}[\]()]+/g) ?? []) {
      if (token.length < MIN_ENTROPY_TOKEN_LEN || this.exempt.has(token)) continue;
      if (found.has(token) || this.isInsideFound(token, found)) continue;
      if (/^[A-Za-z]+$/.test(token)) continue;
      if (/^(?:https?:\/\/|\/|\.\/|\.\.\/)/.test(token)) continue;
      if (
        (/^[0-9a-fA-F]+$/.test(token) && shannonEntropy(token, HEX_CHARS) >= HEX_THRESHOLD) ||
        shannonEntropy(token, BASE64_CHARS) >= BASE64_THRESHOLD
      ) {
        add({ original: token, placeholder: this.placeholderFor(token, "SECRET"), category: "high_entropy" });
      }
    }

    // Longest first so a value never gets partially replaced by a shorter one
    let masked = text;
    const ordered = [...found.values()].sort((a, b) => b.original.length - a.original.length);
    for (const r of ordered) {
      masked = masked.split(r.original).join(r.placeholder);
    }

    return { text: masked, redactions: [...found.values()] };
  }

  /**
   * Replace placeholders with their original values (for display only).
   */
  unredact(text: string): string {
    let result = text;
    const ordered = [...this.reverse.entries()].sort((a, b) => b[0].length - a[0].length);
    for (const [placeholder, original] of ordered) {
      result = result.split(placeholder).join(original);
    }
    return result;
  }

  /**
   * Mask a value the automatic rules missed. Later calls to redact() treat it
   * like any other known value.
   */
  addManualRedaction(original: string): Redaction {
    this.exempt.delete(original);
    return { original, placeholder: this.placeholderFor(original, "REDACTED"), category: "manual" };
  }

  /**
   * Stop masking `original`. Its old placeholder still unredacts, so earlier
   * replies keep rendering. Returns false when it was not masked.
   */
  removeRedaction(original: string): boolean {
    this.exempt.add(original);
    return this.mapping.delete(original);
  }

  getMappingTable(): Array<{ original: string; placeholder: string }> {
    return [...this.mapping.entries()].map(([original, placeholder]) => ({ original, placeholder }));
  }

  get size(): number {
    return this.mapping.size;
  }

  /**
   * System hint asking the model to keep placeholder tokens verbatim.
   */
  getSystemHint(): string {
    const tokens = [...new Set(this.mapping.values())].sort().join(", ");
    return (
      `The user's message contains redacted placeholder tokens such as: ${tokens}. ` +
      "These tokens represent sensitive data that has been masked. " +
      "When referring to these values in your response, use the EXACT placeholder tokens as given. " +
      "Do NOT try to guess or reconstruct the original values."
    );
  }

  private isInsideFound(value: string, found: Map<string, Redaction>): boolean {
    for (const original of found.keys()) {
      if (original.length > value.length && original.includes(value)) return true;
    }
    return false;
  }

  private placeholderFor(value: string, tag: string): string {
    const existing = this.mapping.get(value);
    if (existing) return existing;

    const count = (this.counters.get(tag) ?? 0) + 1;
    this.counters.set(tag, count);
    const placeholder = `[${tag}_${count}]`;
    this.mapping.set(value, placeholder);
    this.reverse.set(placeholder, value);
    return placeholder;
  }
}

// Longest placeholder tail held back while waiting for its closing bracket
const MAX_PENDING_PLACEHOLDER = 32;

/**
 * Unredact streamed text where a placeholder may be split across deltas:
 * an unclosed "[..." tail is held until the next push() or flush().
 */
export class StreamUnredactor {
  private pending = "";

  constructor(private readonly redactor: Redactor) {}

  push(delta: string): string {
    const text = this.pending + delta;
    const open = text.lastIndexOf("[");
    if (open !== -1 && !text.includes("]", open) && text.length - open <= MAX_PENDING_PLACEHOLDER) {
      this.pending = text.slice(open);
      return this.redactor.unredact(text.slice(0, open));
    }
    this.pending = "";
    return this.redactor.unredact(text);
  }

  flush(): string {
    const rest = this.pending;
    this.pending = "";
    return this.redactor.unredact(rest);
  }
}

/**
 * Interceptor that masks every message before it leaves the process.
 * When anything was masked, the system message gains a hint about placeholders.
 */
export function createRedactionInterceptor(redactor: Redactor): PayloadInterceptor {
  return {
    name: "redaction",
    transform(payload: Payload): Payload {
      let total = 0;
      const messages: Message[] = payload.messages.map((m) => {
        const { text, redactions } = redactor.redact(m.content);
        total += redactions.length;
        return { role: m.role, content: text };
      });

      if (total > 0) {
        log(`[Redactor] Masked ${total} value(s) across ${messages.length} message(s)`);
        const hint = redactor.getSystemHint();
        const first = messages[0];
        if (first && first.role === "system") {
          messages[0] = { role: "system", content: `${first.content}\n\n${hint}` };
        } else {
          messages.unshift({ role: "system", content: hint });
        }
      }

      return { ...payload, messages };
    },
  };
}
