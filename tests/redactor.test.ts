import { describe, it, expect } from "vitest";
import { Redactor, StreamUnredactor, createRedactionInterceptor, shannonEntropy } from "../src/chat/redactor.js";
import type { Payload } from "../src/types.js";

const KEY = "sk-testtesttesttesttesttest";

function payloadOf(...messages: Payload["messages"]): Payload {
  return { model: "test-model", messages, options: {}, stream: true };
}

describe("Redactor", () => {
  it("should mask API keys with a tagged placeholder", () => {
    const redactor = new Redactor();
    const { text, redactions } = redactor.redact(`my key is ${KEY} ok`);

    expect(text).toBe("my key is [KEY_1] ok");
    expect(redactions).toEqual([{ original: KEY, placeholder: "[KEY_1]", category: "api_key" }]);
  });

  it("should mask emails and IPv4 addresses", () => {
    const redactor = new Redactor();
    const { text } = redactor.redact("mail bob@example.com from 10.0.0.12");
    expect(text).toBe("mail [EMAIL_1] from [IP_1]");
  });

  it("should mask env-style secrets", () => {
    const redactor = new Redactor();
    expect(redactor.redact("PASSWORD=hunter2hunter2").text).toBe("[ENV_1]");
  });

  it("should apply user terms with their configured placeholder", () => {
    const redactor = new Redactor({ "Project Falcon": "[PROJECT]" });
    const { text, redactions } = redactor.redact("Status of Project Falcon?");

    expect(text).toBe("Status of [PROJECT]?");
    expect(redactions[0]).toEqual({ original: "Project Falcon", placeholder: "[PROJECT]", category: "user_term" });
  });

  it("should reuse the same placeholder for a value seen before", () => {
    const redactor = new Redactor();
    redactor.redact(`first ${KEY}`);
    const second = redactor.redact(`again ${KEY} and sk-othertesttesttesttesttest`);

    expect(second.text).toBe("again [KEY_1] and [KEY_2]");
    expect(second.redactions.map((r) => r.category)).toEqual(["cached", "api_key"]);
    expect(redactor.size).toBe(2);
  });

  it("should mask high-entropy tokens", () => {
    const redactor = new Redactor();
    expect(redactor.redact("token Zx9Qm2Lp7Vt4Rk8Wn3Yb here").text).toBe("token [SECRET_1] here");
    expect(redactor.redact("hash 0123456789abcdef0123456789abcdef").text).toBe("hash [SECRET_2]");
  });

  it("should leave ordinary identifiers and paths alone", () => {
    const redactor = new Redactor();
    const input = "see configuration_loader_module in /usr/local/lib/node_modules/thing";
    expect(redactor.redact(input)).toEqual({ text: input, redactions: [] });
  });

  it("should restore originals with unredact", () => {
    const redactor = new Redactor();
    const { text } = redactor.redact(`use ${KEY} with bob@example.com`);

    expect(redactor.unredact(text)).toBe(`use ${KEY} with bob@example.com`);
    expect(redactor.getMappingTable()).toEqual([
      { original: KEY, placeholder: "[KEY_1]" },
      { original: "bob@example.com", placeholder: "[EMAIL_1]" },
    ]);
  });

  it("should mask a manually added value from then on", () => {
    const redactor = new Redactor();

    expect(redactor.addManualRedaction("Orion")).toEqual({
      original: "Orion",
      placeholder: "[REDACTED_1]",
      category: "manual",
    });
    expect(redactor.redact("ship Orion today").text).toBe("ship [REDACTED_1] today");
    expect(redactor.unredact("[REDACTED_1] shipped")).toBe("Orion shipped");
  });

  it("should send an unredacted value in the clear", () => {
    const redactor = new Redactor();
    redactor.redact(`my key is ${KEY}`);

    expect(redactor.removeRedaction(KEY)).toBe(true);
    expect(redactor.redact(`my key is ${KEY}`)).toEqual({ text: `my key is ${KEY}`, redactions: [] });
    expect(redactor.unredact("use [KEY_1]")).toBe(`use ${KEY}`);
    expect(redactor.removeRedaction("never seen")).toBe(false);
  });

  it("should mask an unredacted value again once added back", () => {
    const redactor = new Redactor();
    redactor.redact(`my key is ${KEY}`);
    redactor.removeRedaction(KEY);

    const added = redactor.addManualRedaction(KEY);

    expect(added.placeholder).toBe("[REDACTED_1]");
    expect(redactor.redact(`my key is ${KEY}`).text).toBe("my key is [REDACTED_1]");
  });

  it("should list placeholders in the system hint", () => {
    const redactor = new Redactor();
    redactor.redact(`${KEY} bob@example.com`);
    expect(redactor.getSystemHint()).toContain("placeholder tokens such as: [EMAIL_1], [KEY_1].");
  });
});

describe("shannonEntropy", () => {
  it("should be zero for fewer than two charset characters", () => {
    expect(shannonEntropy("a", "abc")).toBe(0);
    expect(shannonEntropy("xyz", "abc")).toBe(0);
  });

  it("should be log2 of the symbol count for uniform input", () => {
    expect(shannonEntropy("abcd", "abcd")).toBe(2);
  });
});

describe("StreamUnredactor", () => {
  it("should restore a placeholder split across deltas", () => {
    const redactor = new Redactor();
    redactor.redact(KEY);
    const unredactor = new StreamUnredactor(redactor);

    expect(unredactor.push("key: [KE")).toBe("key: ");
    expect(unredactor.push("Y_1] done")).toBe(`${KEY} done`);
    expect(unredactor.flush()).toBe("");
  });

  it("should release an unclosed bracket on flush", () => {
    const unredactor = new StreamUnredactor(new Redactor());

    expect(unredactor.push("array[0")).toBe("array");
    expect(unredactor.flush()).toBe("[0");
  });
});

describe("createRedactionInterceptor", () => {
  it("should mask messages and prepend a system hint", async () => {
    const redactor = new Redactor();
    const interceptor = createRedactionInterceptor(redactor);

    const result = await interceptor.transform(payloadOf({ role: "user", content: `my key ${KEY}` }));

    expect(result.messages).toHaveLength(2);
    expect(result.messages[0].role).toBe("system");
    expect(result.messages[0].content).toBe(redactor.getSystemHint());
    expect(result.messages[1]).toEqual({ role: "user", content: "my key [KEY_1]" });
  });

  it("should append the hint to an existing system message", async () => {
    const redactor = new Redactor();
    const interceptor = createRedactionInterceptor(redactor);

    const result = await interceptor.transform(
      payloadOf({ role: "system", content: "Be brief." }, { role: "user", content: `${KEY}` })
    );

    expect(result.messages).toHaveLength(2);
    expect(result.messages[0]).toEqual({ role: "system", content: `Be brief.\n\n${redactor.getSystemHint()}` });
    expect(result.messages[1]).toEqual({ role: "user", content: "[KEY_1]" });
  });

  it("should leave clean payloads unchanged", async () => {
    const interceptor = createRedactionInterceptor(new Redactor());
    const result = await interceptor.transform(payloadOf({ role: "user", content: "hello there" }));
    expect(result.messages).toEqual([{ role: "user", content: "hello there" }]);
  });
});
