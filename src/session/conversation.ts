/**
 * In-memory conversation state.
 *
 * Insertion order is conversational order. Only the SessionEngine appends;
 * callers may clear, pop or trim between turns.
 */

import type { Message } from "../types.js";

export interface ConversationSnapshot {
  systemPrompt: string;
  messages: Message[];
}

export class Conversation {
  private messages: Message[] = [];
  private _systemPrompt: string;
  private systemHint = "";

  constructor(systemPrompt = "", messages: Message[] = []) {
    this._systemPrompt = systemPrompt;
    this.messages = messages.map((m) => ({ ...m }));
  }

  get systemPrompt(): string {
    return this._systemPrompt;
  }

  set systemPrompt(value: string) {
    this._systemPrompt = value;
  }

  get length(): number {
    return this.messages.length;
  }

  get isEmpty(): boolean {
    return this.messages.length === 0;
  }

  /** One-shot system hint, cleared after the next successful turn */
  setSystemHint(hint: string): void {
    this.systemHint = hint;
  }

  clearSystemHint(): void {
    this.systemHint = "";
  }

  /** Append a completed exchange. */
  appendExchange(userText: string, assistantText: string): void {
    this.messages.push({ role: "user", content: userText }, { role: "assistant", content: assistantText });
  }

  /** Swap the trailing exchange for a new one (used by retry). */
  replaceLastExchange(userText: string, assistantText: string): void {
    if (this.hasTrailingExchange()) {
      this.messages.splice(-2, 2);
    }
    this.appendExchange(userText, assistantText);
  }

  /** True when the history ends with a user message followed by its reply */
  hasTrailingExchange(): boolean {
    const n = this.messages.length;
    return n >= 2 && this.messages[n - 2].role === "user" && this.messages[n - 1].role === "assistant";
  }

  lastUserMessage(): string | null {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      if (this.messages[i].role === "user") return this.messages[i].content;
    }
    return null;
  }

  /**
   * Remove the last assistant message and the last user message.
   * Returns the user text, or null when there was none.
   */
  popLastExchange(): string | null {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      if (this.messages[i].role === "assistant") {
        this.messages.splice(i, 1);
        break;
      }
    }
    for (let i = this.messages.length - 1; i >= 0; i--) {
      if (this.messages[i].role === "user") {
        return this.messages.splice(i, 1)[0].content;
      }
    }
    return null;
  }

  /** Clear all messages; the system prompt stays. */
  clear(): void {
    this.messages = [];
    this.systemHint = "";
  }

  trimToLastN(n: number): void {
    if (this.messages.length > n) {
      this.messages = this.messages.slice(-n);
    }
  }

  /**
   * Messages to send: system prompt (plus hint) first, then the history.
   */
  requestMessages(options: { dropLastExchange?: boolean } = {}): Message[] {
    const result: Message[] = [];
    const systemParts = [this._systemPrompt, this.systemHint].filter((p) => p.length > 0);
    if (systemParts.length > 0) {
      result.push({ role: "system", content: systemParts.join("\n\n") });
    }

    const history =
      options.dropLastExchange && this.hasTrailingExchange() ? this.messages.slice(0, -2) : this.messages;
    for (const m of history) result.push({ ...m });
    return result;
  }

  snapshot(): ConversationSnapshot {
    return {
      systemPrompt: this._systemPrompt,
      messages: this.messages.map((m) => ({ ...m })),
    };
  }
}
