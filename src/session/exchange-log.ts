import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { EXCHANGES_DIR } from "../config.js";
import { log } from "../logger.js";

export interface ExchangeRecord {
  prompt: string;
  response: string;
  model: string;
  endpoint: string;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * File name for an exchange: YYYYMMDD_HHMMSS_mmm.json (local time).
 */
export function exchangeFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}_${pad(date.getMilliseconds(), 3)}.json`;
}

/**
 * Persist one successful exchange. Returns the file path, or null when the
 * write failed (logged, never thrown).
 */
export function saveExchange(record: ExchangeRecord, dir: string = EXCHANGES_DIR, now: Date = new Date()): string | null {
  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const filePath = join(dir, exchangeFileName(now));
    const data = {
      timestamp: now.toISOString(),
      model: record.model,
      endpoint: record.endpoint,
      prompt: record.prompt,
      response: record.response,
    };
    writeFileSync(filePath, JSON.stringify(data, null, 2), "utf-8");
    log(`[ExchangeLog] Saved ${filePath}`);
    return filePath;
  } catch (error) {
    log(`[ExchangeLog] Failed to save exchange: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}
