import { existsSync, mkdirSync, appendFileSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import crypto from 'node:crypto';
import { LogEventSchema, type LogEvent, type LogLevel, type LogEventType } from '@token-services/shared';

// ─── Config ──────────────────────────────────────────────

function logDir(): string {
  return process.env.LOG_STORE_PATH || join(process.cwd(), '.data');
}

function logFile(): string {
  return join(logDir(), 'logs.jsonl');
}

function ensureDir(): void {
  if (!existsSync(logDir())) {
    mkdirSync(logDir(), { recursive: true });
  }
}

function parseLines(): LogEvent[] {
  ensureDir();
  if (!existsSync(logFile())) return [];
  const events: LogEvent[] = [];
  for (const line of readFileSync(logFile(), 'utf-8').split('\n').filter(Boolean)) {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      continue; // torn write
    }
    const parsed = LogEventSchema.safeParse(raw);
    // payload is optional in the inferred type; the event always carries one
    if (parsed.success) events.push({ ...parsed.data, payload: parsed.data.payload });
  }
  return events;
}

// ─── Public API ──────────────────────────────────────────

export function appendLog(event: LogEvent): void {
  ensureDir();
  appendFileSync(logFile(), JSON.stringify(event) + '\n', 'utf-8');
}

export function createLogEvent(
  type: LogEventType,
  payload: unknown,
  level: LogLevel = 'INFO',
  requestId?: string,
): LogEvent {
  return {
    id: crypto.randomUUID(),
    timestamp: Date.now(),
    type,
    requestId,
    payload,
    level,
  };
}

export function readByType(type: LogEventType): LogEvent[] {
  return parseLines().filter((e) => e.type === type);
}
