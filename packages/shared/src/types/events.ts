// ─── Log Event Types ─────────────────────────────────────

/**
 * Structured log event persisted for every registry action.
 */
export type LogEventType =
  | 'SERVER_START'
  | 'SERVICE_CREATED'
  | 'SERVICE_EXISTS'
  | 'CREATION_FAILED'
  | 'ERROR';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface LogEvent {
  id: string;
  timestamp: number; // ms
  type: LogEventType;
  requestId?: string;
  payload: unknown;
  level: LogLevel;
}
