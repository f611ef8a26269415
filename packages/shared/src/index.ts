// ─── @token-services/shared barrel export ────────────────

// Types
export type {
  BindingRecord,
  BindingInput,
  TokenReference,
  ServiceStatus,
  CreationRecord,
  SerializedBinding,
  SerializedCreationRecord,
} from './types/binding.js';

export type { LogEventType, LogLevel, LogEvent } from './types/events.js';

// Schemas
export {
  BindingRecordSchema,
  toBindingRecord,
  bindingKey,
  bindingsEqual,
  serializeBinding,
  serializeCreationRecord,
} from './schemas/binding.js';

export { LogEventTypeSchema, LogLevelSchema, LogEventSchema } from './schemas/events.js';

// ─── Validators ──────────────────────────────────────────
export { zAddress, zBytes32, zBytes4, zUint256 } from './schemas/validators.js';

// Constants
export * from './constants/index.js';
