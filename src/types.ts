import { z } from 'zod';

// --- Configuration Types ---

export const HandlerErrorPolicySchema = z.enum(['isolate', 'propagate']);
export type HandlerErrorPolicy = z.infer<typeof HandlerErrorPolicySchema>;

export const DispatcherConfigSchema = z.object({
  // Shows up in log lines and in HandlerError messages.
  name: z.string().min(1).default('dispatcher'),
  handler_errors: HandlerErrorPolicySchema.default('isolate'),
  // Log deferrals, drops and reconciliation at debug level.
  trace: z.boolean().default(false),
});
export type DispatcherConfig = z.infer<typeof DispatcherConfigSchema>;

export const DemoConfigSchema = z.object({
  ticks: z.number().int().positive().default(3),
  // 0 runs every tick back to back without a timer.
  interval_ms: z.number().int().nonnegative().default(0),
  dispatcher: DispatcherConfigSchema.default({}),
});
export type DemoConfig = z.infer<typeof DemoConfigSchema>;

// --- Logging Types ---

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface LogEntry {
  id: string;
  timestamp: string;
  level: LogLevel;
  content: string;
  // Dispatcher or component the entry came from.
  scope?: string;
  metadata?: Record<string, unknown>;
}

// --- Producer Types ---

export interface TickEvent {
  tick: number;
  timestamp: string;
}
