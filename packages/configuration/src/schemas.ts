/**
 * Configuration schemas for the outbound transport
 */

import { z } from 'zod';

import { ConfigUtils, TIME } from './utils.js';

/**
 * Sender settings; `max_outstanding` caps physical sends in flight per transport
 */
export const SenderSettingsSchema = z.object({
  max_outstanding: z.number().int().min(1).default(100),
});

/**
 * Overload faults back off as `trunc(base ^ (exponent_factor * min(attempt, cutoff)))` ms
 */
export const OverloadRetrySchema = z.object({
  max_attempts: z.number().int().min(1).default(10),
  base: z.number().gt(1).default(1.1),
  exponent_factor: z.number().positive().default(8),
  cutoff: z.number().int().min(1).default(13),
});

export const NetworkRetrySchema = z.object({
  max_attempts: z.number().int().min(1).default(10),
  delay: ConfigUtils.durationTransformer().default(5 * TIME.MILLISECOND),
});

export const BrokerRetrySchema = z.object({
  max_attempts: z.number().int().min(1).default(10),
  delay: ConfigUtils.durationTransformer().default(10 * TIME.MILLISECOND),
});

export const RetryPolicySettingsSchema = z.object({
  overloaded: OverloadRetrySchema.default({}),
  network: NetworkRetrySchema.default({}),
  broker: BrokerRetrySchema.default({}),
});

export const LoggingSettingsSchema = z.object({
  level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO'),
  format: z.enum(['json', 'text']).default('text'),
});

export const TransportConfigSchema = z.object({
  sender: SenderSettingsSchema.default({}),
  retry: RetryPolicySettingsSchema.default({}),
  logging: LoggingSettingsSchema.default({}),
});

export type SenderSettings = z.infer<typeof SenderSettingsSchema>;
export type OverloadRetrySettings = z.infer<typeof OverloadRetrySchema>;
export type NetworkRetrySettings = z.infer<typeof NetworkRetrySchema>;
export type BrokerRetrySettings = z.infer<typeof BrokerRetrySchema>;
export type RetryPolicySettings = z.infer<typeof RetryPolicySettingsSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type TransportConfig = z.infer<typeof TransportConfigSchema>;

/** Raw (pre-validation) shape, as written in YAML */
export type TransportConfigInput = z.input<typeof TransportConfigSchema>;
