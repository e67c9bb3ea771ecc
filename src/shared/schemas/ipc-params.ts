/**
 * Zod schemas for control channel validation.
 *
 * Every line that arrives on the instance socket is parsed into an envelope
 * and its argument tuple is checked against the channel's schema before a
 * handler runs. Parameterless channels have no schema.
 *
 * @module shared/schemas/ipc-params
 */

import { z } from 'zod';
import { Ch, isChannel } from '../ipc-schema';
import type { Channel, IpcRequest, IpcResponse } from '../ipc-schema';

// ─── Reusable primitives ───

const positiveInt = z.number().int().positive();

// ─── Envelopes ───

export const IpcRequestSchema = z.object({
  channel: z.string().refine(isChannel, {
    message: 'Unknown channel',
  }),
  args: z.array(z.unknown()).default([]),
});

export const IpcResponseSchema = z.union([
  z.object({ success: z.literal(true), data: z.unknown().optional() }),
  z.object({
    success: z.literal(false),
    error: z.object({ code: z.string(), message: z.string() }),
  }),
]);

// ─── History ───

export const HistoryCopyParams = z.tuple([positiveInt]);

// ─── Schema Registry ───

/**
 * Maps channel names to their argument tuple schemas.
 */
export const IpcParamSchemas: Partial<Record<Channel, z.ZodType>> = {
  [Ch.HISTORY_COPY]: HistoryCopyParams,
};

// ─── Validation helpers ───

export interface IpcValidationError {
  channel: string;
  issues: z.ZodIssue[];
}

/**
 * Validate arguments against the schema for a given channel.
 * Returns `null` if valid or no schema exists, otherwise the validation error.
 */
export function validateIpcParams(channel: Channel, args: unknown[]): IpcValidationError | null {
  const schema = IpcParamSchemas[channel];
  if (!schema) return null;

  const result = schema.safeParse(args);
  if (result.success) return null;

  return { channel, issues: result.error.issues };
}

export function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

/** Parse one decoded JSON value into a request envelope. */
export function parseIpcRequest(value: unknown): { request: IpcRequest } | { error: string } {
  const result = IpcRequestSchema.safeParse(value);
  if (!result.success) {
    return { error: formatIssues(result.error.issues) };
  }
  return { request: { channel: result.data.channel, args: result.data.args } };
}

export function parseIpcResponse(value: unknown): IpcResponse | null {
  const result = IpcResponseSchema.safeParse(value);
  return result.success ? result.data : null;
}

// ─── Response payloads ───

export const HistoryStatusSchema = z.object({
  monitoring: z.boolean(),
  visibility: z.enum(['visible', 'hidden']).nullable(),
  totalEntries: z.number(),
  latestId: z.number().nullable(),
  startedAt: z.string().optional(),
  databasePath: z.string(),
});

export const ClipItemSchema = z.object({
  id: z.number(),
  text: z.string(),
  capturedAtUtc: z.string(),
  localDate: z.string(),
});

export const DeleteAllResultSchema = z.object({ deleted: z.number() });
