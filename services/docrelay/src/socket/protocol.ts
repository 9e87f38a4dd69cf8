import type { RawData } from 'ws';
import { z } from 'zod';
import { ProtocolViolationError, type ErrorCode } from '../core/errors.js';
import { describeIssues, jsonValueSchema, resourceIdSchema, revisionSchema } from '../core/schemas.js';
import type { ChangeEvent, JsonValue } from '../types/index.js';

export const PROTOCOL_VERSION = 1;

/* ---------- Client → server frames ---------- */
export const clientFrameSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('hello'),
    protocol: z.literal(PROTOCOL_VERSION),
    clientId: z.string().min(1).max(128).optional(),
  }),
  z.object({
    type: z.literal('subscribe'),
    resource: resourceIdSchema,
    snapshot: z.boolean().optional(),
  }),
  z.object({
    type: z.literal('unsubscribe'),
    resource: resourceIdSchema,
  }),
  z.object({
    type: z.literal('heartbeat'),
  }),
]);

export type ClientFrame = z.infer<typeof clientFrameSchema>;

/* ---------- Server → client frames ---------- */
export const serverFrameSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('welcome'),
    sessionId: z.string(),
    protocol: z.number(),
    heartbeatIntervalMs: z.number(),
    idleTimeoutMs: z.number(),
  }),
  z.object({ type: z.literal('subscribed'), resource: z.string() }),
  z.object({ type: z.literal('unsubscribed'), resource: z.string() }),
  z.object({
    type: z.literal('event'),
    resource: z.string(),
    revision: revisionSchema,
    payload: jsonValueSchema,
    deleted: z.boolean(),
    committedAt: z.string(),
  }),
  z.object({ type: z.literal('heartbeat'), timestamp: z.number() }),
  z.object({
    type: z.literal('error'),
    code: z.string(),
    message: z.string(),
    resource: z.string().optional(),
  }),
]);

export type ServerFrame = z.infer<typeof serverFrameSchema>;
export type EventFrame = Extract<ServerFrame, { type: 'event' }>;

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new ProtocolViolationError('Frame is not valid JSON');
  }
}

/**
 * Decode a client frame. Malformed frames raise ProtocolViolationError.
 */
export function parseClientFrame(raw: string): ClientFrame {
  const result = clientFrameSchema.safeParse(parseJson(raw));
  if (!result.success) {
    throw new ProtocolViolationError('Invalid client frame', { issues: describeIssues(result.error) });
  }
  return result.data;
}

export function parseServerFrame(raw: string): ServerFrame {
  const result = serverFrameSchema.safeParse(parseJson(raw));
  if (!result.success) {
    throw new ProtocolViolationError('Invalid server frame', { issues: describeIssues(result.error) });
  }
  return result.data;
}

export function encodeFrame(frame: ServerFrame | ClientFrame): string {
  return JSON.stringify(frame);
}

export function eventFrame(event: ChangeEvent): EventFrame {
  return {
    type: 'event',
    resource: event.resource,
    revision: event.revision,
    payload: event.payload,
    deleted: event.deleted,
    committedAt: event.committedAt,
  };
}

export function errorFrame(code: ErrorCode, message: string, resource?: string): ServerFrame {
  return resource === undefined ? { type: 'error', code, message } : { type: 'error', code, message, resource };
}

export function snapshotEvent(resource: string, revision: number, payload: JsonValue, committedAt: string): ChangeEvent {
  return Object.freeze({ resource, revision, payload, deleted: false, committedAt });
}

/**
 * Text of a ws message, whichever buffer shape ws delivered it in.
 */
export function decodeRawData(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}
