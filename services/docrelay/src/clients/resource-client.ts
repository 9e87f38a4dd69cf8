/**
 * HTTP client for the resource API.
 * Maps error responses back onto the service's error classes.
 */

import axios, { isAxiosError, type AxiosInstance } from "axios";
import { z } from "zod";
import {
  ConflictError,
  DocRelayError,
  NotFoundError,
  StoreUnavailableError,
  ValidationError,
} from "../core/errors.js";
import { jsonValueSchema, revisionSchema } from "../core/schemas.js";
import type { JsonValue, ResourceId, StoreDocument, WriteOptions, WriteResult } from "../types/index.js";

/* ---------- Response Schemas ---------- */
const writeResultSchema = z.object({
  resource: z.string(),
  revision: revisionSchema,
  committedAt: z.string(),
});

const storeDocumentSchema = z.object({
  resource: z.string(),
  revision: revisionSchema,
  document: jsonValueSchema,
  deleted: z.boolean(),
  updatedAt: z.string(),
});

const errorBodySchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
  details: z.record(z.unknown()).optional(),
});

const conflictDetailsSchema = z.object({
  expectedRevision: z.number(),
  actualRevision: z.number().nullable(),
});

function envelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({ success: z.literal(true), data });
}

export interface ResourceClientOptions {
  timeoutMs?: number;
}

/* ---------- Client Class ---------- */
export class ResourceClient {
  private client: AxiosInstance;

  /**
   * @param baseURL - Service root, e.g. http://localhost:3000/api/v1
   */
  constructor(baseURL: string, options: ResourceClientOptions = {}) {
    this.client = axios.create({
      baseURL,
      timeout: options.timeoutMs ?? 10000,
      headers: {
        "Content-Type": "application/json",
        "User-Agent": "docrelay-client/1.0.0",
      },
    });

    // Interceptor for structured error mapping
    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        throw toClientError(error);
      }
    );
  }

  async write(resource: ResourceId, document: JsonValue, options: WriteOptions = {}): Promise<WriteResult> {
    const body = options.expectedRevision === undefined
      ? { document }
      : { document, expectedRevision: options.expectedRevision };
    const res = await this.client.put(resourcePath(resource), body);
    return envelope(writeResultSchema).parse(res.data).data;
  }

  async remove(resource: ResourceId, options: WriteOptions = {}): Promise<WriteResult> {
    const headers = options.expectedRevision === undefined ? {} : { "If-Match": `"${options.expectedRevision}"` };
    const res = await this.client.delete(resourcePath(resource), { headers });
    return envelope(writeResultSchema).parse(res.data).data;
  }

  async read(resource: ResourceId): Promise<StoreDocument> {
    const res = await this.client.get(resourcePath(resource));
    return envelope(storeDocumentSchema).parse(res.data).data;
  }

  /* ---------- Health Check ---------- */
  async checkHealth(): Promise<boolean> {
    try {
      const root = new URL(this.client.defaults.baseURL ?? "/", "http://localhost");
      const res = await this.client.get(`${root.origin}/health/ready`);
      return res.status === 200;
    } catch {
      return false;
    }
  }
}

function resourcePath(resource: ResourceId): string {
  return `/resources/${encodeURIComponent(resource)}`;
}

/**
 * Turn an axios failure into the matching service error.
 */
export function toClientError(error: unknown): Error {
  if (!isAxiosError(error)) {
    return error instanceof Error ? error : new Error(String(error));
  }
  if (!error.response) {
    return new StoreUnavailableError(`Request failed: ${error.message}`, error);
  }

  const { status, data } = error.response;
  const parsed = errorBodySchema.safeParse(data);
  const body: z.infer<typeof errorBodySchema> = parsed.success ? parsed.data : {};
  const message = body.message ?? error.message;
  const detailResource = body.details?.["resource"];
  const resource = typeof detailResource === "string" ? detailResource : "";

  switch (status) {
    case 400:
      return new ValidationError(message, body.details);
    case 404:
      return new NotFoundError(resource);
    case 409: {
      const details = conflictDetailsSchema.safeParse(body.details);
      return details.success
        ? new ConflictError(resource, details.data.expectedRevision, details.data.actualRevision)
        : new DocRelayError("CONFLICT", message, { statusCode: 409 });
    }
    case 429:
      return new DocRelayError("RATE_LIMITED", message, { statusCode: 429, retryable: true, cause: error });
    case 503:
      return new StoreUnavailableError(message, error);
    default:
      return new DocRelayError("INTERNAL", message, { statusCode: status, cause: error });
  }
}
