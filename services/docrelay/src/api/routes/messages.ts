import { Router, type Request, type Response, type RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ValidationError } from '../../core/errors.js';
import { describeIssues, isReservedFieldName } from '../../core/schemas.js';
import type { StoreGateway } from '../../store/store-gateway.js';
import { handle } from './async-handler.js';

/** Prefix of the resource ids messages are stored under. */
export const MESSAGE_RESOURCE_PREFIX = 'message:';

const messageFormSchema = z
  .record(z.union([z.string(), z.array(z.string())]))
  .superRefine((fields, ctx) => {
    const keys = Object.keys(fields);
    if (keys.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Message form is empty' });
    }
    for (const key of keys) {
      if (isReservedFieldName(key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Field names must not start with "$"' });
      }
    }
  });

export interface MessageRouteOptions {
  /** Path the resource routes are mounted at; the stored message is readable below it. */
  resourcesPath: string;
  /** Where the browser is sent after a submission. */
  redirectTo?: string;
  writeLimiter?: RequestHandler;
  clock?: () => number;
}

/**
 * Create message submission routes
 * @param gateway - Store gateway the messages are written through
 */
export function createMessageRoutes(gateway: StoreGateway, options: MessageRouteOptions): Router {
  const router = Router();
  const redirectTo = options.redirectTo ?? '/';
  const clock = options.clock ?? Date.now;
  const limit: RequestHandler[] = options.writeLimiter ? [options.writeLimiter] : [];

  /**
   * Store a submitted form as a new message document stamped with the server time,
   * then send the browser back to the form.
   */
  router.post(
    '/',
    ...limit,
    handle(async (req: Request, res: Response): Promise<void> => {
      const parsed = messageFormSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError('Invalid message form', { issues: describeIssues(parsed.error) });
      }

      const resourceId = `${MESSAGE_RESOURCE_PREFIX}${uuidv4()}`;
      const result = await gateway.write(resourceId, {
        ...parsed.data,
        date: new Date(clock()).toISOString(),
      });

      console.log(`📨 Stored message ${resourceId} (revision ${result.revision})`);
      res.set('Content-Location', `${options.resourcesPath}/${resourceId}`);
      res.redirect(302, redirectTo);
    })
  );

  return router;
}
