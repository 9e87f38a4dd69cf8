import { Router, type Request, type Response, type RequestHandler } from 'express';
import { ValidationError } from '../../core/errors.js';
import { describeIssues, writeResourceSchema } from '../../core/schemas.js';
import type { StoreGateway } from '../../store/store-gateway.js';
import { handle } from './async-handler.js';

/**
 * Parse an If-Match header carrying a revision, quoted or bare.
 */
export function parseIfMatch(header: string | undefined): number | undefined {
  if (header === undefined || header.trim() === '') return undefined;
  const value = header.trim().replace(/^W\//, '').replace(/^"(.*)"$/, '$1');
  if (!/^\d+$/.test(value)) {
    throw new ValidationError('If-Match must carry a revision number', { ifMatch: header });
  }
  const revision = Number(value);
  if (!Number.isSafeInteger(revision)) {
    throw new ValidationError('If-Match revision is out of range', { ifMatch: header });
  }
  return revision;
}

function resolveExpectedRevision(bodyValue: number | undefined, header: string | undefined): number | undefined {
  const fromHeader = parseIfMatch(header);
  if (bodyValue !== undefined && fromHeader !== undefined && bodyValue !== fromHeader) {
    throw new ValidationError('expectedRevision and If-Match disagree', {
      expectedRevision: bodyValue,
      ifMatch: fromHeader,
    });
  }
  return bodyValue ?? fromHeader;
}

/**
 * Create resource routes
 * @param gateway - Store gateway every write and read goes through
 * @param writeLimiter - Optional middleware applied to PUT and DELETE
 */
export function createResourceRoutes(gateway: StoreGateway, writeLimiter?: RequestHandler): Router {
  const router = Router();
  const limit: RequestHandler[] = writeLimiter ? [writeLimiter] : [];

  /**
   * Write a document. Responds once the store has committed it.
   */
  router.put(
    '/:resourceId',
    ...limit,
    handle(async (req: Request, res: Response): Promise<void> => {
      const parsed = writeResourceSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError('Invalid write request', { issues: describeIssues(parsed.error) });
      }

      const resourceId = req.params['resourceId'];
      const expectedRevision = resolveExpectedRevision(parsed.data.expectedRevision, req.get('If-Match'));
      const result = await gateway.write(resourceId, parsed.data.document, { expectedRevision });

      res.set('ETag', `"${result.revision}"`);
      res.json({
        success: true,
        message: 'Resource written',
        data: result,
        timestamp: new Date().toISOString(),
      });
    })
  );

  /**
   * Delete a document by writing a tombstone revision.
   */
  router.delete(
    '/:resourceId',
    ...limit,
    handle(async (req: Request, res: Response): Promise<void> => {
      const resourceId = req.params['resourceId'];
      const expectedRevision = parseIfMatch(req.get('If-Match'));
      const result = await gateway.remove(resourceId, { expectedRevision });

      res.json({
        success: true,
        message: 'Resource deleted',
        data: result,
        timestamp: new Date().toISOString(),
      });
    })
  );

  /**
   * Read the current document.
   */
  router.get(
    '/:resourceId',
    handle(async (req: Request, res: Response): Promise<void> => {
      const doc = await gateway.read(req.params['resourceId']);

      res.set('ETag', `"${doc.revision}"`);
      res.json({
        success: true,
        data: doc,
        timestamp: new Date().toISOString(),
      });
    })
  );

  return router;
}
