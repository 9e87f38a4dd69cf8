import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { isDocRelayError, StoreUnavailableError } from '../core/errors.js';

export interface ErrorInfo {
  id: string;
  timestamp: string;
  type: string;
  code: string;
  message: string;
  stack?: string;
  context: {
    url?: string;
    method?: string;
    userAgent?: string;
    ip?: string;
  };
  severity: 'low' | 'medium' | 'high' | 'critical';
  statusCode: number;
  details?: Record<string, unknown>;
}

export interface ErrorHandlerOptions {
  /** Seconds clients are told to wait after a 503. */
  retryAfterSeconds?: number;
  /** Oldest records are evicted past this many. */
  maxRecords?: number;
  /** Records older than this are dropped. */
  maxAgeMs?: number;
  /** Include stack and context in responses. */
  exposeDetails?: boolean;
  clock?: () => number;
}

/**
 * Reads the HTTP status express' body parser attaches to its errors.
 */
function parserStatus(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    return error.status;
  }
  return undefined;
}

export class ErrorHandler {
  private errors: Map<string, ErrorInfo> = new Map();
  private readonly retryAfterSeconds: number;
  private readonly maxRecords: number;
  private readonly maxAgeMs: number;
  private readonly exposeDetails: boolean;
  private readonly clock: () => number;

  constructor(options: ErrorHandlerOptions = {}) {
    this.retryAfterSeconds = options.retryAfterSeconds ?? 1;
    this.maxRecords = options.maxRecords ?? 1000;
    this.maxAgeMs = options.maxAgeMs ?? 24 * 60 * 60 * 1000;
    this.clock = options.clock ?? Date.now;
    this.exposeDetails = options.exposeDetails ?? process.env['NODE_ENV'] === 'development';
  }

  /**
   * Express error handling middleware
   */
  middleware() {
    return (error: Error, req: Request, res: Response, next: NextFunction): void => {
      if (res.headersSent) {
        next(error);
        return;
      }

      const errorInfo = this.captureError(error, {
        url: req.originalUrl,
        method: req.method,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
      });

      this.sendErrorResponse(errorInfo, error, res);
    };
  }

  /**
   * Capture and categorize an error
   */
  captureError(error: Error, context: ErrorInfo['context'] = {}): ErrorInfo {
    const statusCode = this.getStatusCode(error);
    const errorInfo: ErrorInfo = {
      id: uuidv4(),
      timestamp: new Date(this.clock()).toISOString(),
      type: error.name,
      code: isDocRelayError(error) ? error.code : statusCode < 500 ? 'BAD_REQUEST' : 'INTERNAL',
      message: error.message,
      stack: error.stack,
      context,
      severity: this.determineSeverity(error, statusCode),
      statusCode,
      details: isDocRelayError(error) ? error.details : undefined,
    };

    this.errors.set(errorInfo.id, errorInfo);
    this.evictExpired();
    this.evictOverflow();
    this.logError(errorInfo);

    return errorInfo;
  }

  /**
   * Send error response for a captured error
   */
  private sendErrorResponse(errorInfo: ErrorInfo, error: Error, res: Response): void {
    if (error instanceof StoreUnavailableError) {
      res.set('Retry-After', this.retryAfterSeconds.toString());
    }

    res.status(errorInfo.statusCode).json({
      success: false,
      error: errorInfo.code,
      message: errorInfo.statusCode >= 500 && !isDocRelayError(error) ? 'Internal server error' : errorInfo.message,
      errorId: errorInfo.id,
      ...(errorInfo.details && { details: errorInfo.details }),
      timestamp: errorInfo.timestamp,
      ...(this.exposeDetails && {
        stack: errorInfo.stack,
        context: errorInfo.context,
      }),
    });
  }

  /**
   * Determine error severity
   */
  private determineSeverity(error: Error, statusCode: number): ErrorInfo['severity'] {
    if (error instanceof StoreUnavailableError) return 'high';
    if (statusCode >= 500) return 'critical';
    if (statusCode === 409 || statusCode === 429) return 'medium';
    return 'low';
  }

  /**
   * Get HTTP status code for error
   */
  private getStatusCode(error: Error): number {
    if (isDocRelayError(error)) return error.statusCode;
    return parserStatus(error) ?? 500;
  }

  /** Records are kept in capture order, so expiry stops at the first fresh one. */
  private evictExpired(): void {
    const cutoff = this.clock() - this.maxAgeMs;
    for (const [id, error] of this.errors) {
      if (Date.parse(error.timestamp) >= cutoff) return;
      this.errors.delete(id);
    }
  }

  private evictOverflow(): void {
    while (this.errors.size > this.maxRecords) {
      const oldest = this.errors.keys().next();
      if (oldest.done) return;
      this.errors.delete(oldest.value);
    }
  }

  /**
   * Log error information
   */
  private logError(errorInfo: ErrorInfo): void {
    const summary = `Error ${errorInfo.id}: ${errorInfo.type} - ${errorInfo.message}`;
    const meta = { severity: errorInfo.severity, context: errorInfo.context, timestamp: errorInfo.timestamp };
    if (errorInfo.severity === 'critical' || errorInfo.severity === 'high') {
      console.error(`❌ ${summary}`, meta);
    } else {
      console.warn(summary, meta);
    }
  }

  /**
   * Get error statistics
   */
  getErrorStats(): {
    total: number;
    bySeverity: Record<string, number>;
    byType: Record<string, number>;
  } {
    this.evictExpired();
    const bySeverity: Record<string, number> = {};
    const byType: Record<string, number> = {};

    for (const error of this.errors.values()) {
      bySeverity[error.severity] = (bySeverity[error.severity] ?? 0) + 1;
      byType[error.type] = (byType[error.type] ?? 0) + 1;
    }

    return { total: this.errors.size, bySeverity, byType };
  }
}
