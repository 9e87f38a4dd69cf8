import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import express, { type Express, type Request, type Response } from 'express';
import { WebSocket, WebSocketServer } from 'ws';
import type { ChangeNotifier } from '../services/change-notifier.js';
import { decodeRawData } from './protocol.js';
import type { SessionTransport } from './session.js';
import type { SessionManager } from './session-manager.js';

/**
 * Adapts a ws socket to the session transport. send() resolves when ws has written
 * the frame, so a stalled peer holds the session's pump.
 */
export class WebSocketTransport implements SessionTransport {
  private readonly socket: WebSocket;

  constructor(socket: WebSocket) {
    this.socket = socket;
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.isOpen) {
        reject(new Error('WebSocket is not open'));
        return;
      }
      this.socket.send(data, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  close(code: number, reason: string): void {
    this.socket.close(code, reason);
  }

  terminate(): void {
    this.socket.terminate();
  }
}

export interface SocketServerOptions {
  path: string;
  /** Largest inbound frame in bytes. */
  maxPayload?: number;
}

/**
 * WebSocket endpoint plus a small express app for health checks on the same port.
 */
export class SocketServer {
  readonly app: Express;
  private readonly server: Server;
  private readonly wss: WebSocketServer;
  private readonly sessions: SessionManager;
  private readonly notifier: ChangeNotifier;

  constructor(sessions: SessionManager, notifier: ChangeNotifier, options: SocketServerOptions) {
    this.sessions = sessions;
    this.notifier = notifier;
    this.app = express();
    this.app.get('/health', (req: Request, res: Response) => this.health(req, res));
    this.server = createServer(this.app);
    this.wss = new WebSocketServer({
      server: this.server,
      path: options.path,
      maxPayload: options.maxPayload ?? 64 * 1024,
    });
    this.wss.on('connection', (socket) => this.accept(socket));
    this.wss.on('error', (error) => console.error('❌ WebSocket server error:', error));
  }

  /**
   * Listen on the port. Resolves with the bound port (useful with port 0).
   */
  listen(port: number): Promise<number> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.server.once('error', onError);
      this.server.listen(port, () => {
        this.server.off('error', onError);
        const address = this.server.address();
        resolve(isAddressInfo(address) ? address.port : port);
      });
    });
  }

  /**
   * Close every session (going away), then stop accepting connections.
   */
  async close(): Promise<void> {
    await this.sessions.closeAll();
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
    await new Promise<void>((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private accept(socket: WebSocket): void {
    const session = this.sessions.create(new WebSocketTransport(socket));

    socket.on('message', (data, isBinary) => {
      const frame = isBinary ? '' : decodeRawData(data);
      session.receive(frame).catch((error) => console.error(`Error handling frame on session ${session.id}:`, error));
    });
    socket.on('close', () => {
      session.handleTransportClosed().catch((error) => console.error(`Error closing session ${session.id}:`, error));
    });
    socket.on('error', (error) => {
      console.warn(`⚠️ Socket error on session ${session.id}: ${error.message}`);
    });
  }

  private health(_req: Request, res: Response): void {
    const feedsHealthy = this.notifier.feedsHealthy();
    res.status(feedsHealthy ? 200 : 503).json({
      success: feedsHealthy,
      data: {
        status: feedsHealthy ? 'healthy' : 'degraded',
        feeds: this.notifier.getFeedNames(),
        sessions: this.sessions.getStats(),
        notifier: this.notifier.getStats(),
      },
      timestamp: new Date().toISOString(),
    });
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return address !== null && typeof address === 'object';
}
