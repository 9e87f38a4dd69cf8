/**
 * WebSocket client for the socket service.
 * Handles the hello handshake, heartbeats, and reconnects with resubscription when the
 * server drops the session (subscriber overflow, idle timeout, shutdown) or the link fails.
 */

import { WebSocket } from "ws";
import { CloseCodes, HandshakeError } from "../core/errors.js";
import {
  PROTOCOL_VERSION,
  decodeRawData,
  encodeFrame,
  parseServerFrame,
  type ClientFrame,
  type EventFrame,
  type ServerFrame,
} from "../socket/protocol.js";
import type { ResourceId } from "../types/index.js";
import { backoffDelay, sleep, type RetryPolicy, type Sleep } from "../utils/retry.js";

export type SocketClientState = "idle" | "connecting" | "open" | "reconnecting" | "closed";

export interface SocketClientOptions {
  clientId?: string;
  /** Reconnect after an unexpected close. Defaults to true. */
  reconnect?: boolean;
  reconnectPolicy?: Partial<RetryPolicy>;
  /** How long to wait for welcome, subscribed and unsubscribed replies. */
  requestTimeoutMs?: number;
  sleep?: Sleep;
}

type ErrorFrame = Extract<ServerFrame, { type: "error" }>;

interface PendingReply {
  match: (frame: ServerFrame) => boolean;
  resolve: (frame: ServerFrame) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const RECONNECT_POLICY: RetryPolicy = {
  attempts: 10,
  baseDelayMs: 100,
  maxDelayMs: 5000,
  factor: 2,
};

/** Closes caused by the client itself; reconnecting would fail the same way. */
const FATAL_CLOSE_CODES: readonly number[] = [CloseCodes.handshakeFailure, CloseCodes.protocolViolation];

/* ---------- Client Class ---------- */
export class SocketClient {
  private readonly url: string;
  private readonly options: Required<Omit<SocketClientOptions, "clientId" | "reconnectPolicy">> & {
    clientId?: string;
    reconnectPolicy: RetryPolicy;
  };
  private socket: WebSocket | null = null;
  private currentState: SocketClientState = "idle";
  private sessionIdValue: string | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private closedByUser = false;
  private readonly pending = new Set<PendingReply>();
  private readonly subscriptions = new Set<ResourceId>();
  private readonly revisions = new Map<ResourceId, number>();
  private readonly eventListeners = new Set<(event: EventFrame) => void>();
  private readonly errorListeners = new Set<(frame: ErrorFrame) => void>();
  private readonly stateListeners = new Set<(state: SocketClientState, closeCode?: number) => void>();

  constructor(url: string, options: SocketClientOptions = {}) {
    this.url = url;
    this.options = {
      clientId: options.clientId,
      reconnect: options.reconnect ?? true,
      reconnectPolicy: { ...RECONNECT_POLICY, ...options.reconnectPolicy },
      requestTimeoutMs: options.requestTimeoutMs ?? 5000,
      sleep: options.sleep ?? sleep,
    };
  }

  get state(): SocketClientState {
    return this.currentState;
  }

  get sessionId(): string | null {
    return this.sessionIdValue;
  }

  /**
   * Open the connection and complete the handshake.
   */
  async connect(): Promise<void> {
    this.closedByUser = false;
    this.setState("connecting");
    try {
      await this.open();
    } catch (error) {
      this.setState("closed");
      throw error;
    }
  }

  /**
   * Subscribe to a resource. With snapshot the server also sends the current document.
   */
  async subscribe(resource: ResourceId, options: { snapshot?: boolean } = {}): Promise<void> {
    this.subscriptions.add(resource);
    const frame: ClientFrame = options.snapshot
      ? { type: "subscribe", resource, snapshot: true }
      : { type: "subscribe", resource };
    await this.request(frame, (reply) => reply.type === "subscribed" && reply.resource === resource);
  }

  async unsubscribe(resource: ResourceId): Promise<void> {
    this.subscriptions.delete(resource);
    this.revisions.delete(resource);
    await this.request(
      { type: "unsubscribe", resource },
      (reply) => reply.type === "unsubscribed" && reply.resource === resource
    );
  }

  /**
   * Latest revision received for a resource.
   */
  lastRevision(resource: ResourceId): number | undefined {
    return this.revisions.get(resource);
  }

  onEvent(listener: (event: EventFrame) => void): () => void {
    this.eventListeners.add(listener);
    return () => {
      this.eventListeners.delete(listener);
    };
  }

  onError(listener: (frame: ErrorFrame) => void): () => void {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  onStateChange(listener: (state: SocketClientState, closeCode?: number) => void): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  /**
   * Close the connection without reconnecting. Resolves once the socket is closed.
   */
  async close(): Promise<void> {
    this.closedByUser = true;
    const socket = this.socket;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      this.setState("closed");
      return;
    }
    await new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
      socket.close(CloseCodes.normal, "client closing");
    });
  }

  private open(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.url);
      this.socket = socket;
      let welcomed = false;

      const welcome = this.expect((frame) => frame.type === "welcome");
      welcome.then(
        (frame) => {
          if (frame.type !== "welcome") return;
          welcomed = true;
          this.sessionIdValue = frame.sessionId;
          this.startHeartbeat(frame.heartbeatIntervalMs);
          this.setState("open");
          resolve();
        },
        (error: Error) => {
          socket.terminate();
          reject(error);
        }
      );

      socket.on("open", () => {
        const hello: ClientFrame = this.options.clientId
          ? { type: "hello", protocol: PROTOCOL_VERSION, clientId: this.options.clientId }
          : { type: "hello", protocol: PROTOCOL_VERSION };
        socket.send(encodeFrame(hello));
      });
      socket.on("message", (data) => this.handleMessage(decodeRawData(data)));
      socket.on("close", (code, reason) => this.handleClose(socket, code, reason.toString("utf8")));
      socket.on("error", (error) => {
        if (!welcomed) {
          this.rejectPending(error);
        } else {
          console.warn(`⚠️ Socket client error: ${error.message}`);
        }
      });
    });
  }

  private handleMessage(raw: string): void {
    let frame: ServerFrame;
    try {
      frame = parseServerFrame(raw);
    } catch (error) {
      console.warn("Ignoring malformed server frame:", error instanceof Error ? error.message : error);
      return;
    }

    for (const entry of Array.from(this.pending)) {
      if (entry.match(frame)) {
        this.pending.delete(entry);
        clearTimeout(entry.timer);
        entry.resolve(frame);
        return;
      }
    }

    if (frame.type === "event") {
      this.handleEvent(frame);
    } else if (frame.type === "error") {
      for (const listener of this.errorListeners) {
        listener(frame);
      }
    }
  }

  private handleEvent(event: EventFrame): void {
    if (!this.subscriptions.has(event.resource)) return;
    const last = this.revisions.get(event.resource);
    if (last !== undefined && event.revision <= last) return;
    this.revisions.set(event.resource, event.revision);
    for (const listener of this.eventListeners) {
      try {
        listener(event);
      } catch (error) {
        console.error("[socket-client] event listener threw", error);
      }
    }
  }

  private handleClose(socket: WebSocket, code: number, reason: string): void {
    if (socket !== this.socket) return;
    this.stopHeartbeat();
    this.rejectPending(new Error(`Socket closed (${code}${reason ? `: ${reason}` : ""})`));
    this.socket = null;

    // A handshake that never completed is reported by the open() that started it.
    if (this.currentState === "connecting" || this.currentState === "reconnecting") return;

    if (this.closedByUser || !this.options.reconnect || FATAL_CLOSE_CODES.includes(code)) {
      this.setState("closed", code);
      return;
    }

    this.setState("reconnecting", code);
    this.reconnect().catch((error) => {
      console.error("❌ Socket client reconnect failed:", error);
      this.setState("closed", code);
    });
  }

  private async reconnect(): Promise<void> {
    const policy = this.options.reconnectPolicy;
    for (let attempt = 1; attempt <= policy.attempts; attempt++) {
      await this.options.sleep(backoffDelay(policy, attempt));
      if (this.closedByUser) {
        this.setState("closed");
        return;
      }
      try {
        await this.open();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`Reconnect attempt ${attempt}/${policy.attempts} failed: ${message}`);
        continue;
      }
      try {
        await this.resubscribe();
        console.log(`✅ Socket client reconnected after ${attempt} attempt(s)`);
      } catch (error) {
        // Dropping the link hands recovery to the close handler, which starts a fresh cycle.
        console.warn("Resubscribe after reconnect failed:", error instanceof Error ? error.message : error);
        this.socket?.terminate();
      }
      return;
    }
    this.setState("closed");
  }

  /**
   * Resubscribe everything with a snapshot so changes missed while disconnected arrive
   * as the current document; older revisions are dropped by the revision check.
   */
  private async resubscribe(): Promise<void> {
    for (const resource of Array.from(this.subscriptions)) {
      await this.subscribe(resource, { snapshot: true });
    }
  }

  private request(frame: ClientFrame, match: (reply: ServerFrame) => boolean): Promise<ServerFrame> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN || this.currentState !== "open") {
      return Promise.reject(new Error(`Socket client is ${this.currentState}`));
    }
    const reply = this.expect(match);
    socket.send(encodeFrame(frame));
    return reply;
  }

  private expect(match: (frame: ServerFrame) => boolean): Promise<ServerFrame> {
    return new Promise((resolve, reject) => {
      const entry: PendingReply = {
        match,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.pending.delete(entry);
          reject(new HandshakeError(`No reply within ${this.options.requestTimeoutMs}ms`));
        }, this.options.requestTimeoutMs),
      };
      entry.timer.unref();
      this.pending.add(entry);
    });
  }

  private rejectPending(error: Error): void {
    for (const entry of Array.from(this.pending)) {
      this.pending.delete(entry);
      clearTimeout(entry.timer);
      entry.reject(error);
    }
  }

  private startHeartbeat(intervalMs: number): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      const socket = this.socket;
      if (socket && socket.readyState === WebSocket.OPEN) {
        socket.send(encodeFrame({ type: "heartbeat" }));
      }
    }, intervalMs);
    this.heartbeatTimer.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private setState(state: SocketClientState, closeCode?: number): void {
    if (this.currentState === state) return;
    this.currentState = state;
    for (const listener of this.stateListeners) {
      listener(state, closeCode);
    }
  }
}
