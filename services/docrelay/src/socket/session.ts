import { v4 as uuidv4 } from 'uuid';
import {
  CloseCodes,
  HandshakeError,
  IdleTimeoutError,
  NotFoundError,
  ProtocolViolationError,
  SubscriberDisconnectedError,
  isDocRelayError,
  type CloseCode,
} from '../core/errors.js';
import type { ChangeNotifier, ChangeSubscription } from '../services/change-notifier.js';
import type { StoreGateway } from '../store/store-gateway.js';
import type { ChangeEvent, ResourceId, SessionInfo, SessionState } from '../types/index.js';
import { settleWithin } from '../utils/timeout.js';
import {
  PROTOCOL_VERSION,
  encodeFrame,
  errorFrame,
  eventFrame,
  parseClientFrame,
  snapshotEvent,
  type ClientFrame,
  type ServerFrame,
} from './protocol.js';

/**
 * The socket a session writes to. send() resolves once the frame has been handed to
 * the network and rejects when the connection is broken.
 */
export interface SessionTransport {
  readonly isOpen: boolean;
  send(data: string): Promise<void>;
  close(code: number, reason: string): void;
  terminate(): void;
}

export interface SessionOptions {
  handshakeTimeoutMs: number;
  idleTimeoutMs: number;
  heartbeatIntervalMs: number;
  flushTimeoutMs: number;
}

export interface SessionDependencies {
  notifier: ChangeNotifier;
  /** Used for subscribe snapshots; sessions without one ignore the snapshot flag. */
  gateway?: StoreGateway;
  clock?: () => number;
}

export const CLOSE_REASON_NAMES: Record<CloseCode, string> = {
  [CloseCodes.normal]: 'normal',
  [CloseCodes.goingAway]: 'going_away',
  [CloseCodes.sendFailure]: 'send_failure',
  [CloseCodes.idleTimeout]: 'idle_timeout',
  [CloseCodes.subscriberDisconnected]: 'subscriber_disconnected',
  [CloseCodes.handshakeFailure]: 'handshake_failure',
  [CloseCodes.protocolViolation]: 'protocol_violation',
};

export interface CloseOptions {
  /** Send buffered events before closing (bounded by flushTimeoutMs). */
  flush?: boolean;
}

/**
 * One live socket connection.
 *
 * connecting → active on a valid hello; active → closing on client close, idle timeout,
 * send failure, protocol violation or subscriber overflow; closing → closed once the
 * buffered events are flushed or the flush times out.
 *
 * Inbound frames are handled one at a time in arrival order. Each subscribed resource
 * has its own pump that awaits every send before taking the next event, so a slow
 * socket backs up into the notifier buffer, which drops the subscriber on overflow.
 */
export class Session {
  readonly id: string = uuidv4();
  private readonly transport: SessionTransport;
  private readonly notifier: ChangeNotifier;
  private readonly gateway?: StoreGateway;
  private readonly clock: () => number;
  private readonly options: SessionOptions;

  private currentState: SessionState = 'connecting';
  private clientId?: string;
  private readonly connectedAt: number;
  private lastSeen: number;

  private readonly subscriptions = new Map<ResourceId, ChangeSubscription>();
  private readonly pumps = new Set<Promise<void>>();
  private readonly watermarks = new Map<ResourceId, number>();
  private readonly subscribedAt = new Map<ResourceId, number>();
  private inbound: Promise<void> = Promise.resolve();
  private handshakeTimer: NodeJS.Timeout | null = null;

  private delivered = 0;
  private rejected = 0;
  private closeCode: CloseCode | null = null;
  private closing: Promise<void> | null = null;
  private readonly closeListeners = new Set<(session: Session, code: CloseCode) => void>();

  constructor(transport: SessionTransport, deps: SessionDependencies, options: SessionOptions) {
    this.transport = transport;
    this.notifier = deps.notifier;
    this.gateway = deps.gateway;
    this.clock = deps.clock ?? Date.now;
    this.options = options;
    this.connectedAt = this.clock();
    this.lastSeen = this.connectedAt;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get closedWith(): CloseCode | null {
    return this.closeCode;
  }

  /**
   * Arm the handshake timer. The client has handshakeTimeoutMs to send hello.
   */
  start(): void {
    this.handshakeTimer = setTimeout(() => {
      this.handshakeTimer = null;
      if (this.currentState === 'connecting') {
        this.reject(new HandshakeError(`No hello within ${this.options.handshakeTimeoutMs}ms`));
      }
    }, this.options.handshakeTimeoutMs);
    this.handshakeTimer.unref();
  }

  /**
   * Queue an inbound frame. Frames are processed sequentially.
   */
  receive(raw: string): Promise<void> {
    this.inbound = this.inbound.then(() => this.process(raw)).catch((error) => this.failTransport(error));
    return this.inbound;
  }

  isSubscribed(resource: ResourceId): boolean {
    return this.subscriptions.has(resource);
  }

  lastDeliveredRevision(resource: ResourceId): number | undefined {
    return this.watermarks.get(resource);
  }

  /**
   * Close the session if no heartbeat arrived within idleTimeoutMs. Returns true if it was closed.
   */
  checkIdle(now: number = this.clock()): boolean {
    if (this.currentState !== 'active' && this.currentState !== 'connecting') return false;
    if (now - this.lastSeen <= this.options.idleTimeoutMs) return false;
    const error = new IdleTimeoutError(this.options.idleTimeoutMs);
    this.close(CloseCodes.idleTimeout, error.message).catch((closeError) =>
      console.error(`Error closing idle session ${this.id}:`, closeError)
    );
    return true;
  }

  /**
   * The client closed the socket or it failed: nothing can be flushed.
   */
  handleTransportClosed(): Promise<void> {
    return this.close(CloseCodes.normal, 'client closed', { flush: false });
  }

  onClose(listener: (session: Session, code: CloseCode) => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  /**
   * Move to closing: unsubscribe everywhere, flush what was buffered, close the socket.
   * Repeated calls return the same promise.
   */
  close(code: CloseCode, reason: string, options: CloseOptions = {}): Promise<void> {
    if (!this.closing) {
      this.closing = this.runClose(code, reason, options.flush ?? true);
    }
    return this.closing;
  }

  getInfo(): SessionInfo {
    return {
      id: this.id,
      clientId: this.clientId,
      state: this.currentState,
      subscriptions: Array.from(this.subscriptions.keys()),
      connectedAt: new Date(this.connectedAt).toISOString(),
      lastSeen: new Date(this.lastSeen).toISOString(),
      delivered: this.delivered,
      rejected: this.rejected,
    };
  }

  private async process(raw: string): Promise<void> {
    if (this.currentState === 'closing' || this.currentState === 'closed') return;

    let frame: ClientFrame;
    try {
      frame = parseClientFrame(raw);
    } catch (error) {
      const violation = error instanceof ProtocolViolationError ? error : new ProtocolViolationError(String(error));
      if (this.currentState === 'connecting') {
        this.reject(new HandshakeError(violation.message));
      } else {
        this.reject(violation);
      }
      return;
    }

    this.lastSeen = this.clock();

    if (this.currentState === 'connecting') {
      if (frame.type !== 'hello') {
        this.reject(new HandshakeError(`Expected hello, got ${frame.type}`));
        return;
      }
      await this.activate(frame.clientId);
      return;
    }

    switch (frame.type) {
      case 'hello':
        this.reject(new ProtocolViolationError('Duplicate hello'));
        return;
      case 'subscribe':
        await this.subscribe(frame.resource, frame.snapshot ?? false);
        return;
      case 'unsubscribe':
        await this.unsubscribe(frame.resource);
        return;
      case 'heartbeat':
        await this.sendFrame({ type: 'heartbeat', timestamp: this.clock() });
        return;
    }
  }

  private async activate(clientId?: string): Promise<void> {
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = null;
    }
    this.clientId = clientId;
    this.currentState = 'active';
    await this.sendFrame({
      type: 'welcome',
      sessionId: this.id,
      protocol: PROTOCOL_VERSION,
      heartbeatIntervalMs: this.options.heartbeatIntervalMs,
      idleTimeoutMs: this.options.idleTimeoutMs,
    });
  }

  private async subscribe(resource: ResourceId, snapshot: boolean): Promise<void> {
    if (!this.subscriptions.has(resource)) {
      const subscription = this.notifier.subscribe(resource);
      subscription.onDisconnect((error) => this.reject(error));
      this.subscriptions.set(resource, subscription);
      this.subscribedAt.set(resource, this.clock());
      this.track(this.pump(subscription));
    }
    await this.sendFrame({ type: 'subscribed', resource });

    if (snapshot && this.gateway) {
      const subscription = this.subscriptions.get(resource);
      if (subscription) {
        this.track(this.sendSnapshot(subscription));
      }
    }
  }

  private async unsubscribe(resource: ResourceId): Promise<void> {
    const subscription = this.subscriptions.get(resource);
    if (subscription) {
      this.subscriptions.delete(resource);
      this.watermarks.delete(resource);
      this.subscribedAt.delete(resource);
      subscription.unsubscribe();
    }
    await this.sendFrame({ type: 'unsubscribed', resource });
  }

  private async pump(subscription: ChangeSubscription): Promise<void> {
    try {
      for await (const event of subscription) {
        if (this.predatesSubscription(event)) continue;
        await this.deliver(subscription, event);
      }
    } catch (error) {
      // Overflow is handled by the onDisconnect listener.
      if (!(error instanceof SubscriberDisconnectedError)) {
        this.failTransport(error);
      }
    }
  }

  private async sendSnapshot(subscription: ChangeSubscription): Promise<void> {
    const gateway = this.gateway;
    if (!gateway) return;
    try {
      const doc = await gateway.read(subscription.resource);
      await this.deliver(subscription, snapshotEvent(doc.resource, doc.revision, doc.document, doc.updatedAt));
    } catch (error) {
      if (error instanceof NotFoundError) return;
      if (isDocRelayError(error)) {
        await this.sendFrame(errorFrame(error.code, error.message, subscription.resource)).catch((sendError) =>
          this.failTransport(sendError)
        );
        return;
      }
      this.failTransport(error);
    }
  }

  /**
   * Push one event if the session still wants it and it is newer than the last one sent.
   */
  private async deliver(subscription: ChangeSubscription, event: ChangeEvent): Promise<void> {
    if (this.currentState !== 'active') return;
    if (this.subscriptions.get(event.resource) !== subscription) return;
    if (!this.acceptRevision(event)) return;
    await this.sendFrame(eventFrame(event));
  }

  /**
   * Live events committed before the subscription was created are not delivered.
   * committedAt is the writer's clock, compared against this process's clock.
   */
  private predatesSubscription(event: ChangeEvent): boolean {
    const since = this.subscribedAt.get(event.resource);
    if (since === undefined || Date.parse(event.committedAt) >= since) return false;
    this.rejected++;
    return true;
  }

  private acceptRevision(event: ChangeEvent): boolean {
    const mark = this.watermarks.get(event.resource);
    if (mark !== undefined && event.revision <= mark) {
      this.rejected++;
      return false;
    }
    this.watermarks.set(event.resource, event.revision);
    this.delivered++;
    return true;
  }

  private sendFrame(frame: ServerFrame): Promise<void> {
    if (!this.transport.isOpen) return Promise.resolve();
    return this.transport.send(encodeFrame(frame));
  }

  private track(task: Promise<void>): void {
    this.pumps.add(task);
    task.finally(() => this.pumps.delete(task)).catch((error) => this.failTransport(error));
  }

  private reject(error: HandshakeError | ProtocolViolationError | SubscriberDisconnectedError): void {
    const code =
      error instanceof HandshakeError
        ? CloseCodes.handshakeFailure
        : error instanceof ProtocolViolationError
          ? CloseCodes.protocolViolation
          : CloseCodes.subscriberDisconnected;
    if (this.currentState === 'closing' || this.currentState === 'closed') return;

    // Not awaited: the peer may be the reason we are closing. The close frame queues behind it.
    this.sendFrame(errorFrame(error.code, error.message)).catch((sendError) =>
      console.warn(`Could not send error frame on session ${this.id}:`, sendError)
    );
    this.close(code, error.message).catch((closeError) =>
      console.error(`Error closing session ${this.id}:`, closeError)
    );
  }

  private failTransport(error: unknown): void {
    if (this.currentState === 'closing' || this.currentState === 'closed') return;
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`Send failure on session ${this.id}: ${message}`);
    this.close(CloseCodes.sendFailure, 'send failure', { flush: false }).catch((closeError) =>
      console.error(`Error closing session ${this.id}:`, closeError)
    );
  }

  private async runClose(code: CloseCode, reason: string, flush: boolean): Promise<void> {
    this.currentState = 'closing';
    this.closeCode = code;
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = null;
    }

    // Unsubscribe from every resource now; in-flight events to a closing session are dropped.
    const buffered: ChangeEvent[][] = [];
    for (const subscription of this.subscriptions.values()) {
      buffered.push(subscription.drain());
    }
    this.subscriptions.clear();

    if (flush && this.transport.isOpen) {
      const flushed = await settleWithin(this.flush(buffered), this.options.flushTimeoutMs);
      if (!flushed) {
        console.warn(`Session ${this.id} flush timed out after ${this.options.flushTimeoutMs}ms`);
      }
    }

    if (this.transport.isOpen) {
      if (code === CloseCodes.sendFailure) {
        this.transport.terminate();
      } else {
        this.transport.close(code, reason.slice(0, 120));
      }
    }

    this.currentState = 'closed';
    for (const listener of this.closeListeners) {
      try {
        listener(this, code);
      } catch (error) {
        console.error('[session] close listener threw', error);
      }
    }
  }

  private async flush(buffered: ChangeEvent[][]): Promise<void> {
    await Promise.allSettled(Array.from(this.pumps));
    for (const events of buffered) {
      for (const event of events) {
        if (!this.transport.isOpen) return;
        if (this.predatesSubscription(event) || !this.acceptRevision(event)) continue;
        await this.transport.send(encodeFrame(eventFrame(event)));
      }
    }
  }
}
