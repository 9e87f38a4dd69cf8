import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios from 'axios';
import { WebSocket } from 'ws';
import { SocketClient, type SocketClientOptions } from '../clients/socket-client.js';
import { CloseCodes } from '../core/errors.js';
import { LocalChangeFeed } from '../services/change-feeds.js';
import { ChangeNotifier } from '../services/change-notifier.js';
import { InMemoryDocumentStore } from '../store/document-store.js';
import { StoreGateway } from '../store/store-gateway.js';
import { encodeFrame } from './protocol.js';
import { SessionManager } from './session-manager.js';
import { SocketServer } from './socket-server.js';

const sessionOptions = {
  handshakeTimeoutMs: 2000,
  idleTimeoutMs: 30_000,
  heartbeatIntervalMs: 10_000,
  flushTimeoutMs: 200,
};

describe('SocketServer', () => {
  let gateway: StoreGateway;
  let notifier: ChangeNotifier;
  let sessions: SessionManager;
  let server: SocketServer;
  let url: string;
  const clients: SocketClient[] = [];

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    gateway = new StoreGateway(new InMemoryDocumentStore());
    notifier = new ChangeNotifier();
    await notifier.attach(new LocalChangeFeed(gateway));
    sessions = new SessionManager({ notifier, gateway }, sessionOptions);
    server = new SocketServer(sessions, notifier, { path: '/ws' });
    const port = await server.listen(0);
    url = `ws://127.0.0.1:${port}/ws`;
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      await client.close();
    }
    await server.close();
    await notifier.close();
    vi.restoreAllMocks();
  });

  function connectClient(options: SocketClientOptions = {}): SocketClient {
    const client = new SocketClient(url, { clientId: 'test-client', ...options });
    clients.push(client);
    return client;
  }

  it('pushes every write of a subscribed resource in revision order', async () => {
    const client = connectClient({ reconnect: false });
    await client.connect();
    await client.subscribe('cart-42');
    const revisions: number[] = [];
    const payloads: unknown[] = [];
    client.onEvent((event) => {
      revisions.push(event.revision);
      payloads.push(event.payload);
    });

    await gateway.write('cart-42', { items: ['apple'] });
    await gateway.write('cart-42', { items: ['apple', 'pear'] });
    await gateway.write('cart-7', { items: [] });

    await vi.waitFor(() => expect(revisions).toEqual([1, 2]));
    expect(payloads).toEqual([{ items: ['apple'] }, { items: ['apple', 'pear'] }]);
    expect(client.lastRevision('cart-42')).toBe(2);
    expect(client.state).toBe('open');
  });

  it('sends the current document as a snapshot on subscribe', async () => {
    await gateway.write('profile-1', { name: 'Ada' });
    const client = connectClient({ reconnect: false });
    await client.connect();
    const revisions: number[] = [];
    client.onEvent((event) => revisions.push(event.revision));

    await client.subscribe('profile-1', { snapshot: true });

    await vi.waitFor(() => expect(revisions).toEqual([1]));
  });

  it('reconnects and resubscribes after the server drops the session', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const client = connectClient({ reconnectPolicy: { baseDelayMs: 1 } });
    await client.connect();
    await client.subscribe('cart-42');
    const revisions: number[] = [];
    client.onEvent((event) => revisions.push(event.revision));
    await gateway.write('cart-42', { step: 1 });
    await gateway.write('cart-42', { step: 2 });
    await vi.waitFor(() => expect(revisions).toEqual([1, 2]));

    const firstSessionId = client.sessionId;
    const states: string[] = [];
    client.onStateChange((state) => states.push(state));
    const firstSession = firstSessionId === null ? undefined : sessions.get(firstSessionId);
    await firstSession?.close(CloseCodes.subscriberDisconnected, 'test overflow');

    await vi.waitFor(() => {
      expect(client.sessionId).not.toBe(firstSessionId);
      expect(notifier.subscriberCount('cart-42')).toBe(1);
    });
    await gateway.write('cart-42', { step: 3 });

    await vi.waitFor(() => expect(revisions).toEqual([1, 2, 3]));
    expect(states).toEqual(['reconnecting', 'open']);
    expect(sessions.getStats().closedByReason).toEqual({ subscriber_disconnected: 1 });
  });

  it('closes with 4002 when a client skips the hello', async () => {
    const socket = new WebSocket(url);
    const closeCode = new Promise<number>((resolve) => socket.on('close', (code) => resolve(code)));
    socket.on('open', () => socket.send(encodeFrame({ type: 'subscribe', resource: 'cart-42' })));

    expect(await closeCode).toBe(4002);
  });

  it('reports feed and session health over http', async () => {
    const client = connectClient({ reconnect: false });
    await client.connect();

    const response = await axios.get(url.replace('ws://', 'http://').replace('/ws', '/health'));

    expect(response.status).toBe(200);
    expect(response.data).toMatchObject({
      success: true,
      data: { status: 'healthy', feeds: ['local'], sessions: { active: 1 } },
    });
  });
});
