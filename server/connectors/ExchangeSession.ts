import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import type { TransportParams } from '../config/engineConfig';
import type { OrderGateway, OutboundMessage } from '../execution/types';
import type { EngineEvent, StreamChannel } from '../orchestrator/TradingEngine';
import { log } from '../utils/logger';
import { ConnectionError, RegistrationError } from './errors';
import { parseMarketMessage, parseOrderMessage } from './MessageParser';

export interface SessionCredentials {
  token: string;
  runId: string;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; signal: AbortSignal }
) => Promise<FetchResponse>;

type EventSink = (event: EngineEvent) => void;

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function readCredentials(body: string): SessionCredentials | null {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return null;
  }
  if (typeof data !== 'object' || data === null) return null;
  const token = 'token' in data ? data.token : undefined;
  const runId = 'run_id' in data ? data.run_id : undefined;
  if (typeof token !== 'string' || !token || typeof runId !== 'string' || !runId) return null;
  return { token, runId };
}

/**
 * Registration plus the two exchange streams. Doubles as the order gateway:
 * outbound orders, cancels and DONE all go over the orders socket.
 */
export class ExchangeSession implements OrderGateway {
  private readonly sockets = new Map<StreamChannel, WebSocket>();
  private resolveClosed: () => void = () => undefined;
  private readonly streamClosed: Promise<void> = new Promise((resolve) => {
    this.resolveClosed = resolve;
  });

  constructor(
    private readonly transport: TransportParams,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  registrationUrl(): string {
    const scheme = this.transport.secure ? 'https' : 'http';
    return `${scheme}://${this.transport.host}/api/replays/${encodeURIComponent(this.transport.scenario)}/start`;
  }

  marketUrl(credentials: SessionCredentials): string {
    return `${this.wsBase()}/api/ws/market?run_id=${encodeURIComponent(credentials.runId)}`;
  }

  ordersUrl(credentials: SessionCredentials): string {
    return `${this.wsBase()}/api/ws/orders?token=${encodeURIComponent(credentials.token)}`
      + `&run_id=${encodeURIComponent(credentials.runId)}`;
  }

  async register(): Promise<SessionCredentials> {
    const url = this.registrationUrl();
    log('REGISTERING', { scenario: this.transport.scenario, url });

    let response: FetchResponse;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${this.transport.name}`,
          'X-Team-Password': this.transport.password,
        },
        signal: AbortSignal.timeout(this.transport.registrationTimeoutMs),
      });
    } catch (err) {
      throw new RegistrationError(`registration request failed: ${errorMessage(err)}`);
    }

    const body = await response.text();
    if (!response.ok) {
      throw new RegistrationError(`registration rejected (${response.status}): ${body.slice(0, 200)}`, response.status);
    }
    const credentials = readCredentials(body);
    if (!credentials) {
      throw new RegistrationError('registration response missing token or run_id', response.status);
    }

    log('REGISTERED', { scenario: this.transport.scenario, runId: credentials.runId });
    return credentials;
  }

  /**
   * Resolves once both streams are open; rejects with ConnectionError otherwise.
   * Events are held until then, so no snapshot reaches the engine before its
   * DONE can be sent.
   */
  async connect(credentials: SessionCredentials, sink: EventSink): Promise<void> {
    const held: EngineEvent[] = [];
    let ready = false;
    const gate: EventSink = (event) => {
      if (ready) sink(event);
      else held.push(event);
    };

    try {
      await Promise.all([
        this.open('market', this.marketUrl(credentials), (raw) => this.onMarketMessage(raw, gate), gate),
        this.open('orders', this.ordersUrl(credentials), (raw) => this.onOrderMessage(raw, gate), gate),
      ]);
    } catch (err) {
      this.close();
      throw err;
    }

    ready = true;
    if (held.length > 0) log('STREAM_EVENTS_RELEASED', { count: held.length });
    for (const event of held.splice(0)) sink(event);
  }

  send(message: OutboundMessage): boolean {
    const socket = this.sockets.get('orders');
    if (!socket || socket.readyState !== WebSocket.OPEN) return false;
    socket.send(JSON.stringify(message));
    return true;
  }

  /** Resolves when either stream closes, which ends the run. */
  closed(): Promise<void> {
    return this.streamClosed;
  }

  close(): void {
    for (const socket of this.sockets.values()) {
      if (socket.readyState !== WebSocket.CLOSED && socket.readyState !== WebSocket.CLOSING) socket.close();
    }
  }

  private wsBase(): string {
    return `${this.transport.secure ? 'wss' : 'ws'}://${this.transport.host}`;
  }

  private open(
    channel: StreamChannel,
    url: string,
    onMessage: (raw: string) => void,
    sink: EventSink
  ): Promise<void> {
    return new Promise((resolve, reject) => {
      // the exchange may run behind a self-signed certificate
      const socket = new WebSocket(url, this.transport.secure ? { rejectUnauthorized: false } : {});
      this.sockets.set(channel, socket);
      let opened = false;

      socket.on('open', () => {
        opened = true;
        log('WS_OPEN', { channel });
        resolve();
      });
      socket.on('message', (data: RawData) => onMessage(rawToString(data)));
      socket.on('error', (err) => {
        log('WS_ERROR', { channel, msg: err.message });
        if (!opened) reject(new ConnectionError(`${channel} stream failed: ${err.message}`, channel));
      });
      socket.on('close', (code: number) => {
        if (!opened) {
          reject(new ConnectionError(`${channel} stream closed before opening (${code})`, channel));
          return;
        }
        sink({ type: 'closed', channel, code });
        this.resolveClosed();
      });
    });
  }

  private onMarketMessage(raw: string, sink: EventSink): void {
    const parsed = parseMarketMessage(raw);
    if (!parsed.ok) {
      log('MARKET_MESSAGE_REJECTED', { reason: parsed.reason });
      return;
    }
    const message = parsed.message;
    sink(message.kind === 'connected' ? { type: 'connected' } : { type: 'snapshot', snapshot: message.snapshot });
  }

  private onOrderMessage(raw: string, sink: EventSink): void {
    const parsed = parseOrderMessage(raw);
    if (!parsed.ok) {
      log('ORDER_MESSAGE_REJECTED', { reason: parsed.reason });
      return;
    }
    const message = parsed.message;
    switch (message.kind) {
      case 'authenticated':
        sink({ type: 'authenticated' });
        return;
      case 'fill':
        sink({ type: 'fill', fill: message.fill });
        return;
      case 'error':
        sink({ type: 'order_error', message: message.message });
        return;
    }
  }
}
