/**
 * Real-time drift streaming over WebSocket
 * Pushes every persisted drift event to subscribed dashboard clients
 */

import { EventEmitter } from 'node:events';
import { RawData, WebSocket, WebSocketServer } from 'ws';
import { z } from 'zod';
import { Logger } from '../../core/logger';
import { errorMessage, generateId } from '../../utils/helpers';
import type { DriftEvent } from '../types';

export interface StreamingConfig {
  /** 0 binds an ephemeral port */
  port: number;
  host?: string;
  maxConnections: number;
  heartbeatInterval: number;
  maxMessageSize: number;
}

export const DEFAULT_STREAMING_CONFIG: StreamingConfig = {
  port: 8765,
  maxConnections: 100,
  heartbeatInterval: 30_000,
  maxMessageSize: 64 * 1024
};

const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('subscribe'), agentIds: z.array(z.string().min(1)) }),
  z.object({ type: z.literal('unsubscribe') }),
  z.object({ type: z.literal('heartbeat') })
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type ServerMessage =
  | { type: 'connected'; clientId: string; timestamp: number }
  | { type: 'subscribed'; agentIds: string[]; timestamp: number }
  | { type: 'unsubscribed'; timestamp: number }
  | { type: 'heartbeat_response'; timestamp: number }
  | { type: 'drift'; data: DriftEvent; timestamp: number }
  | { type: 'error'; error: { code: string; message: string }; timestamp: number };

export interface StreamingMetrics {
  connectionsTotal: number;
  connectionsRejected: number;
  messagesSent: number;
  driftsBroadcast: number;
  clients: number;
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

class DriftClient {
  isAlive = true;
  private agentFilter?: Set<string>;

  constructor(
    readonly id: string,
    private readonly ws: WebSocket
  ) {}

  send(message: ServerMessage): boolean {
    if (this.ws.readyState !== WebSocket.OPEN) return false;
    this.ws.send(JSON.stringify(message));
    return true;
  }

  sendError(code: string, message: string): void {
    this.send({ type: 'error', error: { code, message }, timestamp: Date.now() });
  }

  setAgentFilter(agentIds: string[] | undefined): void {
    this.agentFilter = agentIds && agentIds.length > 0 ? new Set(agentIds) : undefined;
  }

  wants(agentId: string): boolean {
    return !this.agentFilter || this.agentFilter.has(agentId);
  }

  ping(): void {
    this.isAlive = false;
    this.ws.ping();
  }

  terminate(): void {
    this.ws.terminate();
  }
}

export class DriftStreamer extends EventEmitter {
  private readonly config: StreamingConfig;
  private readonly logger = new Logger('DriftStreamer');
  private readonly clients = new Map<string, DriftClient>();
  private wss?: WebSocketServer;
  private heartbeatTimer?: NodeJS.Timeout;

  private metrics = {
    connectionsTotal: 0,
    connectionsRejected: 0,
    messagesSent: 0,
    driftsBroadcast: 0
  };

  constructor(config: Partial<StreamingConfig> = {}) {
    super();
    this.config = { ...DEFAULT_STREAMING_CONFIG, ...config };
  }

  get isRunning(): boolean {
    return this.wss !== undefined;
  }

  /**
   * Bound port once started; differs from the configured one when that was 0
   */
  get port(): number | undefined {
    const address = this.wss?.address();
    return address && typeof address !== 'string' ? address.port : undefined;
  }

  /**
   * Start the streaming server; resolves once it is listening
   */
  async start(): Promise<void> {
    if (this.wss) {
      this.logger.warn('Streaming server already started');
      return;
    }

    const wss = new WebSocketServer({
      port: this.config.port,
      host: this.config.host,
      maxPayload: this.config.maxMessageSize
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        wss.off('listening', onListening);
        reject(error);
      };
      const onListening = () => {
        wss.off('error', onError);
        resolve();
      };
      wss.once('error', onError);
      wss.once('listening', onListening);
    });

    this.wss = wss;
    wss.on('connection', ws => this.handleConnection(ws));
    wss.on('error', error => {
      this.logger.error('WebSocket server error:', error);
      this.emit('error', error);
    });

    this.startHeartbeat();
    this.logger.info(`Drift streaming server listening on port ${this.port}`);
    this.emit('started');
  }

  /**
   * Stop the streaming server and drop every client
   */
  async stop(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }

    for (const client of this.clients.values()) {
      client.terminate();
    }
    this.clients.clear();

    const wss = this.wss;
    this.wss = undefined;
    if (wss) {
      await new Promise<void>((resolve, reject) => {
        wss.close(error => (error ? reject(error) : resolve()));
      });
      this.logger.info('Drift streaming server stopped');
    }

    this.emit('stopped');
  }

  /**
   * Send a drift event to every client subscribed to its agent
   */
  broadcastDrift(event: DriftEvent): number {
    let delivered = 0;
    for (const client of this.clients.values()) {
      if (!client.wants(event.agentId)) continue;
      if (client.send({ type: 'drift', data: event, timestamp: Date.now() })) {
        delivered++;
      }
    }

    this.metrics.driftsBroadcast++;
    this.metrics.messagesSent += delivered;
    return delivered;
  }

  getMetrics(): StreamingMetrics {
    return { ...this.metrics, clients: this.clients.size };
  }

  // Private methods

  private handleConnection(ws: WebSocket): void {
    this.metrics.connectionsTotal++;

    if (this.clients.size >= this.config.maxConnections) {
      this.metrics.connectionsRejected++;
      this.logger.warn('Connection limit reached, rejecting client');
      ws.close(1008, 'Connection limit reached');
      return;
    }

    const client = new DriftClient(generateId('client'), ws);
    this.clients.set(client.id, client);

    ws.on('message', data => this.handleMessage(client, rawToString(data)));
    ws.on('pong', () => {
      client.isAlive = true;
    });
    ws.on('close', () => {
      this.clients.delete(client.id);
      this.logger.debug(`Client disconnected: ${client.id} (${this.clients.size} remaining)`);
      this.emit('client_disconnected', { clientId: client.id });
    });
    ws.on('error', error => {
      this.logger.error(`Client error ${client.id}:`, error);
    });

    client.send({ type: 'connected', clientId: client.id, timestamp: Date.now() });
    this.logger.debug(`New client connected: ${client.id} (${this.clients.size} total)`);
    this.emit('client_connected', { clientId: client.id });
  }

  private handleMessage(client: DriftClient, raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      client.sendError('invalid_json', errorMessage(error));
      return;
    }

    const result = ClientMessageSchema.safeParse(parsed);
    if (!result.success) {
      client.sendError('invalid_request', result.error.issues.map(issue => issue.message).join('; '));
      return;
    }

    const message = result.data;
    switch (message.type) {
      case 'subscribe':
        client.setAgentFilter(message.agentIds);
        client.send({ type: 'subscribed', agentIds: message.agentIds, timestamp: Date.now() });
        break;
      case 'unsubscribe':
        client.setAgentFilter(undefined);
        client.send({ type: 'unsubscribed', timestamp: Date.now() });
        break;
      case 'heartbeat':
        client.send({ type: 'heartbeat_response', timestamp: Date.now() });
        break;
    }
  }

  private startHeartbeat(): void {
    this.heartbeatTimer = setInterval(() => {
      for (const client of this.clients.values()) {
        if (!client.isAlive) {
          this.logger.warn(`Client ${client.id} missed heartbeat, terminating`);
          client.terminate();
          this.clients.delete(client.id);
          continue;
        }
        client.ping();
      }
    }, this.config.heartbeatInterval);
    this.heartbeatTimer.unref();
  }
}
