import type { RawData, WebSocket, WebSocketServer } from 'ws';
import type { EncodeContinuation } from './EncodeContinuation.js';
import { createEncodeContinuation } from './EncodeContinuation.js';
import type { EntityTree, ReadErasePacketResult, ReadPacketResult } from './EntityTree.js';
import { DEFAULT_MAX_PACKET_SIZE } from './EntityTree.js';
import type { PropertyFlags } from './PropertyFlags.js';
import type { ClientId, EntityId, EntityServerConfig } from './types.js';
import { CURRENT_PROTOCOL_VERSION, MSG_ENTITY_DATA, MSG_ENTITY_ERASE, PACKET_HEADER_BYTES } from './types.js';
import { UUID_BYTES } from './uuid.js';

// ── Transport interface ─────────────────────────────────

export interface ServerTransport {
  start(port: number, handlers: TransportHandlers): Promise<void>;
  stop(): Promise<void>;
  send(clientId: ClientId, data: ArrayBuffer): void;
}

export interface TransportHandlers {
  onOpen(clientId: ClientId): void;
  onClose(clientId: ClientId): void;
  onMessage(clientId: ClientId, data: ArrayBuffer): void;
}

// ── ws transport (default) ──────────────────────────────

function toArrayBuffer(data: RawData): ArrayBuffer {
  if (data instanceof ArrayBuffer) return data;
  const bytes = Array.isArray(data) ? Buffer.concat(data) : data;
  const out = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(out).set(bytes);
  return out;
}

export function createWsTransport(): ServerTransport {
  let wss: WebSocketServer | null = null;
  const clients = new Map<ClientId, WebSocket>();

  return {
    async start(port, handlers) {
      const { WebSocketServer } = await import('ws');
      let nextId: ClientId = 1;

      const server = new WebSocketServer({ port });
      wss = server;

      await new Promise<void>((resolve, reject) => {
        server.once('listening', resolve);
        server.once('error', reject);
      });

      server.on('connection', (ws) => {
        const clientId = nextId++;
        clients.set(clientId, ws);
        handlers.onOpen(clientId);

        ws.on('message', (data) => {
          handlers.onMessage(clientId, toArrayBuffer(data));
        });

        ws.on('close', () => {
          clients.delete(clientId);
          handlers.onClose(clientId);
        });
      });
    },

    async stop() {
      const server = wss;
      if (!server) return;
      for (const ws of clients.values()) ws.terminate();
      clients.clear();
      await new Promise<void>(r => server.close(() => r()));
      wss = null;
    },

    send(clientId, data) {
      const ws = clients.get(clientId);
      if (ws && ws.readyState === 1) {
        ws.send(data);
      }
    },
  };
}

// ── EntityServer ────────────────────────────────────────

export interface EntityServerOptions {
  /** Properties sent to clients. Default: all the protocol version carries. */
  requested?: PropertyFlags;
}

export interface ClientSendState {
  /** lastEdited of the newest edit sent, per entity */
  readonly lastSent: Map<EntityId, number>;
  readonly continuation: EncodeContinuation;
  /** Deletions at or before this time were already sent */
  lastEraseCheck: number;
  /** Client clock minus ours, µs; applied to the client's edits */
  clockSkew: number;
}

export interface TickStats {
  packets: number;
  bytes: number;
  erased: number;
}

export interface EntityServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Sends changed and still-pending entities and erase notices to every client */
  tick(): TickStats;
  send(clientId: ClientId, data: ArrayBuffer): void;
  setClockSkew(clientId: ClientId, skew: number): void;
  clientState(clientId: ClientId): ClientSendState | undefined;
  readonly clientCount: number;
  onConnect: ((clientId: ClientId) => void) | null;
  onDisconnect: ((clientId: ClientId) => void) | null;
  /** Client packets that are neither entity data nor erase */
  onMessage: ((clientId: ClientId, data: ArrayBuffer) => void) | null;
  /** Result of every entity data packet a client sent */
  onEntityPacket: ((clientId: ClientId, result: ReadPacketResult) => void) | null;
  onErasePacket: ((clientId: ClientId, result: ReadErasePacketResult) => void) | null;
}

export function createEntityServer(
  tree: EntityTree,
  config: EntityServerConfig,
  transport?: ServerTransport,
  options?: EntityServerOptions,
): EntityServer {
  const tp = transport ?? createWsTransport();
  const logger = tree.env.logger;
  const version = config.protocolVersion ?? CURRENT_PROTOCOL_VERSION;
  const maxPacketSize = config.maxPacketSize ?? DEFAULT_MAX_PACKET_SIZE;
  const maxErasePerPacket = Math.max(1, Math.floor((maxPacketSize - PACKET_HEADER_BYTES) / UUID_BYTES));
  const clients = new Map<ClientId, ClientSendState>();

  function sendEntities(clientId: ClientId, state: ClientSendState, ids: EntityId[], stats: TickStats) {
    if (ids.length === 0) return;
    const packets = tree.encodeEntityPackets(ids, state.continuation, {
      version,
      maxPacketSize,
      requested: options?.requested,
      trackSend(id, lastEdited) {
        state.lastSent.set(id, lastEdited);
      },
    });
    for (const packet of packets) {
      tp.send(clientId, packet);
      stats.packets++;
      stats.bytes += packet.byteLength;
    }
  }

  function sendErased(clientId: ClientId, state: ClientSendState, stats: TickStats) {
    const now = tree.env.now();
    const erased = tree.deletedSince(state.lastEraseCheck);
    state.lastEraseCheck = now;
    if (erased.length === 0) return;

    for (const id of erased) {
      state.lastSent.delete(id);
      state.continuation.complete(id);
    }
    for (let i = 0; i < erased.length; i += maxErasePerPacket) {
      const packet = tree.encodeErasePacket(erased.slice(i, i + maxErasePerPacket), version);
      tp.send(clientId, packet);
      stats.packets++;
      stats.bytes += packet.byteLength;
    }
    stats.erased += erased.length;
  }

  /** Entities edited since they were last sent, then those with properties still owed */
  function changedFor(state: ClientSendState): EntityId[] {
    const ids: EntityId[] = [];
    const seen = new Set<EntityId>();
    for (const entity of tree.entities()) {
      const sent = state.lastSent.get(entity.id);
      if (sent === undefined || entity.lastEdited > sent) {
        // a newer edit supersedes whatever was left over from the old one
        state.continuation.complete(entity.id);
        ids.push(entity.id);
        seen.add(entity.id);
      }
    }
    for (const id of state.continuation.pendingIds()) {
      if (!seen.has(id)) ids.push(id);
    }
    return ids;
  }

  function handleOpen(clientId: ClientId) {
    const state: ClientSendState = {
      lastSent: new Map(),
      continuation: createEncodeContinuation(),
      lastEraseCheck: tree.env.now(),
      clockSkew: 0,
    };
    clients.set(clientId, state);
    const stats: TickStats = { packets: 0, bytes: 0, erased: 0 };
    sendEntities(clientId, state, tree.entities().map(e => e.id), stats);
    logger.info('Client connected', { client: clientId, entities: tree.size, packets: stats.packets });
    server.onConnect?.(clientId);
  }

  function handleMessage(clientId: ClientId, data: ArrayBuffer) {
    const state = clients.get(clientId);
    if (!state) return;
    const bytes = new Uint8Array(data);
    if (bytes.byteLength === 0) return;

    if (bytes[0] === MSG_ENTITY_DATA) {
      const result = tree.readEntityPacket(bytes, { clockSkew: state.clockSkew });
      server.onEntityPacket?.(clientId, result);
      return;
    }
    if (bytes[0] === MSG_ENTITY_ERASE) {
      const result = tree.readErasePacket(bytes);
      server.onErasePacket?.(clientId, result);
      return;
    }
    server.onMessage?.(clientId, data);
  }

  const server: EntityServer = {
    onConnect: null,
    onDisconnect: null,
    onMessage: null,
    onEntityPacket: null,
    onErasePacket: null,

    get clientCount() {
      return clients.size;
    },

    start() {
      return tp.start(config.port, {
        onOpen: handleOpen,
        onClose(clientId) {
          if (!clients.delete(clientId)) return;
          logger.info('Client disconnected', { client: clientId });
          server.onDisconnect?.(clientId);
        },
        onMessage: handleMessage,
      });
    },

    async stop() {
      await tp.stop();
      clients.clear();
    },

    tick() {
      const stats: TickStats = { packets: 0, bytes: 0, erased: 0 };
      for (const [clientId, state] of clients) {
        sendErased(clientId, state, stats);
        sendEntities(clientId, state, changedFor(state), stats);
      }
      return stats;
    },

    send(clientId, data) {
      if (clients.has(clientId)) tp.send(clientId, data);
    },

    setClockSkew(clientId, skew) {
      const state = clients.get(clientId);
      if (state) state.clockSkew = skew;
    },

    clientState(clientId) {
      return clients.get(clientId);
    },
  };

  return server;
}
