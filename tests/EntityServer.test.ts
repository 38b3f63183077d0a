import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createEncodeContinuation } from '../src/EncodeContinuation.js';
import type { ReadErasePacketResult, ReadPacketResult } from '../src/EntityTree.js';
import { createEntityTree } from '../src/EntityTree.js';
import type { ServerTransport, TransportHandlers } from '../src/EntityServer.js';
import { createEntityServer } from '../src/EntityServer.js';
import { createEntityEnvironment } from '../src/Environment.js';
import { silentLogger } from '../src/Logger.js';
import type { ClientId, EntityServerConfig } from '../src/types.js';
import { MSG_ENTITY_ERASE, USECS_PER_SECOND } from '../src/types.js';

const A = 'a1a1a1a1-0000-4000-8000-00000000000a';
const B = 'b1b1b1b1-0000-4000-8000-00000000000b';
const C = 'c1c1c1c1-0000-4000-8000-00000000000c';
const T0 = 1_700_000_000 * USECS_PER_SECOND;

// ── In-process transport ────────────────────────────────

interface FakeTransport extends ServerTransport {
  sent: Array<{ clientId: ClientId; data: Uint8Array }>;
  started: boolean;
  open(clientId: ClientId): void;
  close(clientId: ClientId): void;
  deliver(clientId: ClientId, data: ArrayBuffer): void;
  /** Takes everything sent to `clientId` so far */
  drain(clientId: ClientId): Uint8Array[];
}

function fakeTransport(): FakeTransport {
  let handlers: TransportHandlers | null = null;
  const transport: FakeTransport = {
    sent: [],
    started: false,
    async start(_port, h) {
      handlers = h;
      transport.started = true;
    },
    async stop() {
      handlers = null;
      transport.started = false;
    },
    send(clientId, data) {
      transport.sent.push({ clientId, data: new Uint8Array(data) });
    },
    open(clientId) {
      handlers?.onOpen(clientId);
    },
    close(clientId) {
      handlers?.onClose(clientId);
    },
    deliver(clientId, data) {
      handlers?.onMessage(clientId, data);
    },
    drain(clientId) {
      const mine = transport.sent.filter(s => s.clientId === clientId).map(s => s.data);
      transport.sent = transport.sent.filter(s => s.clientId !== clientId);
      return mine;
    },
  };
  return transport;
}

async function setup(config: Partial<EntityServerConfig> = {}) {
  let clock = T0;
  const env = createEntityEnvironment({ now: () => clock, logger: silentLogger });
  const tree = createEntityTree(env);
  const transport = fakeTransport();
  const server = createEntityServer(tree, { port: 0, ...config }, transport);
  await server.start();

  let clientClock = T0;
  const clientEnv = createEntityEnvironment({ now: () => clientClock, logger: silentLogger });
  const client = createEntityTree(clientEnv);

  return {
    tree,
    transport,
    server,
    client,
    at(time: number) {
      clock = time;
    },
    clientAt(time: number) {
      clientClock = time;
    },
    /** Feeds everything sent to client 1 into the client tree */
    sync() {
      for (const packet of transport.drain(1)) {
        if (packet[0] === MSG_ENTITY_ERASE) client.readErasePacket(packet);
        else client.readEntityPacket(packet);
      }
    },
  };
}

// ── Outgoing ────────────────────────────────────────────

describe('EntityServer - sending', () => {
  it('sends every entity to a new client', async () => {
    const t = await setup();
    t.tree.addEntity({ id: A, properties: { name: 'alpha' } });
    t.tree.addEntity({ id: B, properties: { name: 'beta' } });
    const connected: ClientId[] = [];
    t.server.onConnect = (id) => connected.push(id);

    t.transport.open(1);
    assert.deepEqual(connected, [1]);
    assert.equal(t.server.clientCount, 1);

    t.sync();
    assert.equal(t.client.size, 2);
    assert.equal(t.client.findEntity(B)?.name, 'beta');
    assert.equal(t.server.clientState(1)?.lastSent.get(A), T0);
  });

  it('sends only what changed since the last tick', async () => {
    const t = await setup();
    t.tree.addEntity({ id: A, properties: { name: 'alpha' } });
    t.tree.addEntity({ id: B });
    t.transport.open(1);
    t.sync();
    assert.equal(t.server.tick().packets, 0);

    t.at(T0 + USECS_PER_SECOND);
    t.tree.findEntity(A)?.setProperties({ name: 'renamed' });
    const stats = t.server.tick();
    assert.equal(stats.packets, 1);
    assert.equal(stats.erased, 0);

    t.clientAt(T0 + USECS_PER_SECOND);
    t.sync();
    assert.equal(t.client.findEntity(A)?.name, 'renamed');
    assert.equal(t.server.tick().packets, 0);
  });

  it('sends erase notices for deleted entities', async () => {
    const t = await setup();
    t.tree.addEntity({ id: A });
    t.tree.addEntity({ id: B });
    t.transport.open(1);
    t.sync();

    t.at(T0 + USECS_PER_SECOND);
    t.tree.deleteEntity(A);
    const stats = t.server.tick();
    assert.equal(stats.erased, 1);

    const packets = t.transport.drain(1);
    assert.equal(packets.length, 1);
    assert.equal(packets[0]?.[0], MSG_ENTITY_ERASE);
    assert.deepEqual(t.client.readErasePacket(packets[0] ?? new Uint8Array(0)).erased, [A]);
    assert.equal(t.server.clientState(1)?.lastSent.has(A), false);
    assert.equal(t.server.tick().erased, 0);
  });

  it('splits erase notices across packets', async () => {
    const t = await setup({ maxPacketSize: 5 + 2 * 16 });
    t.tree.addEntity({ id: A });
    t.tree.addEntity({ id: B });
    t.tree.addEntity({ id: C });
    t.transport.open(1);
    // no entity record fits packets this small
    assert.equal(t.transport.drain(1).length, 0);

    t.at(T0 + USECS_PER_SECOND);
    for (const id of [A, B, C]) t.tree.deleteEntity(id);
    const stats = t.server.tick();
    assert.equal(stats.packets, 2);
    assert.equal(stats.erased, 3);
    assert.equal(t.server.clientState(1)?.continuation.size, 0);
  });

  it('send only reaches connected clients', async () => {
    const t = await setup();
    t.server.send(7, new ArrayBuffer(1));
    assert.equal(t.transport.sent.length, 0);
    t.transport.open(7);
    t.server.send(7, new ArrayBuffer(1));
    assert.equal(t.transport.drain(7).length, 1);
  });
});

// ── Incoming ────────────────────────────────────────────

describe('EntityServer - receiving', () => {
  it('applies client edits in the server clock', async () => {
    const t = await setup();
    t.transport.open(1);
    t.server.setClockSkew(1, 2 * USECS_PER_SECOND);
    const results: ReadPacketResult[] = [];
    t.server.onEntityPacket = (_id, result) => results.push(result);

    t.clientAt(T0 + 5 * USECS_PER_SECOND);
    t.client.addEntity({ id: C, properties: { name: 'from client' } });
    const [packet] = t.client.encodeEntityPackets([C], createEncodeContinuation());
    assert.ok(packet);

    t.at(T0 + 4 * USECS_PER_SECOND);
    t.transport.deliver(1, packet);
    assert.deepEqual(results.map(r => r.created), [[C]]);
    assert.equal(t.tree.findEntity(C)?.name, 'from client');
    assert.equal(t.tree.findEntity(C)?.lastEdited, T0 + 3 * USECS_PER_SECOND);
  });

  it('deletes entities a client erased', async () => {
    const t = await setup();
    t.tree.addEntity({ id: A });
    t.transport.open(1);
    const results: ReadErasePacketResult[] = [];
    t.server.onErasePacket = (_id, result) => results.push(result);

    t.transport.deliver(1, t.client.encodeErasePacket([A]));
    assert.deepEqual(results.map(r => r.erased), [[A]]);
    assert.equal(t.tree.size, 0);
  });

  it('hands other messages to onMessage', async () => {
    const t = await setup();
    t.transport.open(1);
    const seen: number[] = [];
    t.server.onMessage = (_id, data) => seen.push(new Uint8Array(data)[0] ?? -1);

    const custom = new ArrayBuffer(2);
    new Uint8Array(custom).set([0x7F, 1]);
    t.transport.deliver(1, custom);
    t.transport.deliver(1, new ArrayBuffer(0));
    assert.deepEqual(seen, [0x7F]);
  });

  it('ignores messages from clients it does not know', async () => {
    const t = await setup();
    t.transport.deliver(3, t.client.encodeErasePacket([A]));
    assert.equal(t.tree.isDeletedEntity(A), false);
  });
});

// ── Lifecycle ───────────────────────────────────────────

describe('EntityServer - lifecycle', () => {
  it('forgets clients on disconnect and on stop', async () => {
    const t = await setup();
    const gone: ClientId[] = [];
    t.server.onDisconnect = (id) => gone.push(id);

    t.transport.open(1);
    t.transport.open(2);
    t.transport.close(1);
    t.transport.close(1);
    assert.deepEqual(gone, [1]);
    assert.equal(t.server.clientCount, 1);

    await t.server.stop();
    assert.equal(t.server.clientCount, 0);
    assert.equal(t.transport.started, false);
  });
});
