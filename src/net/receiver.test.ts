import { describe, test, expect, vi, afterEach } from 'vitest';
import { NetworkReceiver } from './receiver';
import { ConnectionState } from './connection';
import { MemoryTransport } from '../transport/memory-transport';
import { Transport } from '../transport/transport';
import { InboundQueue } from '../sync/inbound-queue';
import { PendingUpdateMailbox } from '../sync/mailbox';
import { QueuedArrival, MailboxKind, PositionUpdate } from '../sync/reconciler';
import { decodeMessage, encodeMessage } from '../protocol/codec';
import { Message } from '../protocol/messages';
import { TransportClosedError } from '../errors';

function setup(transport: Transport) {
  const connection = new ConnectionState();
  const queue = new InboundQueue<QueuedArrival>();
  const mailbox = new PendingUpdateMailbox<MailboxKind, PositionUpdate>();
  const receiver = new NetworkReceiver({ transport, connection, queue, mailbox, pollIntervalMs: 0 });
  return { connection, queue, mailbox, receiver };
}

function serverSend(server: MemoryTransport, message: Message): void {
  server.send(encodeMessage(message));
}

/** Transport that yields scripted datagrams, then fails recv with `error`. */
function scriptedTransport(datagrams: Uint8Array[], error: Error, onSend: (bytes: Uint8Array) => void = () => {}): Transport {
  return {
    closed: false,
    send: onSend,
    recv: () => {
      const next = datagrams.shift();
      return next ? Promise.resolve(next) : Promise.reject(error);
    },
    close: () => {}
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('NetworkReceiver', () => {
  test('routes positions to the mailbox and everything else to the queue', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const [client, server] = MemoryTransport.pair();
    const { connection, queue, mailbox, receiver } = setup(client);

    serverSend(server, { type: 'chunk_data', cx: 1, cy: 2, blocks: new Array<number>(256).fill(3) });
    serverSend(server, { type: 'player_position_update', playerId: 7, x: 1, y: 1 });
    serverSend(server, { type: 'player_position_update', playerId: 7, x: 2, y: 2 });
    serverSend(server, { type: 'player_position_update', playerId: 9, x: 5, y: 5 });
    serverSend(server, { type: 'block_changed', x: 19, y: 2, blockId: 3 });
    server.close();

    await receiver.run();

    expect(queue.drain().map((a) => [a.seq, a.event.type])).toEqual([[1, 'chunk_data'], [5, 'block_changed']]);
    const positions = mailbox.drain().get('player_position_update');
    expect(positions?.get(7)).toEqual({ x: 2, y: 2, seq: 3 });
    expect(positions?.get(9)).toEqual({ x: 5, y: 5, seq: 4 });
    expect(connection.reason).toBe('transport-closed');
    expect(receiver.state).toBe('terminated');
    expect(receiver.stats()).toEqual({ received: 5, dropped: 0, dispatched: 5, ignored: 0 });
  });

  test('answers a heartbeat ping immediately', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const [client, server] = MemoryTransport.pair();
    const { receiver } = setup(client);

    serverSend(server, { type: 'heartbeat_ping' });
    serverSend(server, { type: 'kick', reason: 'bye' });
    await receiver.run();

    expect(decodeMessage(await server.recv())).toEqual({ type: 'heartbeat' });
  });

  test('a kick terminates the connection with the reason', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const [client, server] = MemoryTransport.pair();
    const { connection, queue, receiver } = setup(client);

    serverSend(server, { type: 'kick', reason: 'server restarting' });
    serverSend(server, { type: 'chat_broadcast', sender: 'bob', text: 'too late' });
    await receiver.run();

    expect(connection.terminated).toBe(true);
    expect(connection.reason).toBe('kicked');
    expect(connection.kickReason).toBe('server restarting');
    expect(queue.length).toBe(0);
    expect(warn).toHaveBeenCalledWith('[net] kicked by server: server restarting');
  });

  test('malformed datagrams are dropped and the loop continues', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const [client, server] = MemoryTransport.pair();
    const { connection, queue, receiver } = setup(client);

    server.send(Uint8Array.from([200]));
    server.send(Uint8Array.from([12, 1, 0]));
    serverSend(server, { type: 'chat_broadcast', sender: 'bob', text: 'hi' });
    serverSend(server, { type: 'kick', reason: 'done' });
    await receiver.run();

    expect(receiver.stats()).toMatchObject({ received: 4, dropped: 2 });
    expect(queue.length).toBe(1);
    expect(connection.reason).toBe('kicked');
  });

  test('a welcome after the handshake is ignored', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const [client, server] = MemoryTransport.pair();
    const { receiver } = setup(client);

    serverSend(server, {
      type: 'welcome', playerId: 1, worldWidth: 1, worldHeight: 1, chunkSize: 16, spawnX: 0, spawnY: 0
    });
    serverSend(server, { type: 'kick', reason: 'done' });
    await receiver.run();

    expect(receiver.stats().ignored).toBe(1);
    expect(warn).toHaveBeenCalledWith("[net] ignoring unexpected 'welcome' message");
  });

  test('stops when the connection is terminated locally', async () => {
    const [client] = MemoryTransport.pair();
    const { connection, receiver } = setup(client);

    const done = receiver.run();
    expect(receiver.state).toBe('running');
    connection.terminate('goodbye');
    client.close();
    await done;

    expect(connection.reason).toBe('goodbye');
    expect(receiver.state).toBe('terminated');
  });

  test('the peer closing during a pending recv terminates with transport-closed', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const [client, server] = MemoryTransport.pair();
    const { connection, receiver } = setup(client);

    const done = receiver.run();
    // past the zero-length poll sleep, so the loop is parked in recv()
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(receiver.state).toBe('running');
    server.close();
    await done;

    expect(connection.reason).toBe('transport-closed');
    expect(receiver.stats().received).toBe(0);
    expect(warn).toHaveBeenCalledWith('[net] connection lost: Transport closed by peer');
  });

  test('a failed heartbeat send terminates with transport-closed', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const transport = scriptedTransport([encodeMessage({ type: 'heartbeat_ping' })], new Error('unreachable'), () => {
      throw new TransportClosedError('socket gone');
    });
    const { connection, receiver } = setup(transport);

    await receiver.run();

    expect(connection.reason).toBe('transport-closed');
  });

  test('other errors propagate after marking the connection terminated', async () => {
    const { connection, receiver } = setup(scriptedTransport([], new Error('boom')));

    await expect(receiver.run()).rejects.toThrow('boom');
    expect(connection.reason).toBe('error');
    expect(receiver.state).toBe('terminated');
  });

  test('cannot be started twice', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { receiver } = setup(scriptedTransport([], new TransportClosedError()));
    await receiver.run();
    await expect(receiver.run()).rejects.toThrow(/cannot be started from state 'terminated'/);
  });
});
