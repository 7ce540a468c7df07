import { describe, test, expect, vi, afterEach } from 'vitest';
import { handshake } from './session';
import { MemoryTransport } from '../transport/memory-transport';
import { decodeMessage, encodeMessage } from '../protocol/codec';
import { Message } from '../protocol/messages';
import { HandshakeTimeoutError, KickedError, TransportClosedError } from '../errors';

const welcome: Message = {
  type: 'welcome',
  playerId: 7,
  worldWidth: 100,
  worldHeight: 64,
  chunkSize: 16,
  spawnX: 3,
  spawnY: 4
};

function serverSend(server: MemoryTransport, message: Message): void {
  server.send(encodeMessage(message));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('handshake', () => {
  test('sends hello and resolves with the welcome', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const [client, server] = MemoryTransport.pair();
    const result = handshake(client, 'alice', { timeoutMs: 1000 });

    expect(decodeMessage(await server.recv())).toEqual({ type: 'hello', name: 'alice' });
    serverSend(server, welcome);

    await expect(result).resolves.toEqual(welcome);
    expect(client.closed).toBe(false);
  });

  test('skips other messages and answers pings before the welcome', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const [client, server] = MemoryTransport.pair();
    const result = handshake(client, 'alice', { timeoutMs: 1000 });

    serverSend(server, { type: 'chat_broadcast', sender: 'bob', text: 'hi' });
    serverSend(server, { type: 'heartbeat_ping' });
    serverSend(server, welcome);

    expect((await result).playerId).toBe(7);
    expect(decodeMessage(await server.recv()).type).toBe('hello');
    expect(decodeMessage(await server.recv()).type).toBe('heartbeat');
  });

  test('skips malformed datagrams', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const [client, server] = MemoryTransport.pair();
    const result = handshake(client, 'alice', { timeoutMs: 1000 });

    server.send(Uint8Array.from([200]));
    serverSend(server, welcome);

    expect((await result).spawnX).toBe(3);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test('a kick before the welcome rejects with KickedError and closes the transport', async () => {
    const [client, server] = MemoryTransport.pair();
    const result = handshake(client, 'alice', { timeoutMs: 1000 });

    serverSend(server, { type: 'kick', reason: 'name taken' });

    await expect(result).rejects.toMatchObject({ name: 'KickedError', reason: 'name taken' });
    await expect(result).rejects.toBeInstanceOf(KickedError);
    expect(client.closed).toBe(true);
  });

  test('times out when no welcome arrives', async () => {
    const [client] = MemoryTransport.pair();
    const result = handshake(client, 'alice', { timeoutMs: 20 });

    await expect(result).rejects.toBeInstanceOf(HandshakeTimeoutError);
    expect(client.closed).toBe(true);
  });

  test('rejects with TransportClosedError if the server goes away', async () => {
    const [client, server] = MemoryTransport.pair();
    const result = handshake(client, 'alice', { timeoutMs: 1000 });
    await server.recv();
    server.close();

    await expect(result).rejects.toBeInstanceOf(TransportClosedError);
  });
});
