/**
 * @fileoverview ChessUciServer lifecycle tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { EngineHandshakeState, HandshakeError, createSilentLogger, type ChessEngine } from '@chess-uci/engine';
import { getDefaultSettings } from '../settings/defaults.js';
import { ChessUciServer } from '../index.js';

function createStubEngine(): ChessEngine {
  return {
    start: vi.fn(async () => {}),
    stop: vi.fn(async () => {}),
    analyze: vi.fn(async () => ({ depth: 0, score: null, pv: [], bestMove: null, ponder: null, timedOut: true })),
    setPosition: vi.fn(async () => {}),
    getBestMove: vi.fn(async () => null),
    newGame: vi.fn(async () => {}),
    getEngineId: vi.fn(() => ({ name: 'TestEngine' })),
    getAvailableOptions: vi.fn(() => ({})),
    setOptions: vi.fn(async () => ({ applied: {}, errors: {} })),
    getCurrentOptionValues: vi.fn(() => ({})),
    getState: vi.fn(() => EngineHandshakeState.READY),
    isReady: vi.fn(() => true),
  };
}

describe('ChessUciServer', () => {
  let engine: ChessEngine;
  let server: ChessUciServer;
  let client: Client;
  let clientTransport: InMemoryTransport;

  beforeEach(() => {
    engine = createStubEngine();
    const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
    clientTransport = clientSide;
    client = new Client({ name: 'test-client', version: '1.0.0' });
    server = new ChessUciServer({
      settings: getDefaultSettings('linux'),
      logger: createSilentLogger(),
      engine,
      transport: serverSide,
    });
  });

  afterEach(async () => {
    await server.stop();
  });

  it('should start the engine before serving tools', async () => {
    await server.start();
    await client.connect(clientTransport);

    const result = await client.callTool({ name: 'get_best_move', arguments: {} });

    expect(engine.start).toHaveBeenCalledTimes(1);
    expect(server.getIsRunning()).toBe(true);
    expect(server.getEngine()).toBe(engine);
    expect(result.isError).toBeFalsy();
  });

  it('should refuse to start twice', async () => {
    await server.start();

    await expect(server.start()).rejects.toThrow('Server is already running');
  });

  it('should propagate engine start failures', async () => {
    vi.mocked(engine.start).mockRejectedValueOnce(new HandshakeError('no uciok'));

    await expect(server.start()).rejects.toThrow('Engine handshake failed: no uciok');
    expect(server.getIsRunning()).toBe(false);
    expect(server.getEngine()).toBeNull();
  });

  it('should stop the engine once across repeated stops', async () => {
    await server.start();

    await Promise.all([server.stop(), server.stop()]);
    await server.stop();

    expect(engine.stop).toHaveBeenCalledTimes(1);
    expect(server.getIsRunning()).toBe(false);
  });

  it('should stop an engine that is still starting', async () => {
    let finishStart: () => void = () => {};
    vi.mocked(engine.start).mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          finishStart = resolve;
        })
    );

    const starting = server.start().catch((error: unknown) => error);
    await server.stop();

    expect(engine.stop).toHaveBeenCalledTimes(1);
    expect(server.getEngine()).toBeNull();

    finishStart();

    expect(await starting).toEqual(new Error('Server was stopped during start'));
    expect(server.getIsRunning()).toBe(false);
    await expect(server.start()).rejects.toThrow('Server is already running');
  });

  it('should notify close listeners when the client disconnects', async () => {
    const onClose = vi.fn();
    server.onClose(onClose);
    await server.start();
    await client.connect(clientTransport);

    await client.close();

    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it('should not notify close listeners for its own shutdown', async () => {
    const onClose = vi.fn();
    server.onClose(onClose);
    await server.start();

    await server.stop();

    expect(onClose).not.toHaveBeenCalled();
  });
});
