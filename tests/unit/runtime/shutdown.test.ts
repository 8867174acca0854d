import type { Client } from 'discord.js';
import type { Server } from 'node:http';
import { beforeEach, describe, expect, it, vi } from 'vitest';

const processOnceMock = vi.spyOn(process, 'once').mockImplementation(() => process);
const processOnMock = vi.spyOn(process, 'on').mockImplementation(() => process);
const processExitMock = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never);

const { stopHealthServer, logger } = vi.hoisted(() => ({
  stopHealthServer: vi.fn(),
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('../../../src/server/healthServer', () => ({
  stopHealthServer,
}));

vi.mock('../../../src/shared/logging/logger', () => ({
  logger,
}));

import { registerShutdownHooks, resetShutdownState } from '../../../src/core/runtime/shutdown';
import { HistoryStore } from '../../../src/core/awareness/historyStore';

function fakeStore(close: () => void): HistoryStore {
  return {
    recordParticipant: vi.fn().mockResolvedValue(undefined),
    appendMessage: vi.fn().mockResolvedValue(undefined),
    recentTranscript: vi.fn().mockResolvedValue([]),
    getParticipant: vi.fn().mockResolvedValue(null),
    close,
  };
}

function registeredOnce(event: string): () => void {
  const registration = processOnceMock.mock.calls.find((call) => call[0] === event);
  if (!registration) throw new Error(`no ${event} handler registered`);
  return registration[1] as () => void;
}

describe('registerShutdownHooks', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    processOnceMock.mockClear();
    processOnMock.mockClear();
    processExitMock.mockClear();
    stopHealthServer.mockResolvedValue(undefined);
    resetShutdownState();
  });

  it('destroys the client, stops the health server and closes the store on SIGTERM', async () => {
    const client = { destroy: vi.fn().mockResolvedValue(undefined) };
    const close = vi.fn();
    const healthServer = {};

    registerShutdownHooks({
      client: client as unknown as Client,
      store: fakeStore(close),
      healthServer: healthServer as Server,
    });

    registeredOnce('SIGTERM')();
    await new Promise((resolve) => setImmediate(resolve));

    expect(client.destroy).toHaveBeenCalledTimes(1);
    expect(stopHealthServer).toHaveBeenCalledWith(healthServer);
    expect(close).toHaveBeenCalledTimes(1);
    expect(processExitMock).toHaveBeenCalledWith(0);
  });

  it('keeps shutting down when one step fails', async () => {
    const client = { destroy: vi.fn().mockRejectedValue(new Error('gateway gone')) };
    const close = vi.fn();

    registerShutdownHooks({
      client: client as unknown as Client,
      store: fakeStore(close),
      healthServer: {} as Server,
    });

    registeredOnce('SIGINT')();
    await new Promise((resolve) => setImmediate(resolve));

    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ error: expect.any(Error) }),
      'Discord client destroy failed during shutdown',
    );
    expect(close).toHaveBeenCalledTimes(1);
    expect(processExitMock).toHaveBeenCalledWith(0);
  });
});
