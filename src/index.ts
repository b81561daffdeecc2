#!/usr/bin/env node
import { isMainThread, threadId } from 'node:worker_threads';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadEngineConfig } from './engine/config.js';
import { getErrorMessage } from './lib/errors.js';
import { createServer } from './server.js';

const SHUTDOWN_SIGNALS = ['SIGTERM', 'SIGINT'] as const;
const FATAL_SHUTDOWN_REASON = 'fatal error';
type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];

let activeServer: ReturnType<typeof createServer> | undefined;
let shutdownPromise: Promise<void> | undefined;

function assertMainThread(): void {
  if (isMainThread) {
    return;
  }
  throw new Error(
    `toolstack-mcp must run on the main thread (received worker thread ${String(threadId)}).`
  );
}

async function main(): Promise<void> {
  assertMainThread();
  const config = loadEngineConfig();
  activeServer = createServer({ config });
  const transport = new StdioServerTransport();
  transport.onclose = () => {
    void shutdown(0, 'transport closed');
  };
  await activeServer.connect(transport);
}

async function shutdown(exitCode: number, reason: string): Promise<void> {
  if (shutdownPromise) {
    return shutdownPromise;
  }

  shutdownPromise = (async () => {
    let resolvedCode = exitCode;

    try {
      await activeServer?.close();
    } catch (err) {
      resolvedCode = 1;
      console.error(`Shutdown failure (${reason}): ${getErrorMessage(err)}`);
    } finally {
      process.exit(resolvedCode);
    }
  })();

  return shutdownPromise;
}

function registerShutdownSignal(signal: ShutdownSignal): void {
  process.once(signal, () => {
    void shutdown(0, signal);
  });
}

for (const signal of SHUTDOWN_SIGNALS) {
  registerShutdownSignal(signal);
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  void shutdown(1, FATAL_SHUTDOWN_REASON);
});
