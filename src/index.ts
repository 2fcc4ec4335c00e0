#!/usr/bin/env node

import { MCPServer } from './server/MCPServer.js';
import { getConfig, validateConfig } from './utils/config.js';
import { logger } from './utils/logger.js';

interface RuntimeRecoveryState {
  windowStart: number;
  errorCount: number;
  degradedMode: boolean;
}

/** errno codes from OS-level failures that cannot be recovered from. */
const FATAL_ERRNO_CODES: ReadonlySet<string> = new Set([
  'ENOMEM',
  'ENOSPC',
  'EMFILE',
  'ENFILE',
]);

const RECOVERY_WINDOW_MS = 60_000;
const MAX_RECOVERABLE_ERRORS = 5;

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function isFatalError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const code = errorCode(error);
  if (code && FATAL_ERRNO_CODES.has(code)) return true;

  // V8 heap exhaustion
  return error instanceof RangeError && error.message.includes('allocation');
}

function formatUnknownError(input: unknown): string {
  if (input instanceof Error) {
    return `${input.name}: ${input.message}`;
  }

  try {
    return typeof input === 'string' ? input : JSON.stringify(input);
  } catch {
    return String(input);
  }
}

async function main() {
  try {
    const config = getConfig();
    if (config.logLevel) {
      logger.setLevel(config.logLevel);
    }
    logger.debug('Configuration loaded:', config);

    const validation = validateConfig(config);
    if (!validation.valid) {
      logger.error('Configuration validation failed:');
      validation.errors.forEach((error) => logger.error(`  - ${error}`));
      process.exit(1);
    }

    logger.info('Creating MCP server instance...');
    const server = new MCPServer(config);
    const runtimeRecovery: RuntimeRecoveryState = {
      windowStart: Date.now(),
      errorCount: 0,
      degradedMode: false,
    };

    const handleRuntimeFailure = (kind: 'uncaughtException' | 'unhandledRejection', reason: unknown) => {
      if (isFatalError(reason)) {
        logger.error(`[${kind}] FATAL unrecoverable error, forcing exit: ${formatUnknownError(reason)}`);
        process.exit(1);
      }

      const now = Date.now();
      if (now - runtimeRecovery.windowStart > RECOVERY_WINDOW_MS) {
        runtimeRecovery.windowStart = now;
        runtimeRecovery.errorCount = 0;
      }

      runtimeRecovery.errorCount += 1;

      logger.error(
        `[${kind}] Runtime failure captured (${runtimeRecovery.errorCount}/${MAX_RECOVERABLE_ERRORS}): ${formatUnknownError(reason)}`
      );

      if (!runtimeRecovery.degradedMode && runtimeRecovery.errorCount >= MAX_RECOVERABLE_ERRORS) {
        runtimeRecovery.degradedMode = true;
        server.enterDegradedMode(
          `Runtime failures reached ${runtimeRecovery.errorCount} within ${RECOVERY_WINDOW_MS}ms`
        );
      }
    };

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down...`);
      server
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed:', formatUnknownError(error));
          process.exit(1);
        });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
      handleRuntimeFailure('uncaughtException', error);
    });

    process.on('unhandledRejection', (reason) => {
      handleRuntimeFailure('unhandledRejection', reason);
    });

    logger.info('Starting MCP server...');
    await server.start();
    logger.info('MCP server is running. Press Ctrl+C to stop.');
  } catch (error) {
    logger.error('Failed to start MCP server:', formatUnknownError(error));
    if (error instanceof Error && error.stack) {
      logger.error('Error stack:', error.stack);
    }
    process.exit(1);
  }
}

void main();
