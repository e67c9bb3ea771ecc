#!/usr/bin/env tsx
import { runCli } from './cli';
import { createLogger } from './services/logger';
import { ExitCode } from '../shared/types/lifecycle';

const log = createLogger('Main');

/** Grace period for stdout to drain before a forced exit (ms) */
const EXIT_GRACE_MS = 2_000;

// ─── Global error handlers ───
process.on('unhandledRejection', (reason, promise) => {
  log.error('Unhandled promise rejection:', { reason, promise });
});

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception:', error);
  // Don't exit: the agent keeps running
});

runCli(process.argv.slice(2))
  .catch((err: unknown) => {
    log.error('Fatal error:', err);
    return ExitCode.FAILURE;
  })
  .then((code) => {
    process.exitCode = code;
    // Stray clipboard helper processes must not keep us alive
    setTimeout(() => process.exit(code), EXIT_GRACE_MS).unref();
  });
