#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getRingfeedDir, resolvePath } from '../shared/utils.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { systemClock } from '../shared/clock.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { clearCursor, listCursors } from '../source/cursorDb.js';
import { countPublished } from '../publish/ledgerDb.js';
import { HttpContentApi } from '../publish/apiClient.js';
import { RetryQueue } from '../queue/retryQueue.js';
import { createRuntime } from '../engine/runtime.js';
import { startStatusServer } from '../api/server.js';

const program = new Command();

program
  .name('ringfeed')
  .description('Resilient multi-source collector for a wrestling encyclopedia')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the config file and database')
  .action(async () => {
    const configPath = path.join(getRingfeedDir(), 'config.yaml');
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const { db } = await openDatabase();
    log(`✓ database ready (${listCursors(db).length} source cursors)`);
    closeDb();
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config, database and content API reachability')
  .action(async () => {
    try {
      const { config, db } = await openDatabase();
      log('Config: ok');
      log(`DB: ok (${resolvePath(config.db.path)})`);
      const published = countPublished(db);
      log(`Published: ${published.wrestler} wrestlers, ${published.event} events, ${published.article} articles`);

      const api = new HttpContentApi(config.api);
      const healthy = await api.health();
      log(`Content API: ${healthy ? 'ok' : 'unreachable'} (${config.api.base_url})`);
      if (!config.api.token) log('Content API token: (unset)');
      if (!healthy) process.exitCode = 1;
    } catch (err) {
      log(`Config/DB: error (${describe(err)})`);
      process.exitCode = 1;
    } finally {
      closeDb();
    }
  });

// === sources ===
program
  .command('sources')
  .description('List configured sources and their resume cursors')
  .option('--reset <name>', 'Forget the cursor of one source so it starts over')
  .action(async (opts: { reset?: string }) => {
    const { config, db } = await openDatabase();
    if (opts.reset !== undefined) {
      log(clearCursor(db, opts.reset) ? `✓ cursor of ${opts.reset} cleared` : `No cursor stored for ${opts.reset}`);
    }
    const cursors = new Map(listCursors(db).map((row) => [row.source, row]));
    for (const source of config.sources) {
      const cursor = cursors.get(source.name);
      log(
        `${source.enabled ? '●' : '○'} ${source.name.padEnd(16)} ${source.kind.padEnd(10)} ` +
          `${source.rate_limit.per_minute}/min ${source.rate_limit.per_hour}/h  ` +
          `cursor: ${cursor?.cursor ?? '-'}`,
      );
    }
    closeDb();
  });

// === run ===
program
  .command('run')
  .description('Run collection cycles until interrupted')
  .option('-n, --cycles <n>', 'Stop after n cycles')
  .option('--no-server', 'Do not start the status server')
  .action(async (opts: { cycles?: string; server: boolean }) => {
    const { config, db } = await openDatabase();
    const maxCycles = opts.cycles !== undefined ? Number(opts.cycles) : undefined;
    if (maxCycles !== undefined && (!Number.isInteger(maxCycles) || maxCycles < 1)) {
      log('--cycles must be a positive integer');
      process.exitCode = 1;
      closeDb();
      return;
    }

    const runtime = createRuntime(config, db);
    const controller = new AbortController();
    const stop = () => {
      logger.info('Shutting down...');
      controller.abort();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    const server = opts.server
      ? startStatusServer({
          config,
          orchestrator: runtime.orchestrator,
          queue: runtime.queue,
          registry: runtime.registry,
          now: () => systemClock.now(),
        })
      : null;

    try {
      await runtime.orchestrator.run(controller.signal, { maxCycles });
    } finally {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
      await server?.close();
      closeDb();
    }
  });

// === queue ===
const queueCmd = program.command('queue').description('Inspect the retry queue');

queueCmd
  .command('list')
  .description('List pending retry tasks')
  .option('-l, --limit <n>', 'Max tasks', '50')
  .action(async (opts: { limit: string }) => {
    const { config, db } = await openDatabase();
    const queue = new RetryQueue(db, config.retry.delays_ms);
    const tasks = queue.listPending(Number(opts.limit) || 50);
    if (tasks.length === 0) log('No pending tasks.');
    for (const task of tasks) {
      log(
        `${task.id}  ${task.natural_key}  attempt ${task.attempts - task.schedule_base}/${queue.maxAttempts}  ` +
          `next ${new Date(task.next_retry_at).toISOString()}  ${task.last_error}`,
      );
    }
    closeDb();
  });

queueCmd
  .command('dead')
  .description('List dead-lettered tasks')
  .option('-l, --limit <n>', 'Max tasks', '50')
  .action(async (opts: { limit: string }) => {
    const { config, db } = await openDatabase();
    const queue = new RetryQueue(db, config.retry.delays_ms);
    const tasks = queue.listDeadLetters(Number(opts.limit) || 50);
    if (tasks.length === 0) log('No dead letters.');
    for (const task of tasks) {
      log(`${task.id}  ${task.natural_key}  after ${task.attempts} attempts  ${task.last_error}`);
    }
    closeDb();
  });

queueCmd
  .command('requeue <id>')
  .description('Put a dead-lettered task back on the retry schedule')
  .action(async (id: string) => {
    const { config, db } = await openDatabase();
    const queue = new RetryQueue(db, config.retry.delays_ms);
    const task = queue.requeue(id, systemClock.now());
    if (task) {
      log(`✓ ${task.natural_key} requeued`);
    } else {
      log(`No dead letter ${id}, or its entity already has a pending retry`);
      process.exitCode = 1;
    }
    closeDb();
  });

// === status ===
program
  .command('status')
  .description('Show queue depth and what has been published')
  .action(async () => {
    const { config, db } = await openDatabase();
    const queue = new RetryQueue(db, config.retry.delays_ms);
    const counts = queue.counts();
    if (counts.length === 0) log('Retry queue: empty');
    for (const row of counts) {
      log(`Retry queue: ${row.source} ${row.status} ${row.count}`);
    }
    const published = countPublished(db);
    log(`Published: ${published.wrestler} wrestlers, ${published.event} events, ${published.article} articles`);
    closeDb();
  });

async function openDatabase(): Promise<{ config: Config; db: Database.Database }> {
  const config = await loadConfig();
  const db = initDb(resolvePath(config.db.path));
  runMigrations(db);
  return { config, db };
}

function describe(err: unknown): string {
  if (err instanceof ConfigError) {
    const issues = err.details?.['errors'];
    if (Array.isArray(issues)) return `${err.message}: ${issues.join('; ')}`;
  }
  return errorMessage(err);
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  logger.error({ error: describe(err) }, 'Command failed');
  process.exitCode = 1;
});
