import type Database from 'better-sqlite3';
import type { Config } from '../shared/config.js';
import { systemClock, type Clock } from '../shared/clock.js';
import { SourceStateRegistry } from '../resilience/registry.js';
import { createAdapter } from '../source/adapters.js';
import { Processor } from '../processor/processor.js';
import { HttpVerifier } from '../processor/verifier.js';
import { HttpContentApi, type ContentApi } from '../publish/apiClient.js';
import { Publisher } from '../publish/publisher.js';
import { RetryQueue } from '../queue/retryQueue.js';
import { Orchestrator } from './orchestrator.js';

export interface RuntimeOptions {
  clock?: Clock;
  fetchImpl?: typeof fetch;
  api?: ContentApi;
}

export interface Runtime {
  orchestrator: Orchestrator;
  registry: SourceStateRegistry;
  queue: RetryQueue;
  publisher: Publisher;
  api: ContentApi;
}

/** Wire every collaborator from configuration. */
export function createRuntime(config: Config, db: Database.Database, options: RuntimeOptions = {}): Runtime {
  const clock = options.clock ?? systemClock;
  const fetchImpl = options.fetchImpl ?? fetch;

  const registry = new SourceStateRegistry(config.sources, config.rate_limit, clock);
  const adapters = config.sources
    .filter((source) => source.enabled)
    .map((source) =>
      createAdapter(source, {
        guard: registry.guardFor(source.name),
        clock,
        fetchTimeoutMs: config.fetch.timeout_ms,
        userAgent: config.fetch.user_agent,
        fetchImpl,
      }),
    );

  const verifier = new HttpVerifier(config.verifier, fetchImpl);
  const processor = new Processor({
    keywords: config.processor.keywords,
    clock,
    verifier: verifier.isConfigured() ? verifier : undefined,
  });

  const api = options.api ?? new HttpContentApi(config.api, fetchImpl);
  const queue = new RetryQueue(db, config.retry.delays_ms);
  const publisher = new Publisher(api, queue, db);

  const orchestrator = new Orchestrator({
    config,
    db,
    adapters,
    registry,
    processor,
    publisher,
    queue,
    api,
    clock,
  });

  return { orchestrator, registry, queue, publisher, api };
}
