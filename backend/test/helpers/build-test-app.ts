import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { buildTestInfra } from './build-test-deps';
import { buildTestConfig } from './test-config';
import { createTestClock, type TestClock } from './test-clock';

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Seed is OFF by default.
 * - In-memory infra only; the returned stores/queue are the ones the app uses.
 */
export async function buildTestApp(opts: { config?: AppConfig; clock?: TestClock } = {}) {
  const clock = opts.clock ?? createTestClock();
  const config = opts.config ?? buildTestConfig();
  const stores = buildTestInfra(clock);

  const built = await buildApp(config, {
    infra: stores.infra,
    overrides: { clock: clock.clock },
  });

  return {
    app: built.app,
    deps: built.deps,
    ...stores,
    clock,
    close: built.close,
  };
}

export function readJson<T>(res: { json: () => unknown }): T {
  // Fastify inject returns `any` for json() in many typings.
  return res.json() as T;
}

export type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};
