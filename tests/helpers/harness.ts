// ============================================================
// Full-stack harness: real services over a paper gateway,
// in-memory repositories and a manual clock
// ============================================================

import { z } from 'zod';
import { createServices } from '../../src/app.js';
import { loadAppConfig } from '../../src/config/env.js';
import { createMemoryRepositories } from '../../src/database/memoryStore.js';
import { emptyRiskState } from '../../src/database/repositories.js';
import { PaperGateway } from '../../src/execution/paperGateway.js';
import type { ApiResponse } from '../../src/api/handlers.js';
import { FakeClock, StubMarketData } from './fakes.js';

export function createHarness(env: NodeJS.ProcessEnv = {}, clock: FakeClock = new FakeClock()) {
  const market = new StubMarketData()
    .set('BTC', 50_000, { szDecimals: 5 })
    .set('ETH', 2_000)
    .set('SOL', 100, { szDecimals: 2 })
    .set('TSLA', 250, { dex: 'xyz', szDecimals: 3, maxLeverage: 10 });
  const gateway = new PaperGateway(market, 10_000);
  const repos = createMemoryRepositories(emptyRiskState('2026-03-02'));
  const notifications: string[] = [];

  const config = loadAppConfig({ WEBHOOK_SECRET: 'test-secret', API_TOKEN: 'test-token', ...env });
  const services = createServices(config, repos, {
    gateway,
    clock,
    notify: async (message) => {
      notifications.push(message);
    },
  });

  return { ...services, gateway, market, clock, notifications };
}

const responseBody = z
  .object({
    success: z.boolean(),
    reason: z.string().optional(),
    error: z.string().optional(),
  })
  .passthrough();

/** JSON body of a handler response, with the common fields typed. */
export function bodyOf(response: ApiResponse) {
  return responseBody.parse(response.body);
}
