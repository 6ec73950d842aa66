/**
 * Shared fixtures for gateway tests
 */
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { MockAgent, type MockPool } from 'undici';
import { createLogger } from '@apigw/logger';
import { buildApp } from '../src/app.mjs';
import { loadConfig, type GatewayConfig } from '../src/config.mjs';
import type { RedisClients } from '../src/redis.mjs';

export const FIXTURES = fileURLToPath(new URL('./fixtures/', import.meta.url));
export const ERP_ORIGIN = 'http://erp.internal:8020';
export const logger = createLogger({ level: 'silent' });

export function testConfig(overrides: Record<string, string> = {}): GatewayConfig {
  return loadConfig({
    ENDPOINTS_DIR: path.join(FIXTURES, 'endpoints'),
    ENVIRONMENTS_DIR: path.join(FIXTURES, 'environments'),
    LOG_LEVEL: 'silent',
    PUBLIC_BASE_URL: 'https://gw.example.com',
    LOCK_MAX_WAIT_MS: '2000',
    LOCK_POLL_INTERVAL_MS: '10',
    ...overrides,
  });
}

export async function createTestApp(options: { config?: GatewayConfig; redis?: RedisClients } = {}) {
  const agent = new MockAgent();
  agent.disableNetConnect();
  const app = await buildApp({
    config: options.config ?? testConfig(),
    logger,
    dispatcher: agent,
    redis: options.redis,
  });
  await app.ready();
  return { app, agent, erp: agent.get<MockPool>(ERP_ORIGIN) };
}

/**
 * Walk `value` along object keys and array indexes
 */
export function pick(value: unknown, ...keys: (string | number)[]): unknown {
  let current = value;
  for (const key of keys) {
    if (typeof key === 'number' && Array.isArray(current)) {
      current = current[key];
    } else if (typeof key === 'string' && typeof current === 'object' && current !== null && !Array.isArray(current)) {
      current = Object.getOwnPropertyDescriptor(current, key)?.value;
    } else {
      return undefined;
    }
  }
  return current;
}
