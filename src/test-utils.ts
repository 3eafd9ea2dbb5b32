import { join } from 'node:path';
import { mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { vi, type Mock } from 'vitest';
import type { Logger } from './logger.js';

export function makeTmpDir(): string {
  const dir = join(tmpdir(), `sqldesk-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export interface TestLogger extends Logger {
  info: Mock;
  warn: Mock;
  error: Mock;
}

export function makeTestLogger(): TestLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
