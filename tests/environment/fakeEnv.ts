import { vi } from 'vitest';

import type { ExecutionEnvironment } from '../../src/environment/types.js';

/** Environment double whose methods are spies; override what a test needs. */
export function createFakeEnvironment(overrides: Partial<ExecutionEnvironment> = {}): ExecutionEnvironment {
  return {
    cwd: '/work',
    execute: vi.fn<ExecutionEnvironment['execute']>().mockResolvedValue(''),
    read: vi.fn<ExecutionEnvironment['read']>().mockResolvedValue(''),
    writeRange: vi.fn<ExecutionEnvironment['writeRange']>().mockResolvedValue(''),
    create: vi.fn<ExecutionEnvironment['create']>().mockResolvedValue(''),
    append: vi.fn<ExecutionEnvironment['append']>().mockResolvedValue(''),
    list: vi.fn<ExecutionEnvironment['list']>().mockResolvedValue([]),
    grep: vi.fn<ExecutionEnvironment['grep']>().mockResolvedValue(''),
    ...overrides,
  };
}
