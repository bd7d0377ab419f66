import { vi } from 'vitest';
import type { Logger } from '@mcp-demo/shared';

export const FIXED_TIME = '2024-01-01T00:00:00.000Z';

export function fixedClock(): string {
  return FIXED_TIME;
}

export function createSilentLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

/**
 * products://list body after seeding an empty store with the sample products.
 */
export const SEEDED_PRODUCTS_JSON = [
  '[',
  '  {',
  '    "id": 1,',
  '    "code": "D42",',
  '    "price": 100,',
  `    "createdAt": "${FIXED_TIME}",`,
  `    "updatedAt": "${FIXED_TIME}",`,
  '    "deletedAt": null',
  '  },',
  '  {',
  '    "id": 2,',
  '    "code": "P99",',
  '    "price": 200,',
  `    "createdAt": "${FIXED_TIME}",`,
  `    "updatedAt": "${FIXED_TIME}",`,
  '    "deletedAt": null',
  '  }',
  ']',
].join('\n');
