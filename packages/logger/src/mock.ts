/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types';

export interface MockLogger extends Logger {
  child: Mock<(metadata: Record<string, unknown>) => Logger>;
  debug: Mock<(event_type: string, metadata?: Record<string, unknown>) => void>;
  info: Mock<(event_type: string, metadata?: Record<string, unknown>) => void>;
  warn: Mock<(event_type: string, metadata?: Record<string, unknown>) => void>;
  error: Mock<(event_type: string, metadata?: Record<string, unknown>) => void>;
  fatal: Mock<(event_type: string, metadata?: Record<string, unknown>) => void>;
  flush: Mock<() => Promise<void>>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@tessera/logger/mock';
 *
 * const logger = createMockLogger();
 * const env = new Environment({ logger });
 *
 * env.render('page.html', {});
 *
 * expect(logger.debug).toHaveBeenCalledWith('render_completed', expect.objectContaining({
 *   template: 'page.html',
 * }));
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    // child() returns a new mock logger that also has spy functions
    child: vi.fn((_metadata: Record<string, unknown>): Logger => createMockLogger()),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    flush: vi.fn(async (): Promise<void> => undefined),
  };
}
