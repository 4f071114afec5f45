import { describe, expect, it, vi } from 'vitest';

describe('shared logger', () => {
  it('attaches context via withContext', async () => {
    vi.resetModules();
    const { logger } = await import('@officehours/shared');

    const child = logger.withContext({ queueId: 'cs101', email: 'alice@example.edu' });
    const grandchild = child.withContext({ traceId: 'trace-1' });

    expect(child.bindings()).toMatchObject({ queueId: 'cs101', email: 'alice@example.edu' });
    expect(grandchild.bindings()).toMatchObject({
      queueId: 'cs101',
      email: 'alice@example.edu',
      traceId: 'trace-1'
    });
  });
});
