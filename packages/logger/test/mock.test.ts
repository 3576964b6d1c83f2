import { describe, expect, it } from 'vitest';
import { createMockLogger } from '../src/mock.js';

describe('createMockLogger', () => {
  it('records calls', () => {
    const logger = createMockLogger();

    logger.info('json_validated', { valid: true });

    expect(logger.info).toHaveBeenCalledWith('json_validated', { valid: true });
  });

  it('records calls made through children', () => {
    const logger = createMockLogger();
    const child = logger.child({ json: 'Signup' });

    child.warn('translations_missing', { locales: ['xx'] });

    expect(logger.child).toHaveBeenCalledWith({ json: 'Signup' });
    expect(child).toBe(logger);
    expect(logger.warn).toHaveBeenCalledWith('translations_missing', { locales: ['xx'] });
  });

  it('resolves flush()', async () => {
    const logger = createMockLogger();
    await expect(logger.flush()).resolves.toBeUndefined();
  });
});
