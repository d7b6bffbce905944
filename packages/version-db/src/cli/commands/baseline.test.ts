/**
 * Baseline command tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { createTestCatalog, createTestContext, type TestCatalog } from '../../__tests__/utils/catalog.js';
import { EXIT_CODES } from '../lib/context.js';
import { runBaselineGet } from './baseline.js';

describe('runBaselineGet', () => {
  let catalog: TestCatalog;

  beforeEach(async () => {
    catalog = await createTestCatalog();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await catalog.cleanup();
  });

  it('prints the baseline version of a port', async () => {
    await catalog.writeBaseline({ foo: { baseline: '1.0.0', 'port-version': 1 } });

    const exitCode = await runBaselineGet('foo', createTestContext(catalog));

    expect(exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(console.log).toHaveBeenCalledWith('foo 1.0.0#1');
  });

  it('prints JSON in baseline file form', async () => {
    await catalog.writeBaseline({ foo: { baseline: '2024-01-02', 'port-version': 0 } });

    await runBaselineGet('foo', createTestContext(catalog, { json: true }));

    expect(console.log).toHaveBeenCalledWith(
      '{"port":"foo","baseline":"2024-01-02","port-version":0}'
    );
  });

  it('fails for a port missing from the baseline', async () => {
    await catalog.writeBaseline({});

    const exitCode = await runBaselineGet('bar', createTestContext(catalog));

    expect(exitCode).toBe(EXIT_CODES.ERRORS);
    expect(console.error).toHaveBeenCalledWith(
      `Error: bar has no baseline in ${join(catalog.versionsDir, 'baseline.json')}`
    );
  });

  it('exits with DATA_INTEGRITY_ERROR for a malformed baseline', async () => {
    await catalog.writeVersionsFile('baseline.json', '{"default":{"foo":{"version":"1.0.0"}}}');

    const exitCode = await runBaselineGet('foo', createTestContext(catalog));

    expect(exitCode).toBe(EXIT_CODES.DATA_INTEGRITY_ERROR);
  });
});
