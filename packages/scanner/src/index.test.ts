import { describe, it, expect } from 'vitest';
import * as scanner from './index';

describe('scanner package', () => {
  it('exports name', () => {
    expect(scanner.name).toBe('@leakscan/scanner');
  });

  it('exposes the pipeline building blocks', () => {
    expect(new scanner.IgnoreSet(['*.log']).isExcluded('debug.log')).toBe(true);
    expect(scanner.DEFAULT_RULES.length).toBeGreaterThan(0);
    expect(new scanner.LineScanner().previewLength).toBe(50);
    expect(new scanner.RetryPolicy().maxAttempts).toBe(2);
  });
});
