import { describe, it, expect } from 'vitest';
import { quietLogger } from './helpers';

describe('PipelineLogger', () => {
  it('records a timing for each completed phase', () => {
    const logger = quietLogger();

    logger.logPhaseStart('dim_products');
    const duration = logger.logPhaseEnd('dim_products', 12);

    const [timing] = logger.getTimings();
    expect(timing.phase).toBe('dim_products');
    expect(timing.records).toBe(12);
    expect(timing.duration_ms).toBe(duration);
    expect(duration).toBeGreaterThanOrEqual(0);
  });

  it('gives children their own timings', () => {
    const parent = quietLogger();
    const child = parent.child('silver_load');

    child.logPhaseStart('crm_cust_info');
    child.logPhaseEnd('crm_cust_info');

    expect(child.processName).toBe('silver_load');
    expect(child.getTimings()).toHaveLength(1);
    expect(parent.getTimings()).toHaveLength(0);
  });
});
