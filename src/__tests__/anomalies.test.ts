import { describe, expect, it } from 'vitest';
import {
  detectCostAnomalies,
  findAnomalies,
  calculateAverages,
  todayWindow,
  baselineWindow,
} from '../anomalies/index.js';
import { createStaticCostSource, type CostQuerySource } from '../sources/index.js';
import {
  AuthenticationExpiredError,
  createRunContext,
  ServiceAuthenticationError,
  ServiceHttpError,
  ValidationError,
} from '../runner/index.js';
import type { CostRecord, CostWindow } from '../contracts/index.js';

const REF = '2024-06-15';

function context() {
  return createRunContext({ silent: true, sleep: async () => {}, correlationId: 'test-run' });
}

function row(subscription_id: string, resource_group: string, service_name: string, cost: number, date: string) {
  return { subscription_id, resource_group, service_name, cost, date };
}

function record(resource_group: string, service_name: string, cost: number, date = REF): CostRecord {
  return { subscription_id: 'sub-a', resource_group, service_name, cost, date };
}

// ---------------------------------------------------------------------------
// Windows
// ---------------------------------------------------------------------------

describe('cost windows', () => {
  it('uses the reference date alone for today', () => {
    expect(todayWindow('2024-06-15T13:45:00Z')).toEqual({ from: '2024-06-15', to: '2024-06-15' });
  });

  it('uses the seven preceding days for the baseline', () => {
    expect(baselineWindow(REF)).toEqual({ from: '2024-06-08', to: '2024-06-14' });
  });

  it('crosses month boundaries in leap years', () => {
    expect(baselineWindow('2024-03-01')).toEqual({ from: '2024-02-23', to: '2024-02-29' });
  });
});

// ---------------------------------------------------------------------------
// Pure detection
// ---------------------------------------------------------------------------

describe('calculateAverages / findAnomalies', () => {
  it('averages cost per resource group and service', () => {
    const averages = calculateAverages([
      record('RG1', 'Svc1', 80),
      record('RG1', 'Svc1', 100),
      record('RG1', 'Svc2', 10),
    ]);
    expect(averages.get(JSON.stringify(['RG1', 'Svc1']))).toBe(90);
    expect(averages.get(JSON.stringify(['RG1', 'Svc2']))).toBe(10);
    expect(averages.size).toBe(2);
  });

  it('flags only costs strictly above average * threshold', () => {
    const averages = calculateAverages([record('RG1', 'Svc1', 100)]);
    const at = findAnomalies([record('RG1', 'Svc1', 150)], averages, 1.5);
    const above = findAnomalies([record('RG1', 'Svc1', 150.01)], averages, 1.5);
    expect(at).toEqual([]);
    expect(above).toHaveLength(1);
  });

  it('computes variance_percent exactly', () => {
    const averages = calculateAverages([record('RG1', 'Svc1', 40)]);
    const [anomaly] = findAnomalies([record('RG1', 'Svc1', 100)], averages, 1.5);
    expect(anomaly.variance_percent).toBe(150);
    expect(anomaly.actual_cost).toBe(100);
    expect(anomaly.average_cost).toBe(40);
  });

  it('never flags keys with zero or missing baseline', () => {
    const averages = calculateAverages([record('RG2', 'Svc2', 0), record('RG2', 'Svc2', 0)]);
    const anomalies = findAnomalies(
      [record('RG2', 'Svc2', 500), record('RG3', 'Svc3', 10_000)],
      averages,
      1.5,
    );
    expect(anomalies).toEqual([]);
  });

  it('does not confuse keys that share a joined string', () => {
    const averages = calculateAverages([record('a-b', 'c', 1)]);
    expect(findAnomalies([record('a', 'b-c', 100)], averages, 1.5)).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Multi-subscription detection
// ---------------------------------------------------------------------------

describe('detectCostAnomalies', () => {
  it('flags a 150 spend against a 90 average (end to end)', async () => {
    const source = createStaticCostSource([
      row('sub-a', 'RG1', 'Svc1', 80, '2024-06-10'),
      row('sub-a', 'RG1', 'Svc1', 100, '2024-06-12'),
      row('sub-a', 'RG1', 'Svc1', 90, '2024-06-14'),
      row('sub-a', 'RG1', 'Svc1', 150, REF),
    ]);

    const report = await detectCostAnomalies(['sub-a'], {
      source,
      context: context(),
      threshold: 1.5,
      referenceDate: REF,
    });

    expect(report.total_anomalies).toBe(1);
    expect(report.anomalies[0]).toMatchObject({
      subscription_id: 'sub-a',
      resource_group: 'RG1',
      service_name: 'Svc1',
      actual_cost: 150,
      average_cost: 90,
      date: REF,
    });
    expect(report.anomalies[0].variance_percent).toBeCloseTo(66.67, 2);
    expect(report.total_excess_spend).toBe(60);
    expect(report.threshold).toBe(1.5);
    expect(report.subscriptions_analyzed).toBe(1);
    expect(report.subscriptions_failed).toEqual([]);
  });

  it('queries the today window then the baseline window', async () => {
    const windows: CostWindow[] = [];
    const source: CostQuerySource = {
      async queryCosts(_id, window) {
        windows.push(window);
        return [];
      },
    };

    await detectCostAnomalies(['sub-a'], { source, context: context(), referenceDate: REF });
    expect(windows).toEqual([
      { from: '2024-06-15', to: '2024-06-15' },
      { from: '2024-06-08', to: '2024-06-14' },
    ]);
  });

  it('ignores baseline rows outside the window', async () => {
    const source = createStaticCostSource([
      row('sub-a', 'RG1', 'Svc1', 1, '2024-06-01'),
      row('sub-a', 'RG1', 'Svc1', 100, '2024-06-14'),
      row('sub-a', 'RG1', 'Svc1', 140, REF),
    ]);

    const report = await detectCostAnomalies(['sub-a'], { source, context: context(), referenceDate: REF });
    expect(report.total_anomalies).toBe(0);
  });

  it('sorts by variance descending and keeps fetch order on ties', async () => {
    const source = createStaticCostSource([
      row('sub-a', 'RG1', 'Svc1', 10, '2024-06-14'),
      row('sub-a', 'RG1', 'Svc1', 20, REF), // +100%
      row('sub-a', 'RG2', 'Svc1', 10, '2024-06-14'),
      row('sub-a', 'RG2', 'Svc1', 50, REF), // +400%
      row('sub-b', 'RG9', 'Svc9', 5, '2024-06-13'),
      row('sub-b', 'RG9', 'Svc9', 10, REF), // +100%
    ]);

    const report = await detectCostAnomalies(['sub-a', 'sub-b'], {
      source,
      context: context(),
      referenceDate: REF,
    });

    expect(report.anomalies.map((a) => [a.subscription_id, a.resource_group])).toEqual([
      ['sub-a', 'RG2'],
      ['sub-a', 'RG1'],
      ['sub-b', 'RG9'],
    ]);
    expect(report.total_excess_spend).toBe(55);
  });

  it('rounds total_excess_spend only at the end', async () => {
    const source = createStaticCostSource([
      row('sub-a', 'RG1', 'Svc1', 1, '2024-06-10'),
      row('sub-a', 'RG1', 'Svc1', 1, '2024-06-11'),
      row('sub-a', 'RG1', 'Svc1', 2, '2024-06-12'),
      row('sub-a', 'RG1', 'Svc1', 10, REF),
    ]);

    const report = await detectCostAnomalies(['sub-a'], { source, context: context(), referenceDate: REF });
    expect(report.anomalies[0].average_cost).toBeCloseTo(4 / 3, 10);
    expect(report.total_excess_spend).toBe(8.67);
  });

  it('isolates a failing subscription and keeps analysing the rest', async () => {
    const healthy = createStaticCostSource([
      row('sub-ok', 'RG1', 'Svc1', 10, '2024-06-14'),
      row('sub-ok', 'RG1', 'Svc1', 30, REF),
    ]);
    const source: CostQuerySource = {
      async queryCosts(id, window) {
        if (id === 'sub-bad') throw new ServiceHttpError(403, 'AuthorizationFailed');
        return healthy.queryCosts(id, window);
      },
    };
    const ctx = context();

    const report = await detectCostAnomalies(['sub-bad', 'sub-ok'], {
      source,
      context: ctx,
      referenceDate: REF,
    });

    expect(report.subscriptions_failed).toEqual(['sub-bad']);
    expect(report.subscriptions_analyzed).toBe(1);
    expect(report.total_anomalies).toBe(1);
    const failure = ctx.logger.entries().find((e) => e.action === 'anomalies.subscription_failed');
    expect(failure?.subscription_id).toBe('sub-bad');
    expect(failure?.level).toBe('error');
  });

  it('retries transient failures per subscription', async () => {
    let calls = 0;
    const inner = createStaticCostSource([
      row('sub-a', 'RG1', 'Svc1', 10, '2024-06-14'),
      row('sub-a', 'RG1', 'Svc1', 30, REF),
    ]);
    const source: CostQuerySource = {
      async queryCosts(id, window) {
        calls++;
        if (calls === 1) throw new ServiceHttpError(503, 'Service Unavailable');
        return inner.queryCosts(id, window);
      },
    };

    const report = await detectCostAnomalies(['sub-a'], { source, context: context(), referenceDate: REF });
    expect(calls).toBe(3);
    expect(report.total_anomalies).toBe(1);
  });

  it('skips malformed cost rows and keeps the rest of the batch', async () => {
    const source = createStaticCostSource([
      row('sub-a', 'RG1', 'Svc1', 10, '2024-06-14'),
      { subscription_id: 'sub-a', resource_group: 'RG1', service_name: 'Svc1', cost: 'lots', date: '2024-06-13' },
      { subscription_id: 'sub-a', resource_group: 'RG1', service_name: 'Svc1', cost: '30.00', date: REF },
    ]);
    const ctx = context();

    const report = await detectCostAnomalies(['sub-a'], { source, context: ctx, referenceDate: REF });

    expect(report.subscriptions_failed).toEqual([]);
    expect(report.anomalies).toHaveLength(1);
    expect(report.anomalies[0]).toMatchObject({ actual_cost: 30, average_cost: 10, variance_percent: 200 });
    const skipped = ctx.logger.entries().filter((e) => e.action === 'records.skipped');
    expect(skipped).toHaveLength(1);
    expect(skipped[0].level).toBe('warn');
    expect(skipped[0].subscription_id).toBe('sub-a');
    expect(skipped[0].message).toBe('Skipping malformed row 1 in cost records');
  });

  it('rejects the whole run when credentials have expired', async () => {
    const source: CostQuerySource = {
      async queryCosts() {
        throw new ServiceAuthenticationError('token expired');
      },
    };

    await expect(
      detectCostAnomalies(['sub-a', 'sub-b'], { source, context: context(), referenceDate: REF }),
    ).rejects.toBeInstanceOf(AuthenticationExpiredError);
  });

  it('defaults missing resource group, service and cost', async () => {
    const source = createStaticCostSource([
      { subscription_id: 'sub-a', cost: 10, date: '2024-06-14' },
      { subscription_id: 'sub-a', cost: null, date: '2024-06-13' },
      { subscription_id: 'sub-a', cost: 25, date: REF },
    ]);

    const report = await detectCostAnomalies(['sub-a'], { source, context: context(), referenceDate: REF });
    expect(report.anomalies).toHaveLength(1);
    expect(report.anomalies[0]).toMatchObject({
      resource_group: 'Unassigned',
      service_name: 'Unknown',
      average_cost: 5,
      variance_percent: 400,
    });
  });

  it('rejects an empty subscription list', async () => {
    const source = createStaticCostSource([]);
    await expect(detectCostAnomalies([], { source, context: context() })).rejects.toBeInstanceOf(ValidationError);
  });

  it('flags any positive spend over a positive baseline at threshold 0', async () => {
    const source = createStaticCostSource([
      row('sub-a', 'RG1', 'Svc1', 100, '2024-06-14'),
      row('sub-a', 'RG1', 'Svc1', 1, REF),
      row('sub-a', 'RG2', 'Svc1', 100, '2024-06-14'),
      row('sub-a', 'RG2', 'Svc1', 0, REF),
    ]);

    const report = await detectCostAnomalies(['sub-a'], {
      source,
      context: context(),
      threshold: 0,
      referenceDate: REF,
    });
    expect(report.threshold).toBe(0);
    expect(report.anomalies.map((a) => a.resource_group)).toEqual(['RG1']);
    expect(report.anomalies[0].variance_percent).toBeCloseTo(-99, 10);
  });

  it('rejects a negative threshold', async () => {
    const source = createStaticCostSource([]);
    await expect(
      detectCostAnomalies(['sub-a'], { source, context: context(), threshold: -1 }),
    ).rejects.toThrow('Invalid anomaly threshold: -1');
  });
});
