import { describe, it, expect } from 'vitest';
import { TestHarness, echoAction, failAction, greetingFlow, failingFlow } from '@deskpilot/core/test';
import { StatsAggregator } from '../src/aggregator';
import { toStatsReport } from '../src/report';

describe('StatsAggregator as a runner recorder', () => {
  it('counts the same runs the run log holds', async () => {
    const t = new TestHarness({ actions: [echoAction, failAction], flows: [greetingFlow, failingFlow] });
    const stats = new StatsAggregator();
    t.runner.addRecorder(stats);

    await t.run('greeting', { name: 'Ada' });
    await t.run('failing');
    await t.run('greeting', { name: 'Grace' });

    const report = toStatsReport(stats.snapshot());
    expect(report.totals.total).toBe((await t.runLog.list()).length);
    expect(report.totals).toEqual({ total: 3, succeeded: 2, failed: 1, skipped: 0, successRate: 2 / 3 });
    expect(report.failureCounts).toEqual({ NOT_FOUND: 1 });
    expect(report.selectors).toEqual([
      { selector: '#broken', successes: 0, failures: 1, successRate: 0 },
      { selector: '#ok', successes: 1, failures: 0, successRate: 1 },
    ]);
    expect(report.flows.map(f => f.flowId)).toEqual(['failing', 'greeting']);
  });
});
