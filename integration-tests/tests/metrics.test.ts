/**
 * Queue Metrics Tests
 */

import {
  getMetrics,
  queueDepthGauge,
  queueMetricsGauge,
  reportQueueMetrics,
  type QueueCounts,
} from '@layoutid/shared';

function fakeQueue(counts: { waiting: number; active: number; completed: number; failed: number; delayed: number }): QueueCounts {
  return {
    getWaitingCount: async () => counts.waiting,
    getActiveCount: async () => counts.active,
    getCompletedCount: async () => counts.completed,
    getFailedCount: async () => counts.failed,
    getDelayedCount: async () => counts.delayed,
  };
}

const unreachableQueue: QueueCounts = {
  getWaitingCount: async () => {
    throw new Error('connect ECONNREFUSED');
  },
  getActiveCount: async () => 0,
  getCompletedCount: async () => 0,
  getFailedCount: async () => 0,
  getDelayedCount: async () => 0,
};

interface ReadableGauge {
  get(): Promise<{ values: Array<{ value: number; labels: Partial<Record<string, string | number>> }> }>;
}

async function gaugeValue(gauge: ReadableGauge, labels: Record<string, string>): Promise<number | undefined> {
  const { values } = await gauge.get();
  const entry = values.find((value) =>
    Object.entries(labels).every(([key, expected]) => value.labels[key] === expected)
  );
  return entry?.value;
}

describe('reportQueueMetrics', () => {
  it('sets depth and per-state gauges for each queue', async () => {
    await reportQueueMetrics([
      { name: 'classify_document', queue: fakeQueue({ waiting: 4, active: 1, completed: 10, failed: 2, delayed: 3 }) },
    ]);

    expect(await gaugeValue(queueDepthGauge, { queue: 'classify_document' })).toBe(5);
    expect(await gaugeValue(queueMetricsGauge, { queue: 'classify_document', state: 'waiting' })).toBe(4);
    expect(await gaugeValue(queueMetricsGauge, { queue: 'classify_document', state: 'failed' })).toBe(2);
    expect(await gaugeValue(queueMetricsGauge, { queue: 'classify_document', state: 'delayed' })).toBe(3);
  });

  it('reports -1 depth for a queue that cannot be read', async () => {
    await reportQueueMetrics([{ name: 'template_detected', queue: unreachableQueue }]);

    expect(await gaugeValue(queueDepthGauge, { queue: 'template_detected' })).toBe(-1);
  });

  it('includes the reported depth in the scrape', async () => {
    await reportQueueMetrics([
      { name: 'classify_document', queue: fakeQueue({ waiting: 7, active: 0, completed: 0, failed: 0, delayed: 0 }) },
    ]);

    expect(await getMetrics()).toContain('layoutid_queue_depth{queue="classify_document"} 7');
  });
});
