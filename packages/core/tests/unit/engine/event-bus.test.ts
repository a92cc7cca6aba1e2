import { describe, expect, it } from 'vitest';
import { EventBus } from '../../../src/engine/event-bus.js';
import type { PipelineEvent } from '../../../src/types/events.js';

describe('EventBus', () => {
  it('stamps events that carry no timestamp', () => {
    const bus = new EventBus();
    const seen: PipelineEvent[] = [];
    bus.on('event', (e) => seen.push(e));

    bus.emitEvent({ type: 'test.discovered', binDir: '/b/bin', count: 3 });

    expect(seen).toHaveLength(1);
    expect(seen[0]?.type).toBe('test.discovered');
    expect(Number.isNaN(Date.parse(seen[0]?.timestamp ?? ''))).toBe(false);
  });

  it('keeps an explicit timestamp', () => {
    const bus = new EventBus();
    const seen: PipelineEvent[] = [];
    bus.on('event', (e) => seen.push(e));

    bus.emitEvent({ type: 'build.output', chunk: 'x', timestamp: '2025-01-01T00:00:00.000Z' });

    expect(seen[0]).toEqual({ type: 'build.output', chunk: 'x', timestamp: '2025-01-01T00:00:00.000Z' });
  });
});
