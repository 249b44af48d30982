import { dispatcherOptionsFromConfig, type DispatcherStats } from './events/eventDispatcher.js';
import { TickProducer } from './producer/tickProducer.js';
import type { DemoConfig, TickEvent } from './types.js';

export interface DemoResult {
  // Subscriber names per tick, in delivery order.
  deliveries: Map<number, string[]>;
  ticks: number;
  stats: DispatcherStats;
}

/**
 * Wires subscribers that rearrange themselves from inside their own callbacks:
 * on tick 2, `b` drops `a` and brings in `d`, which first hears tick 3.
 */
function wireSubscribers(producer: TickProducer, deliveries: Map<number, string[]>): void {
  const record = (name: string) => (event: TickEvent) => {
    const list = deliveries.get(event.tick) ?? [];
    list.push(name);
    deliveries.set(event.tick, list);
  };

  producer.subscribe('a', record('a'));
  producer.subscribe('b', (event: TickEvent) => {
    record('b')(event);
    if (event.tick === 2) {
      producer.unsubscribe('a');
      producer.subscribe('d', record('d'));
    }
  });
  producer.subscribe('c', record('c'));
}

/**
 * Runs `config.ticks` ticks, back to back or on a timer. On a timer the run ends
 * from inside the last tick, so no further tick is ever scheduled.
 */
export async function runDemo(config: DemoConfig): Promise<DemoResult> {
  const producer = new TickProducer(dispatcherOptionsFromConfig(config.dispatcher));
  const deliveries = new Map<number, string[]>();
  wireSubscribers(producer, deliveries);

  if (config.interval_ms === 0) {
    for (let i = 0; i < config.ticks; i++) producer.tick();
  } else {
    await new Promise<void>(resolve => {
      producer.subscribe('stop', (event: TickEvent) => {
        if (event.tick < config.ticks) return;
        producer.stop();
        resolve();
      });
      producer.start(config.interval_ms);
    });
  }

  return { deliveries, ticks: producer.ticks, stats: producer.dispatcher.stats() };
}
