import { EventEmitter } from 'node:events';
import logger, { type MonitorLogger } from './logger.js';
import type { MetricEvent } from './types.js';

const EVENTS_CHANNEL = 'events';

export type MetricEventListener = (events: MetricEvent[]) => void;

interface EventBusDependencies {
  log: Pick<MonitorLogger, 'debug' | 'error'>;
}

/**
 * Hands projected metric batches to whatever transport subscribes. A failing
 * listener is logged and does not stop delivery to the others.
 */
class EventBus extends EventEmitter {
  private readonly log: EventBusDependencies['log'];

  constructor(dependencies: EventBusDependencies = { log: logger }) {
    super();
    this.log = dependencies.log;
  }

  publish(events: MetricEvent[]): number {
    const batch = events.map(event => ({ ...event }));
    let delivered = 0;
    for (const listener of this.listeners(EVENTS_CHANNEL)) {
      try {
        listener.call(this, batch);
        delivered += 1;
      } catch (error) {
        this.log.error({ err: error }, 'Metric event listener failed');
      }
    }
    this.log.debug({ count: batch.length, listeners: delivered }, 'Published metric events');
    return delivered;
  }

  subscribe(listener: MetricEventListener): () => void {
    this.on(EVENTS_CHANNEL, listener);
    return () => {
      this.off(EVENTS_CHANNEL, listener);
    };
  }
}

const eventBus = new EventBus();

export { EventBus };
export default eventBus;
