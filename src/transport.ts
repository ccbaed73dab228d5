import { StorageUnavailableError } from './errors';
import { registerIdFromTopic } from './ingest';
import type { MetricPipeline } from './ingest';

export { registerIdFromTopic };

export function gatewayTopics(gatewayId: string): string[] {
  return [`${gatewayId}/HP/+`, `${gatewayId}/HP/STATUS/+`];
}

export type SubscriberStats = {
  received: number;
  dropped: number;
  inFlight: number;
};

/**
 * Feeds transport messages into the pipeline. Messages for the same register
 * are chained so they are written in arrival order; different registers run
 * concurrently.
 */
export class GatewaySubscriber {
  readonly #pipeline: MetricPipeline;
  readonly #now: () => Date;
  readonly #chains = new Map<string, Promise<void>>();
  #received = 0;
  #dropped = 0;

  constructor(pipeline: MetricPipeline, now: () => Date = () => new Date()) {
    this.#pipeline = pipeline;
    this.#now = now;
  }

  get stats(): SubscriberStats {
    return { received: this.#received, dropped: this.#dropped, inFlight: this.#chains.size };
  }

  onMessage(topic: string, payload: string | Uint8Array): Promise<void> {
    this.#received += 1;
    const arrivalTime = this.#now();
    const key = registerIdFromTopic(topic) ?? topic;
    const previous = this.#chains.get(key) ?? Promise.resolve();

    const next: Promise<void> = previous
      .then(() => this.#deliver(topic, payload, arrivalTime))
      .finally(() => {
        if (this.#chains.get(key) === next) {
          this.#chains.delete(key);
        }
      });
    this.#chains.set(key, next);
    return next;
  }

  async #deliver(topic: string, payload: string | Uint8Array, arrivalTime: Date): Promise<void> {
    try {
      await this.#pipeline.handleMessage(topic, payload, arrivalTime);
    } catch (error) {
      this.#dropped += 1;
      if (error instanceof StorageUnavailableError) {
        console.warn('Storage unavailable, dropping reading', { topic, error: error.message });
      } else {
        console.error('Failed to ingest message', topic, error);
      }
    }
  }

  async idle(): Promise<void> {
    while (this.#chains.size > 0) {
      await Promise.all(this.#chains.values());
    }
  }
}
