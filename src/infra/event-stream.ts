import { EventEmitter } from "events";
import { describeError, logger } from "../logger";

export type EventHandler<T> = (event: T) => void;

const EVENT = "event";

/**
 * Synchronous multicast channel on a private emitter. Handlers run in
 * subscription order, each isolated from the others' failures, before
 * `publish` returns.
 */
export class EventStream<T> {
  private readonly emitter = new EventEmitter();

  constructor(private readonly name: string) {
    // Subscriber count is unbounded.
    this.emitter.setMaxListeners(0);
  }

  subscribe(handler: EventHandler<T>): () => void {
    const listener = (event: T) => {
      try {
        handler(event);
      } catch (error) {
        logger.error(
          {
            stream: this.name,
            error: describeError(error),
          },
          "Event handler failed",
        );
      }
    };
    this.emitter.on(EVENT, listener);
    return () => {
      this.emitter.off(EVENT, listener);
    };
  }

  publish(event: T): void {
    this.emitter.emit(EVENT, event);
  }

  get listenerCount(): number {
    return this.emitter.listenerCount(EVENT);
  }

  clear(): void {
    this.emitter.removeAllListeners(EVENT);
  }
}
