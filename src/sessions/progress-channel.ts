/**
 * Session Progress Channel
 *
 * Fans session events out to in-process subscribers (EventEmitter) and to
 * any external publishers (Redis pub/sub). Delivery is fire-and-forget:
 * a failing listener or publisher is logged and never reaches the session.
 */
import { EventEmitter } from "events";
import type { Redis } from "ioredis";
import { logger } from "../monitoring/logger";
import { errorMessage } from "../shared/errors/scrape.errors";
import type { SessionEvent } from "../shared/types/session.types";

export type SessionListener = (event: SessionEvent) => void;

export interface ProgressPublisher {
  publish(event: SessionEvent): void;
}

const ALL_SESSIONS = "session:*";

export class ProgressChannel {
  private readonly emitter = new EventEmitter();
  private readonly publishers: ProgressPublisher[];

  constructor(publishers: ProgressPublisher[] = []) {
    this.publishers = publishers;
    // One listener per open SSE stream; no fixed upper bound
    this.emitter.setMaxListeners(0);
  }

  broadcast(event: SessionEvent): void {
    this.deliver(`session:${event.sessionId}`, event);
    this.deliver(ALL_SESSIONS, event);

    for (const publisher of this.publishers) {
      try {
        publisher.publish(event);
      } catch (error) {
        logger.warn({ sessionId: event.sessionId, error: errorMessage(error) }, "Progress publisher failed");
      }
    }
  }

  /** Listen to one session; returns the unsubscribe function */
  subscribe(sessionId: string, listener: SessionListener): () => void {
    const channel = `session:${sessionId}`;
    this.emitter.on(channel, listener);
    return () => {
      this.emitter.off(channel, listener);
    };
  }

  subscribeAll(listener: SessionListener): () => void {
    this.emitter.on(ALL_SESSIONS, listener);
    return () => {
      this.emitter.off(ALL_SESSIONS, listener);
    };
  }

  private deliver(channel: string, event: SessionEvent): void {
    for (const listener of this.emitter.listeners(channel)) {
      try {
        listener(event);
      } catch (error) {
        logger.warn({ sessionId: event.sessionId, error: errorMessage(error) }, "Progress listener failed");
      }
    }
  }
}

/** Mirrors events onto Redis channels `session-progress:{sessionId}` */
export class RedisProgressPublisher implements ProgressPublisher {
  private readonly redis: Pick<Redis, "publish">;

  constructor(redis: Pick<Redis, "publish">) {
    this.redis = redis;
  }

  publish(event: SessionEvent): void {
    this.redis
      .publish(`session-progress:${event.sessionId}`, JSON.stringify(event))
      .catch((error: unknown) => {
        logger.warn({ sessionId: event.sessionId, error: errorMessage(error) }, "Redis progress publish failed");
      });
  }
}
