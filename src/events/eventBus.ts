import Redis from 'ioredis';
import { config } from '../config';
import { createServiceLogger } from '../observability/logger';
import { EventType, BaseEvent, EventHandler } from '../types/events';

const log = createServiceLogger('event-bus');

const eventTypes = new Set<string>(Object.values(EventType));

const isEventType = (value: unknown): value is EventType =>
  typeof value === 'string' && eventTypes.has(value);

/**
 * Decode a message from the wire; null when it is not an event we know
 */
export const parseEvent = (message: string): BaseEvent | null => {
  const parsed: unknown = JSON.parse(message);
  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('eventType' in parsed) ||
    !isEventType(parsed.eventType) ||
    !('sequence' in parsed) ||
    typeof parsed.sequence !== 'number' ||
    !('payload' in parsed) ||
    typeof parsed.payload !== 'object' ||
    parsed.payload === null
  ) {
    return null;
  }

  const timestamp =
    'timestamp' in parsed && typeof parsed.timestamp === 'string'
      ? new Date(parsed.timestamp)
      : new Date();

  return {
    eventType: parsed.eventType,
    sequence: parsed.sequence,
    timestamp,
    payload: { ...parsed.payload },
  };
};

const waitForReady = (client: Redis): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    client.once('ready', () => resolve());
    client.once('error', (err: Error) => reject(err));
  });

class EventBus {
  private publisher: Redis | null = null;
  private subscriber: Redis | null = null;
  private handlers: Map<EventType, EventHandler[]> = new Map();
  private isConnected = false;

  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }

    const redisConfig = {
      host: config.redis.host,
      port: config.redis.port,
      password: config.redis.password,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
    };

    const publisher = new Redis(redisConfig);
    const subscriber = new Redis(redisConfig);

    await Promise.all([waitForReady(publisher), waitForReady(subscriber)]);

    subscriber.on('message', (channel: string, message: string) => {
      this.dispatch(channel, message).catch((error: unknown) => {
        log.error({ err: error, channel }, 'Error dispatching event');
      });
    });

    this.publisher = publisher;
    this.subscriber = subscriber;
    this.isConnected = true;
    log.info('Event bus connected to Redis');
  }

  private async dispatch(channel: string, message: string): Promise<void> {
    let event: BaseEvent | null;
    try {
      event = parseEvent(message);
    } catch (error) {
      log.error({ err: error, channel }, 'Error parsing event message');
      return;
    }

    if (!event) {
      log.warn({ channel }, 'Ignoring unrecognised event message');
      return;
    }

    const handlers = this.handlers.get(event.eventType) || [];
    for (const handler of handlers) {
      try {
        await handler(event);
      } catch (error) {
        log.error({ err: error, eventType: event.eventType }, 'Error handling event');
      }
    }
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) {
      return;
    }

    if (this.publisher) {
      await this.publisher.quit();
      this.publisher = null;
    }

    if (this.subscriber) {
      await this.subscriber.quit();
      this.subscriber = null;
    }

    this.handlers.clear();
    this.isConnected = false;
    log.info('Event bus disconnected');
  }

  async publish(event: BaseEvent): Promise<void> {
    if (!this.publisher || !this.isConnected) {
      throw new Error('Event bus not connected');
    }

    const message = JSON.stringify({
      ...event,
      timestamp: event.timestamp || new Date(),
    });

    await this.publisher.publish(event.eventType, message);
    log.debug({ eventType: event.eventType, sequence: event.sequence }, 'Event published');
  }

  async subscribe(eventType: EventType, handler: EventHandler): Promise<void> {
    if (!this.subscriber || !this.isConnected) {
      throw new Error('Event bus not connected');
    }

    const handlers = this.handlers.get(eventType) || [];
    handlers.push(handler);
    this.handlers.set(eventType, handlers);

    await this.subscriber.subscribe(eventType);
    log.debug({ eventType }, 'Subscribed to event');
  }

  async unsubscribe(eventType: EventType): Promise<void> {
    if (!this.subscriber || !this.isConnected) {
      return;
    }

    this.handlers.delete(eventType);
    await this.subscriber.unsubscribe(eventType);
    log.debug({ eventType }, 'Unsubscribed from event');
  }

  getStatus(): { connected: boolean } {
    return { connected: this.isConnected };
  }
}

export { EventBus };
export const eventBus = new EventBus();
