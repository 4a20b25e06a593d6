/**
 * Event Router
 *
 * Channel pub/sub over the notification transport. Every subscriber of a
 * channel gets every event on it; one subscriber failing never affects the
 * others. Subscriber lists are replaced on change and never mutated in place,
 * so a dispatch always iterates a stable snapshot.
 */

import { EventEnvelopeSchema, getEventType, type EventEnvelope } from '@dbsentinel/types';
import type { ListenSubscription, NotificationHandler, NotificationTransport } from './database.js';
import { CallbackError, MalformedPayloadError, TransportError, toError } from './errors.js';
import { createLogger, type Logger } from './logger.js';

export const DEFAULT_STOP_GRACE_MS = 500;

export type EventCallback = (event: Readonly<EventEnvelope>, channel: string) => void | Promise<void>;

export type DropReason = 'malformed' | 'no_subscribers';

export interface DispatchReport {
  channel: string;
  eventType: string;
  delivered: number;
  failed: number;
  dropped?: DropReason;
}

export interface EventRouterOptions {
  transport: NotificationTransport;
  logger?: Logger;
  /** How long stop() waits for in-flight dispatches */
  stopGraceMs?: number;
}

export interface ListenOptions {
  /** Aborting ends the listen run like stop() */
  signal?: AbortSignal;
}

export class EventRouter implements NotificationHandler {
  private readonly transport: NotificationTransport;
  private readonly logger: Logger;
  private readonly stopGraceMs: number;
  private subscribers = new Map<string, readonly EventCallback[]>();
  private readonly listens = new Map<string, ListenSubscription>();
  private readonly inFlight = new Set<Promise<DispatchReport>>();
  private running = false;
  private wake: (() => void) | null = null;
  private transportFailure: TransportError | null = null;

  constructor(options: EventRouterOptions) {
    this.transport = options.transport;
    this.logger = options.logger ?? createLogger({ name: 'event-router' });
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
  }

  // ===========================================================================
  // Registry
  // ===========================================================================

  subscribe(channel: string, callback: EventCallback): void {
    const current = this.subscribers.get(channel) ?? [];
    this.subscribers.set(channel, [...current, callback]);

    if (this.running && !this.listens.has(channel)) {
      this.logger.warn({ channel }, 'Subscribed while listening; channel is listened on the next run');
    }
    this.logger.info({ channel, subscriberCount: current.length + 1 }, 'Subscriber added');
  }

  /**
   * Remove one occurrence of the callback; returns false when it was not subscribed
   */
  unsubscribe(channel: string, callback: EventCallback): boolean {
    const current = this.subscribers.get(channel);
    const index = current ? current.indexOf(callback) : -1;

    if (!current || index < 0) {
      this.logger.warn({ channel }, 'Unsubscribe ignored, callback not subscribed');
      return false;
    }

    const next = [...current.slice(0, index), ...current.slice(index + 1)];
    if (next.length === 0) {
      this.subscribers.delete(channel);
    } else {
      this.subscribers.set(channel, next);
    }

    this.logger.info({ channel, subscriberCount: next.length }, 'Subscriber removed');
    return true;
  }

  getActiveChannels(): string[] {
    return [...this.subscribers.keys()];
  }

  getSubscriberCount(channel: string): number {
    return this.subscribers.get(channel)?.length ?? 0;
  }

  getListeningChannels(): string[] {
    return [...this.listens.keys()];
  }

  isRunning(): boolean {
    return this.running;
  }

  // ===========================================================================
  // Listening
  // ===========================================================================

  /**
   * Listen on every subscribed channel until stop(), abort, or a transport failure.
   * Rejects with TransportError on failure; listens are always released.
   */
  async startListening(options: ListenOptions = {}): Promise<void> {
    if (this.running) {
      this.logger.warn('Router is already listening');
      return;
    }

    this.running = true;
    this.transportFailure = null;

    try {
      for (const channel of this.subscribers.keys()) {
        if (!this.isRunning()) break;
        const subscription = await this.transport.listen(channel, this);
        this.listens.set(channel, subscription);
      }

      this.logger.info({ channels: this.getListeningChannels() }, 'Router listening');
      await this.waitForStop(options.signal);

      const failure = this.takeTransportFailure();
      if (failure) {
        throw failure;
      }
      this.logger.info('Router stopped listening');
    } catch (error) {
      const failure =
        error instanceof TransportError
          ? error
          : new TransportError('Listen run failed', undefined, toError(error));
      this.logger.error({ err: failure, channel: failure.channel }, 'Router listen run failed');
      throw failure;
    } finally {
      this.running = false;
      await this.cleanup();
    }
  }

  private waitForStop(signal?: AbortSignal): Promise<void> {
    if (!this.running || signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const finish = (): void => {
        signal?.removeEventListener('abort', onAbort);
        this.wake = null;
        resolve();
      };
      const onAbort = (): void => {
        this.running = false;
        finish();
      };

      this.wake = finish;
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private takeTransportFailure(): TransportError | null {
    const failure = this.transportFailure;
    this.transportFailure = null;
    return failure;
  }

  handleTransportError(channel: string, error: TransportError): void {
    this.logger.error({ err: error, channel }, 'Transport failure');
    if (!this.running) return;

    this.transportFailure ??= error;
    this.running = false;
    this.wake?.();
  }

  /**
   * End the listen wait now, then wait for in-flight dispatches up to the grace period
   */
  async stop(): Promise<void> {
    this.running = false;
    this.wake?.();

    if (this.inFlight.size === 0) return;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.stopGraceMs);
    });
    const drained = Promise.allSettled([...this.inFlight]).then(() => 'drained' as const);

    const outcome = await Promise.race([drained, grace]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      this.logger.warn(
        { pending: this.inFlight.size, graceMs: this.stopGraceMs },
        'Stopped with dispatches still in flight'
      );
    }
  }

  /**
   * Release every open listen; one failure does not block the rest
   */
  async cleanup(): Promise<void> {
    const open = [...this.listens.entries()];
    this.listens.clear();

    await Promise.all(
      open.map(async ([channel, subscription]) => {
        try {
          await this.transport.unlisten(subscription);
        } catch (error) {
          this.logger.warn({ err: error, channel }, 'Failed to release listen');
        }
      })
    );
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  /**
   * Transport entry point for a raw payload on a channel
   */
  async handleNotification(channel: string, payload: string): Promise<DispatchReport> {
    const dispatch = this.dispatch(channel, payload);
    this.inFlight.add(dispatch);
    try {
      return await dispatch;
    } finally {
      this.inFlight.delete(dispatch);
    }
  }

  private parse(channel: string, payload: string): Readonly<EventEnvelope> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch (error) {
      throw new MalformedPayloadError(channel, `Invalid JSON payload: ${toError(error).message}`);
    }

    const result = EventEnvelopeSchema.safeParse(parsed);
    if (!result.success) {
      throw new MalformedPayloadError(channel, 'Payload is not a JSON object');
    }
    // Shared by every subscriber of the event
    return Object.freeze(result.data);
  }

  private async dispatch(channel: string, payload: string): Promise<DispatchReport> {
    let event: Readonly<EventEnvelope>;
    try {
      event = this.parse(channel, payload);
    } catch (error) {
      this.logger.warn({ err: error, channel, payloadLength: payload.length }, 'Dropped malformed payload');
      return { channel, eventType: 'unknown', delivered: 0, failed: 0, dropped: 'malformed' };
    }

    const eventType = getEventType(event);
    const subscribers = this.subscribers.get(channel);

    if (!subscribers || subscribers.length === 0) {
      this.logger.warn({ channel, eventType }, 'No subscribers for channel, event dropped');
      return { channel, eventType, delivered: 0, failed: 0, dropped: 'no_subscribers' };
    }

    const results = await Promise.allSettled(
      subscribers.map(async (callback) => {
        await callback(event, channel);
      })
    );

    let failed = 0;
    results.forEach((result, subscriberIndex) => {
      if (result.status === 'rejected') {
        failed++;
        const error = new CallbackError(channel, subscriberIndex, toError(result.reason));
        this.logger.error({ err: error, channel, subscriberIndex, eventType }, 'Subscriber callback failed');
      }
    });

    this.logger.debug(
      { channel, eventType, delivered: results.length - failed, failed },
      'Event dispatched'
    );
    return { channel, eventType, delivered: results.length - failed, failed };
  }

  // ===========================================================================
  // Publishing
  // ===========================================================================

  /**
   * Publish an event; failures are logged and rethrown so the caller can retry
   */
  async emit(channel: string, data: Readonly<EventEnvelope>): Promise<void> {
    const eventType = getEventType(data);

    let payload: string;
    try {
      payload = JSON.stringify(data);
    } catch (error) {
      const failure = new MalformedPayloadError(
        channel,
        `Event data is not serializable: ${toError(error).message}`
      );
      this.logger.error({ err: failure, channel, eventType }, 'Failed to serialize event');
      throw failure;
    }

    try {
      await this.transport.notify(channel, payload);
    } catch (error) {
      const failure =
        error instanceof TransportError
          ? error
          : new TransportError(`Failed to emit on ${channel}`, channel, toError(error));
      this.logger.error({ err: failure, channel, eventType }, 'Failed to emit event');
      throw failure;
    }

    this.logger.debug({ channel, eventType }, 'Event emitted');
  }
}
