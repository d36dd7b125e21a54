import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { backoffDelay } from '../../application/retry.js';
import type { QoS, Transport } from './transport.js';

export type SubscriptionState = 'disconnected' | 'connecting' | 'subscribed' | 'stopped';

export interface SubscriptionManagerOptions {
  transport: Transport;
  topics: readonly string[];
  qos: QoS;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  log: Logger;
  onMessage: (topic: string, payload: Buffer) => void;
  onStateChange?: (state: SubscriptionState) => void;
  metrics?: { reconnectAttempted(): void };
  /** Abortable wait between attempts; replaced in tests. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

const abortableSleep = async (ms: number, signal: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal });
};

/**
 * Owns the broker connection lifecycle:
 *
 *   disconnected → connecting → subscribed
 *        ↑                          │ (transport lost)
 *        └──────────────────────────┘
 *
 * Failed attempts back off exponentially up to `reconnectMaxMs`.
 * `subscribed` is entered only once every topic is granted; `stop()`
 * moves to the terminal `stopped` state from anywhere.
 */
export class SubscriptionManager {
  private current: SubscriptionState = 'disconnected';
  private readonly abort = new AbortController();
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private loop: Promise<void> | null = null;
  private started = false;

  constructor(private readonly options: SubscriptionManagerOptions) {
    this.sleep = options.sleep ?? abortableSleep;
  }

  get state(): SubscriptionState {
    return this.current;
  }

  /**
   * Starts connecting. The returned promise settles once the first
   * subscription is in place, or when `stop()` is called first.
   */
  start(): Promise<void> {
    if (!this.started) {
      this.started = true;
      const { transport } = this.options;
      transport.onMessage((topic, payload) => this.deliver(topic, payload));
      transport.onConnectionLost((err) => this.handleLoss(err));
      this.loop = this.connectLoop();
    }
    return this.loop ?? Promise.resolve();
  }

  async stop(): Promise<void> {
    if (this.current === 'stopped') return;
    const wasSubscribed = this.current === 'subscribed';

    this.abort.abort();
    this.setState('stopped');

    const { transport, topics, log } = this.options;
    if (wasSubscribed) {
      try {
        await transport.unsubscribe(topics);
      } catch (err: unknown) {
        log.warn({ err }, 'Unsubscribe failed during stop');
      }
    }
    try {
      await transport.disconnect();
    } catch (err: unknown) {
      log.warn({ err }, 'Transport disconnect failed during stop');
    }
    await this.loop;
  }

  private async connectLoop(): Promise<void> {
    const { transport, topics, qos, reconnectBaseMs, reconnectMaxMs, log, metrics } = this.options;

    for (let attempt = 0; !this.abort.signal.aborted; attempt++) {
      this.setState('connecting');
      try {
        await transport.connect();
        await transport.subscribe(topics, qos);
        if (this.abort.signal.aborted) return;
        this.setState('subscribed');
        log.info({ topics, qos, attempts: attempt + 1 }, 'Subscribed to telemetry topics');
        return;
      } catch (err: unknown) {
        if (this.abort.signal.aborted) return;
        this.setState('disconnected');

        try {
          await transport.disconnect();
        } catch (cleanupErr: unknown) {
          log.debug({ err: cleanupErr }, 'Cleanup after failed attempt failed');
        }

        const wait = backoffDelay(attempt, reconnectBaseMs, reconnectMaxMs);
        log.warn({ err, attempt: attempt + 1, retryInMs: wait }, 'Broker connection attempt failed');
        metrics?.reconnectAttempted();

        try {
          await this.sleep(wait, this.abort.signal);
        } catch (sleepErr: unknown) {
          if (this.abort.signal.aborted) return;
          throw sleepErr;
        }
      }
    }
  }

  private handleLoss(err?: Error): void {
    // Only a live subscription can be lost; during an attempt the
    // connect loop sees the failure itself.
    if (this.current !== 'subscribed') return;

    this.options.log.warn({ err }, 'Broker connection lost, reconnecting');
    this.setState('disconnected');
    this.loop = this.connectLoop();
  }

  private deliver(topic: string, payload: Buffer): void {
    try {
      this.options.onMessage(topic, payload);
    } catch (err: unknown) {
      this.options.log.error({ err, topic }, 'Message handler failed');
    }
  }

  private setState(next: SubscriptionState): void {
    if (this.current === next) return;
    this.options.log.debug({ from: this.current, to: next }, 'Subscription state change');
    this.current = next;
    this.options.onStateChange?.(next);
  }
}
