export type QoS = 0 | 1 | 2;

export type MessageHandler = (topic: string, payload: Buffer) => void;
export type ConnectionLostHandler = (err?: Error) => void;

/**
 * Broker connection as seen by the subscription manager.
 *
 * Implementations must not reconnect on their own; after a loss they
 * report through `onConnectionLost` and wait for the next `connect()`.
 * Handlers registered once stay attached across reconnects.
 */
export interface Transport {
  connect(): Promise<void>;
  /** Rejects with `TransportError` unless every topic is granted. */
  subscribe(topics: readonly string[], qos: QoS): Promise<void>;
  unsubscribe(topics: readonly string[]): Promise<void>;
  disconnect(): Promise<void>;
  onMessage(handler: MessageHandler): void;
  onConnectionLost(handler: ConnectionLostHandler): void;
}
