import { connectAsync } from 'mqtt';
import type { MqttClient } from 'mqtt';
import type { Logger } from 'pino';
import { TransportError } from '../../domain/index.js';
import type { ConnectionLostHandler, MessageHandler, QoS, Transport } from './transport.js';

export interface MqttTransportOptions {
  url: string;
  clientId: string;
  username?: string;
  password?: string;
  connectTimeoutMs?: number;
}

// SUBACK return code for a refused subscription.
const SUBACK_FAILURE = 128;

/**
 * `Transport` over the `mqtt` package.
 *
 * The client's built-in reconnect is disabled (`reconnectPeriod: 0`):
 * every connection loss surfaces once, and the subscription manager
 * decides when to dial again.
 *
 * QoS 1/2 deliveries are acknowledged by the client after the `message`
 * listeners return, so a synchronous handler runs before the ack.
 */
export class MqttTransport implements Transport {
  private client: MqttClient | null = null;
  private closing = false;
  private readonly messageHandlers: MessageHandler[] = [];
  private readonly lostHandlers: ConnectionLostHandler[] = [];

  constructor(
    private readonly options: MqttTransportOptions,
    private readonly log: Logger,
  ) {}

  onMessage(handler: MessageHandler): void {
    this.messageHandlers.push(handler);
  }

  onConnectionLost(handler: ConnectionLostHandler): void {
    this.lostHandlers.push(handler);
  }

  async connect(): Promise<void> {
    this.closing = false;
    let client: MqttClient;
    try {
      client = await connectAsync(this.options.url, {
        clientId: this.options.clientId,
        username: this.options.username,
        password: this.options.password,
        reconnectPeriod: 0,
        connectTimeout: this.options.connectTimeoutMs ?? 10_000,
        clean: true,
      });
    } catch (err: unknown) {
      throw new TransportError(`Failed to connect to ${this.options.url}`, { cause: err });
    }

    client.on('message', (topic: string, payload: Buffer) => {
      for (const handler of this.messageHandlers) handler(topic, payload);
    });
    client.on('error', (err: Error) => {
      this.log.warn({ err }, 'MQTT client error');
    });
    client.on('close', () => {
      if (this.client !== client || this.closing) return;
      this.client = null;
      const err = new TransportError('MQTT connection closed');
      for (const handler of this.lostHandlers) handler(err);
    });

    this.client = client;
    this.log.info({ url: this.options.url, clientId: this.options.clientId }, 'MQTT connected');
  }

  async subscribe(topics: readonly string[], qos: QoS): Promise<void> {
    const client = this.requireClient();
    const grants = await client.subscribeAsync([...topics], { qos }).catch((err: unknown) => {
      throw new TransportError('MQTT subscribe failed', { cause: err });
    });

    const refused = topics.filter((topic) => {
      const grant = grants.find((g) => g.topic === topic);
      return grant === undefined || grant.qos === SUBACK_FAILURE;
    });
    if (refused.length > 0) {
      throw new TransportError(`Broker refused subscription to: ${refused.join(', ')}`);
    }
  }

  async unsubscribe(topics: readonly string[]): Promise<void> {
    const client = this.client;
    if (client === null) return;
    try {
      await client.unsubscribeAsync([...topics]);
    } catch (err: unknown) {
      throw new TransportError('MQTT unsubscribe failed', { cause: err });
    }
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    this.closing = true;
    this.client = null;
    if (client === null) return;
    await client.endAsync();
    this.log.info('MQTT disconnected');
  }

  private requireClient(): MqttClient {
    if (this.client === null) {
      throw new TransportError('MQTT client is not connected');
    }
    return this.client;
  }
}
