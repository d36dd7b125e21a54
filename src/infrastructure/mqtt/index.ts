export type { Transport, QoS, MessageHandler, ConnectionLostHandler } from './transport.js';
export { MqttTransport } from './mqtt-transport.js';
export type { MqttTransportOptions } from './mqtt-transport.js';
export { SubscriptionManager } from './subscription-manager.js';
export type { SubscriptionState, SubscriptionManagerOptions } from './subscription-manager.js';
