/**
 * Rendered notification, independent of the transport.
 */
export interface PushMessage {
  title: string;
  body: string;
  url?: string;
  urlTitle?: string;
}

/**
 * Outbound push transport. `send` resolves on acceptance and throws a
 * DeliveryError classified `transient` (retry) or `rejected` (never retry).
 */
export interface NotificationChannel {
  readonly name: string;
  send(message: PushMessage): Promise<void>;
}
