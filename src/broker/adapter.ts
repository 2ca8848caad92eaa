/**
 * BrokerAdapter - NATS client wrapper with reconnect logic and JSON payloads
 */
import { connect, DebugEvents, Events, NatsConnection, Subscription, StringCodec } from 'nats';
import { EventEmitter } from 'events';
import Config from '../config';
import { logger } from '../utils/logger';

export type MessageHandler = (data: unknown, context: MessageContext) => Promise<void> | void;

export interface MessageContext {
  subject: string;
  /** Transport sequence id when the publisher set one */
  messageId?: string;
}

/**
 * Emits `connect`, `reconnecting` (attempts), `disconnect` and `error`
 */
export class BrokerAdapter extends EventEmitter {
  private connection: NatsConnection | null = null;
  private subscriptions: Map<string, Subscription> = new Map();
  private reconnectAttempts = 0;
  private stringCodec = StringCodec();
  private connectionStatus: 'disconnected' | 'connected' | 'connecting' = 'disconnected';
  private connectionPromise: Promise<NatsConnection> | null = null;

  constructor(private url: string = Config.broker.url) {
    super();
  }

  get status(): 'disconnected' | 'connected' | 'connecting' {
    return this.connectionStatus;
  }

  /**
   * Connect to the NATS server with automatic reconnect
   */
  public async connect(): Promise<NatsConnection> {
    if (this.connection && !this.connection.isClosed()) {
      return this.connection;
    }

    if (this.connectionStatus === 'connecting' && this.connectionPromise) {
      return this.connectionPromise;
    }

    this.connectionStatus = 'connecting';
    this.connectionPromise = this.attemptConnect();
    return this.connectionPromise;
  }

  private async attemptConnect(): Promise<NatsConnection> {
    try {
      logger.info({ url: this.url }, 'Connecting to NATS server');

      const nc = await connect({
        servers: this.url,
        maxReconnectAttempts: Config.broker.reconnectAttempts,
        reconnectTimeWait: Config.broker.reconnectTimeWait,
        timeout: Config.broker.timeout,
        reconnectDelayHandler: () => {
          // Exponential backoff with jitter, capped at 30s
          const jitter = Math.random() * 100;
          const delay = Math.min(
            Config.broker.reconnectTimeWait * Math.pow(1.5, this.reconnectAttempts) + jitter,
            30000
          );
          this.reconnectAttempts++;
          return delay;
        },
      });

      this.reconnectAttempts = 0;
      this.connection = nc;
      this.connectionStatus = 'connected';

      logger.info('Connected to NATS server');
      this.emit('connect');

      this.watchStatus(nc).catch(err => {
        logger.error({ error: err }, 'Error processing NATS status events');
      });

      nc.closed()
        .then(err => {
          if (err) {
            logger.error({ error: err }, 'NATS connection closed with error');
            this.emit('error', err);
          } else {
            logger.info('NATS connection closed');
          }
          this.connectionStatus = 'disconnected';
          this.connection = null;
        })
        .catch(err => {
          logger.error({ error: err }, 'Error waiting for NATS connection close');
        });

      return nc;
    } catch (error) {
      logger.error({ error }, 'Failed to connect to NATS');
      this.connectionStatus = 'disconnected';
      this.connectionPromise = null;
      this.emit('error', error);
      throw error;
    }
  }

  private async watchStatus(nc: NatsConnection): Promise<void> {
    for await (const status of nc.status()) {
      switch (status.type) {
        case DebugEvents.Reconnecting:
          this.connectionStatus = 'connecting';
          this.emit('reconnecting', this.reconnectAttempts);
          break;
        case Events.Reconnect:
          logger.warn({ attempts: this.reconnectAttempts }, 'Reconnected to NATS');
          this.connectionStatus = 'connected';
          break;
        case Events.Disconnect:
          logger.warn('Disconnected from NATS');
          this.connectionStatus = 'disconnected';
          this.emit('disconnect');
          break;
        default:
          logger.debug({ type: status.type }, 'NATS status update');
          break;
      }
    }
  }

  /**
   * Subscribe within the configured queue group. Each message body is parsed
   * as JSON before it reaches the handler; unparseable bodies are logged and
   * dropped.
   */
  public async subscribe(subject: string, handler: MessageHandler): Promise<Subscription> {
    const nc = await this.connect();

    const sub = nc.subscribe(subject, {
      queue: Config.broker.queueGroup,
      callback: (err, msg) => {
        if (err) {
          logger.error({ error: err, subject }, 'Error in subscription');
          return;
        }

        const body = this.stringCodec.decode(msg.data);
        let data: unknown;
        try {
          data = JSON.parse(body);
        } catch (error) {
          logger.warn({ error, subject, bytes: msg.data.length }, 'Dropping message that is not JSON');
          return;
        }

        const context: MessageContext = {
          subject: msg.subject,
          messageId: msg.headers?.get('Nats-Msg-Id') || undefined,
        };

        Promise.resolve()
          .then(() => handler(data, context))
          .catch(error => {
            logger.error({ error, subject }, 'Error processing message');
          });
      },
    });

    this.subscriptions.set(subject, sub);
    logger.info({ subject, queue: Config.broker.queueGroup }, 'Subscribed to subject');

    return sub;
  }

  /**
   * Publish a JSON message to a subject
   */
  public async publish(subject: string, data: unknown): Promise<void> {
    const nc = await this.connect();

    try {
      nc.publish(subject, this.stringCodec.encode(JSON.stringify(data)));
      logger.debug({ subject }, 'Published message to subject');
    } catch (error) {
      logger.error({ error, subject }, 'Error publishing message');
      throw error;
    }
  }

  /**
   * Drain subscriptions and close the connection
   */
  public async close(): Promise<void> {
    if (!this.connection || this.connection.isClosed()) {
      return;
    }

    logger.info('Closing broker connections and subscriptions');

    try {
      await this.connection.drain();
      this.subscriptions.clear();
      this.connection = null;
      this.connectionStatus = 'disconnected';
      logger.info('Broker connections and subscriptions closed');
    } catch (error) {
      logger.error({ error }, 'Error closing broker connection');
      throw error;
    }
  }

  public static async connect(url?: string): Promise<BrokerAdapter> {
    const broker = new BrokerAdapter(url);
    await broker.connect();
    return broker;
  }
}

export default BrokerAdapter;
