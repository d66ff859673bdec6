import amqp from "amqplib";
import { componentLogger } from "../../utils/logger";
import {
  MarketplaceNotification,
  NotificationPublisher,
} from "../../interfaces/Notification";

const log = componentLogger("rabbitmq");

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

/**
 * Publishes marketplace notifications to a durable topic exchange.
 * The routing key is the notification type, so consumers bind to
 * e.g. "auction-won" or "#".
 *
 * The connection is opened on first publish and reopened after it drops.
 */
export class RabbitMqNotificationPublisher implements NotificationPublisher {
  private connection: AmqpConnection | null = null;
  private channel: amqp.Channel | null = null;
  private connecting: Promise<amqp.Channel> | null = null;

  constructor(
    private readonly url: string,
    private readonly exchange: string
  ) {}

  async publish(notification: MarketplaceNotification): Promise<void> {
    const channel = await this.getChannel();
    const published = channel.publish(
      this.exchange,
      notification.type,
      Buffer.from(JSON.stringify(notification)),
      { persistent: true, contentType: "application/json" }
    );

    if (!published) {
      log.warn(`RabbitMQ write buffer full, ${notification.type} queued in client`);
    }
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.reset();
    if (connection) {
      await connection.close();
      log.info("RabbitMQ connection closed");
    }
  }

  private getChannel(): Promise<amqp.Channel> {
    if (this.channel) {
      return Promise.resolve(this.channel);
    }
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async connect(): Promise<amqp.Channel> {
    const connection = await amqp.connect(this.url);
    connection.on("error", (error: Error) => {
      log.warn("RabbitMQ connection error", { error: error.message });
    });
    connection.on("close", () => {
      this.reset();
    });

    const channel = await connection.createChannel();
    await channel.assertExchange(this.exchange, "topic", { durable: true });

    this.connection = connection;
    this.channel = channel;
    log.info(`Connected to RabbitMQ, publishing to exchange ${this.exchange}`);
    return channel;
  }

  private reset(): void {
    this.connection = null;
    this.channel = null;
  }
}
