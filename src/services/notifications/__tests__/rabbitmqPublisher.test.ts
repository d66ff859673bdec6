import amqp from "amqplib";
import { RabbitMqNotificationPublisher } from "../rabbitmqPublisher";
import { MarketplaceNotification } from "../../../interfaces/Notification";

jest.mock("amqplib", () => ({
  __esModule: true,
  default: { connect: jest.fn() },
}));

const connect = amqp.connect as jest.Mock;

type Handler = (...args: unknown[]) => void;

interface FakeConnection {
  on: jest.Mock<FakeConnection, [string, Handler]>;
  createChannel: jest.Mock;
  close: jest.Mock;
}

function fakeConnection(publishResult = true) {
  const handlers: Record<string, Handler> = {};
  const channel = {
    assertExchange: jest.fn().mockResolvedValue({}),
    publish: jest.fn().mockReturnValue(publishResult),
  };
  const connection: FakeConnection = {
    on: jest.fn(),
    createChannel: jest.fn().mockResolvedValue(channel),
    close: jest.fn().mockResolvedValue(undefined),
  };
  connection.on.mockImplementation((event, handler) => {
    handlers[event] = handler;
    return connection;
  });
  return { connection, channel, handlers };
}

const opened: MarketplaceNotification = {
  type: "auction-opened",
  shipmentId: "s-1",
  round: 1,
};

describe("RabbitMqNotificationPublisher", () => {
  beforeEach(() => {
    connect.mockReset();
  });

  test("connects once, declares the exchange and publishes by type", async () => {
    const { connection, channel } = fakeConnection();
    connect.mockResolvedValue(connection);
    const publisher = new RabbitMqNotificationPublisher("amqp://localhost", "haulbid.events");

    await publisher.publish(opened);
    await publisher.publish({ ...opened, round: 2 });

    expect(connect).toHaveBeenCalledTimes(1);
    expect(connect).toHaveBeenCalledWith("amqp://localhost");
    expect(channel.assertExchange).toHaveBeenCalledWith("haulbid.events", "topic", { durable: true });
    expect(channel.publish).toHaveBeenCalledTimes(2);

    const [exchange, routingKey, body, options] = channel.publish.mock.calls[0];
    expect(exchange).toBe("haulbid.events");
    expect(routingKey).toBe("auction-opened");
    expect(JSON.parse(body.toString())).toEqual({ type: "auction-opened", shipmentId: "s-1", round: 1 });
    expect(options).toEqual({ persistent: true, contentType: "application/json" });
  });

  test("concurrent publishes share one connection attempt", async () => {
    const { connection, channel } = fakeConnection();
    connect.mockResolvedValue(connection);
    const publisher = new RabbitMqNotificationPublisher("amqp://localhost", "haulbid.events");

    await Promise.all([publisher.publish(opened), publisher.publish(opened), publisher.publish(opened)]);

    expect(connect).toHaveBeenCalledTimes(1);
    expect(connection.createChannel).toHaveBeenCalledTimes(1);
    expect(channel.publish).toHaveBeenCalledTimes(3);
  });

  test("reconnects after the connection closes", async () => {
    const first = fakeConnection();
    const second = fakeConnection();
    connect.mockResolvedValueOnce(first.connection).mockResolvedValueOnce(second.connection);
    const publisher = new RabbitMqNotificationPublisher("amqp://localhost", "haulbid.events");

    await publisher.publish(opened);
    first.handlers.close();
    await publisher.publish(opened);

    expect(connect).toHaveBeenCalledTimes(2);
    expect(first.channel.publish).toHaveBeenCalledTimes(1);
    expect(second.channel.publish).toHaveBeenCalledTimes(1);
  });

  test("a failed connect rejects and the next publish retries", async () => {
    const { connection, channel } = fakeConnection();
    connect.mockRejectedValueOnce(new Error("ECONNREFUSED")).mockResolvedValueOnce(connection);
    const publisher = new RabbitMqNotificationPublisher("amqp://localhost", "haulbid.events");

    await expect(publisher.publish(opened)).rejects.toThrow("ECONNREFUSED");
    await publisher.publish(opened);

    expect(connect).toHaveBeenCalledTimes(2);
    expect(channel.publish).toHaveBeenCalledTimes(1);
  });

  test("a full write buffer does not fail the publish", async () => {
    const { connection } = fakeConnection(false);
    connect.mockResolvedValue(connection);
    const publisher = new RabbitMqNotificationPublisher("amqp://localhost", "haulbid.events");

    await expect(publisher.publish(opened)).resolves.toBeUndefined();
  });

  test("close shuts the connection and is a no-op when never connected", async () => {
    const { connection } = fakeConnection();
    connect.mockResolvedValue(connection);
    const publisher = new RabbitMqNotificationPublisher("amqp://localhost", "haulbid.events");

    await publisher.close();
    expect(connection.close).not.toHaveBeenCalled();

    await publisher.publish(opened);
    await publisher.close();
    expect(connection.close).toHaveBeenCalledTimes(1);

    await publisher.publish(opened);
    expect(connect).toHaveBeenCalledTimes(2);
  });
});
