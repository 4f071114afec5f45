import { randomUUID } from 'node:crypto';

import type { ChannelModel, ConfirmChannel } from 'amqplib';
import amqp from 'amqplib';

import { config } from '../config';
import { logger } from '../logger';

import type { IEventBus } from './IEventBus';

interface RabbitMqEventBusOptions {
  url: string;
  exchange: string;
}

export class RabbitMqEventBus implements IEventBus {
  private connection: ChannelModel | null = null;
  private channel: ConfirmChannel | null = null;
  private connecting: Promise<ConfirmChannel> | null = null;

  constructor(private readonly options: RabbitMqEventBusOptions) {}

  async publish<T>(eventName: string, payload: T): Promise<void> {
    try {
      const channel = await this.ensureChannel();

      const envelope = {
        id: randomUUID(),
        event: eventName,
        occurredAt: new Date().toISOString(),
        payload
      };

      await new Promise<void>((resolve, reject) => {
        channel.publish(
          this.options.exchange,
          eventName,
          Buffer.from(JSON.stringify(envelope)),
          {
            contentType: 'application/json',
            persistent: true,
            messageId: envelope.id,
            type: eventName
          },
          (err: unknown) => {
            if (err) {
              reject(err);
            } else {
              resolve();
            }
          }
        );
      });
    } catch (error) {
      logger.error({ err: error, eventName }, 'Failed to publish event to RabbitMQ');
      if (config.NODE_ENV === 'production') {
        throw error;
      }
    }
  }

  private async ensureChannel(): Promise<ConfirmChannel> {
    if (this.channel) {
      return this.channel;
    }

    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }

    return this.connecting;
  }

  private async connect(): Promise<ConfirmChannel> {
    try {
      const connection = await amqp.connect(this.options.url);
      const channel = await connection.createConfirmChannel();
      await channel.assertExchange(this.options.exchange, 'topic', { durable: true });

      connection.on('error', (error: unknown) => {
        logger.error({ err: error }, 'RabbitMQ connection error');
        this.reset();
      });

      connection.on('close', () => {
        logger.warn('RabbitMQ connection closed');
        this.reset();
      });

      this.connection = connection;
      this.channel = channel;
      return channel;
    } catch (error) {
      logger.error({ err: error }, 'Failed to establish RabbitMQ connection');
      this.reset();
      throw error;
    }
  }

  private reset(): void {
    this.channel?.removeAllListeners();
    this.connection?.removeAllListeners();
    this.channel = null;
    this.connection = null;
  }
}
