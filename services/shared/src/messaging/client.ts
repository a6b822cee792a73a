import * as amqplib from 'amqplib';
import type { Channel } from 'amqplib';
import type { CheckoutConfig } from '../utils/config';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

export const CHECKOUT_EVENTS_EXCHANGE = 'checkout.events';

export interface PublishedEvent {
     routingKey: string;
     payload: Record<string, unknown>;
}

export interface EventPublisher {
     publish(routingKey: string, payload: Record<string, unknown>): Promise<void>;
     close(): Promise<void>;
}

export class InMemoryEventPublisher implements EventPublisher {
     readonly events: PublishedEvent[] = [];

     async publish(routingKey: string, payload: Record<string, unknown>): Promise<void> {
          this.events.push({ routingKey, payload });
          logger.debug({ routingKey }, 'Event recorded');
     }

     ofType(routingKey: string): Array<Record<string, unknown>> {
          return this.events.filter((e) => e.routingKey === routingKey).map((e) => e.payload);
     }

     async close(): Promise<void> {
          this.events.length = 0;
     }
}

export class AmqpEventPublisher implements EventPublisher {
     private connection: AmqpConnection | null = null;
     private channel: Channel | null = null;

     constructor(
          private readonly url: string,
          private readonly exchange: string = CHECKOUT_EVENTS_EXCHANGE
     ) {}

     private async getChannel(): Promise<Channel> {
          if (this.channel) return this.channel;

          if (!this.connection) {
               logger.info(
                    { url: this.url.replace(/:[^:]*@/, ':****@') },
                    'Connecting to RabbitMQ'
               );
               const connection = await amqplib.connect(this.url);

               connection.on('error', (err: Error) => {
                    logger.error({ err }, 'RabbitMQ connection error');
               });

               connection.on('close', () => {
                    logger.warn('RabbitMQ connection closed');
                    this.connection = null;
                    this.channel = null;
               });

               this.connection = connection;
          }

          const channel = await this.connection.createChannel();
          await channel.assertExchange(this.exchange, 'topic', { durable: true });
          this.channel = channel;

          logger.info({ exchange: this.exchange }, 'RabbitMQ channel created and configured');
          return channel;
     }

     async publish(routingKey: string, payload: Record<string, unknown>): Promise<void> {
          const channel = await this.getChannel();
          const content = Buffer.from(JSON.stringify(payload));

          channel.publish(this.exchange, routingKey, content, {
               persistent: true,
               contentType: 'application/json',
               timestamp: Date.now(),
          });
     }

     async close(): Promise<void> {
          if (this.channel) {
               await this.channel.close();
               this.channel = null;
          }
          if (this.connection) {
               await this.connection.close();
               this.connection = null;
          }
          logger.info('RabbitMQ connection closed');
     }
}

export function createEventPublisher(
     config: Pick<CheckoutConfig, 'eventPublisher' | 'amqpUrl'>
): EventPublisher {
     if (config.eventPublisher === 'amqp') {
          logger.info('Using AMQP event publisher');
          return new AmqpEventPublisher(config.amqpUrl);
     }

     logger.info('Using in-memory event publisher');
     return new InMemoryEventPublisher();
}

/** Publish without letting a broker failure reach the caller. */
export async function publishSafely(
     publisher: EventPublisher,
     routingKey: string,
     payload: Record<string, unknown>
): Promise<void> {
     try {
          await publisher.publish(routingKey, payload);
     } catch (err) {
          logger.error({ err, routingKey }, 'Failed to publish event');
     }
}
