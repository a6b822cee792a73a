import pino, { LevelWithSilent, LoggerOptions } from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';

const loggerConfig: LoggerOptions = {
     level: process.env.LOG_LEVEL || 'info',
     formatters: {
          level: (label: string) => ({ level: label }),
     },
     serializers: {
          err: pino.stdSerializers.err,
     },
     base: {
          service: process.env.SERVICE_NAME || 'storefront-checkout',
          environment: process.env.NODE_ENV || 'production',
     },
};

if (isDevelopment) {
     loggerConfig.transport = {
          target: 'pino-pretty',
          options: {
               colorize: true,
               translateTime: 'HH:MM:ss Z',
               ignore: 'pid,hostname',
          },
     };
}

export const logger = pino(loggerConfig);

export type Logger = typeof logger;

export interface CheckoutLogContext {
     orderId: string;
     sessionId: string;
     customerId?: string;
}

/**
 * Logger for one checkout run. Every line carries the order, session and
 * customer under the `checkout` component; the level can be raised for a
 * single order without touching the root logger.
 */
export function checkoutLogger(
     context: CheckoutLogContext,
     level?: LevelWithSilent
): Logger {
     const { orderId, sessionId, customerId } = context;
     const child = logger.child({
          component: 'checkout',
          orderId,
          sessionId,
          customerId: customerId ?? null,
     });
     if (level) child.level = level;
     return child;
}
