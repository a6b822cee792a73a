export type CompensationPolicy = 'payment-only' | 'full';

export type EventPublisherKind = 'memory' | 'amqp';

export interface CheckoutConfig {
     reservationHoldMinutes: number;
     stepTimeoutMs: number;
     fallbackLocation: string;
     compensationPolicy: CompensationPolicy;
     eventPublisher: EventPublisherKind;
     amqpUrl: string;
}

function parsePositiveInt(value: string | undefined, fallback: number, name: string): number {
     if (value === undefined || value === '') return fallback;

     const parsed = parseInt(value, 10);
     if (!Number.isInteger(parsed) || parsed <= 0) {
          throw new Error(`${name} must be a positive integer, got "${value}"`);
     }
     return parsed;
}

function parseCompensationPolicy(value: string | undefined): CompensationPolicy {
     if (value === undefined || value === '' || value === 'payment-only') return 'payment-only';
     if (value === 'full') return 'full';
     throw new Error(`COMPENSATION_POLICY must be "payment-only" or "full", got "${value}"`);
}

function parseEventPublisher(value: string | undefined): EventPublisherKind {
     if (value === undefined || value === '' || value === 'memory') return 'memory';
     if (value === 'amqp') return 'amqp';
     throw new Error(`EVENT_PUBLISHER must be "memory" or "amqp", got "${value}"`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CheckoutConfig {
     return {
          reservationHoldMinutes: parsePositiveInt(
               env.RESERVATION_HOLD_MINUTES,
               30,
               'RESERVATION_HOLD_MINUTES'
          ),
          stepTimeoutMs: parsePositiveInt(env.STEP_TIMEOUT_MS, 5000, 'STEP_TIMEOUT_MS'),
          fallbackLocation: env.FALLBACK_LOCATION || 'WAREHOUSE',
          compensationPolicy: parseCompensationPolicy(env.COMPENSATION_POLICY),
          eventPublisher: parseEventPublisher(env.EVENT_PUBLISHER),
          amqpUrl: env.AMQP_URL || 'amqp://localhost:5672',
     };
}
