import type { ErrorDetail } from '../types/task.types';

// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400,
          public readonly details: Record<string, unknown> = {}
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class InsufficientStockError extends DomainError {
     constructor(
          public readonly sku: string,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(
               `SKU ${sku} insufficient: requested ${requested}, available ${available}`,
               'INSUFFICIENT_STOCK',
               409,
               { sku, requested, available }
          );
     }
}

export class InvalidReservationError extends DomainError {
     constructor(public readonly reservationId: string | undefined) {
          super('Reservation missing or invalid', 'INVALID_RESERVATION', 404, {
               reservationId: reservationId ?? null,
          });
     }
}

export class MissingFieldsError extends DomainError {
     constructor(public readonly fields: string[]) {
          super(`Missing or invalid fields: ${fields.join(', ')}`, 'MISSING_FIELDS', 400, {
               fields,
          });
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(message: string, details: Record<string, unknown> = {}) {
          super(message, 'INVALID_QUANTITY', 400, details);
     }
}

export class SkuNotFoundError extends DomainError {
     constructor(public readonly sku: string) {
          super(`SKU ${sku} not found`, 'SKU_NOT_FOUND', 404, { sku });
     }
}

export class OrderAlreadyReservedError extends DomainError {
     constructor(
          public readonly orderId: string,
          public readonly reservationId: string
     ) {
          super(
               `Order ${orderId} already holds reservation ${reservationId}`,
               'ORDER_ALREADY_RESERVED',
               409,
               { orderId, reservationId }
          );
     }
}

export class OrderNotReservedError extends DomainError {
     constructor(public readonly orderId: string) {
          super(`Order ${orderId} holds no reservation`, 'ORDER_NOT_RESERVED', 404, { orderId });
     }
}

export class InvalidStockEntryError extends DomainError {
     constructor(
          public readonly sku: string,
          message: string
     ) {
          super(message, 'INVALID_STOCK_ENTRY', 400, { sku });
     }
}

export class StepTimeoutError extends DomainError {
     constructor(
          public readonly step: string,
          public readonly timeoutMs: number
     ) {
          super(`${step} timed out after ${timeoutMs}ms`, 'STEP_TIMEOUT', 504, { step, timeoutMs });
     }
}

export function toErrorDetail(error: unknown): ErrorDetail {
     if (error instanceof DomainError) {
          return { code: error.code, message: error.message, details: error.details };
     }

     return {
          code: 'INTERNAL_ERROR',
          message: error instanceof Error ? error.message : 'Unknown error',
          details: {},
     };
}
