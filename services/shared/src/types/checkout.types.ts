import type { Address, FulfillmentMode } from '../clients/fulfillment-service';
import type { PaymentMethod } from '../clients/payment-gateway';
import type { ErrorDetail, NextAction, TaskStatus } from './task.types';

export interface CartItem {
     sku: string;
     qty: number;
     price: number;
}

export interface CheckoutRequest {
     cart: CartItem[];
     customerId: string;
     payment: PaymentMethod;
     address: Address;
     preferredLocation?: string;
     fulfillmentMode?: FulfillmentMode;
     storeId?: string;
}

export type SagaStep =
     | 'CHECK_INVENTORY'
     | 'RECOMMEND'
     | 'LOYALTY_CALCULATE'
     | 'RESERVE'
     | 'AUTHORIZE_PAYMENT'
     | 'VERIFY_PENDING'
     | 'CAPTURE_PAYMENT'
     | 'CREATE_FULFILLMENT'
     | 'ISSUE_LOYALTY';

export type FailureReason =
     | 'inventory_unavailable'
     | 'reserve_failed'
     | 'payment_failed'
     | 'capture_failed'
     | 'fulfillment_failed';

export type CompensationAction = 'RELEASE_RESERVATION' | 'REFUND_PAYMENT';

export interface StepRecord {
     step: SagaStep;
     required: boolean;
     status: TaskStatus;
     payload: Record<string, unknown>;
     errors: ErrorDetail[];
     durationMs: number;
}

export interface CompensationRecord {
     step: SagaStep;
     action: CompensationAction;
     reference: string;
     status: TaskStatus;
     errors: ErrorDetail[];
}

/** A side effect that is still in place after the saga stopped */
export interface OutstandingAction {
     step: SagaStep;
     action: CompensationAction;
     reference: string;
}

export interface SagaState {
     sessionId: string;
     orderId: string;
     log: StepRecord[];
     compensated: boolean;
     compensations: CompensationRecord[];
}

/** Everything needed to re-drive a checkout that stopped on a pending payment */
export interface PendingCheckoutRef {
     orderId: string;
     sessionId: string;
     customerId: string;
     reservationId: string;
     authId: string;
     txId: string;
     amount: number;
     cart: CartItem[];
     address: Address;
     fulfillmentMode: FulfillmentMode;
     storeId?: string;
}

export interface CheckoutSuccess {
     status: 'success';
     orderId: string;
     inventory: Record<string, unknown>;
     recommendations: Record<string, unknown>;
     loyaltyQuote: Record<string, unknown>;
     reservation: Record<string, unknown>;
     authorization: Record<string, unknown>;
     payment: Record<string, unknown>;
     fulfillment: Record<string, unknown>;
     loyalty: Record<string, unknown>;
     nextActions: NextAction[];
     saga: SagaState;
}

export interface CheckoutPending {
     status: 'pending';
     orderId: string;
     payment: Record<string, unknown>;
     nextActions: NextAction[];
     resume: PendingCheckoutRef;
     saga: SagaState;
}

export interface CheckoutFailure {
     status: 'failed';
     orderId: string;
     reason: FailureReason;
     detail: ErrorDetail[];
     payload: Record<string, unknown>;
     nextActions: NextAction[];
     outstanding: OutstandingAction[];
     saga: SagaState;
}

export type CheckoutResult = CheckoutSuccess | CheckoutPending | CheckoutFailure;
