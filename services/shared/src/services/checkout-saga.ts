import { randomUUID } from 'node:crypto';
import type { FulfillmentService } from '../clients/fulfillment-service';
import type { LoyaltyService } from '../clients/loyalty-service';
import type { PaymentGateway } from '../clients/payment-gateway';
import type { RecommendationService } from '../clients/recommendation-service';
import type { EventPublisher } from '../messaging/client';
import { publishSafely } from '../messaging/client';
import type {
     CartItem,
     CheckoutFailure,
     CheckoutPending,
     CheckoutRequest,
     CheckoutResult,
     CheckoutSuccess,
     CompensationAction,
     FailureReason,
     OutstandingAction,
     PendingCheckoutRef,
     SagaState,
     SagaStep,
} from '../types/checkout.types';
import type { InventoryRequest, StockLine } from '../types/inventory.types';
import type { Agent, ErrorDetail, TaskResult, TaskStatus } from '../types/task.types';
import type { CompensationPolicy } from '../utils/config';
import { DomainError, toErrorDetail } from '../utils/errors';
import { checkoutLogger, Logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

export interface CheckoutCollaborators {
     inventory: Agent<InventoryRequest>;
     payment: PaymentGateway;
     fulfillment: FulfillmentService;
     loyalty: LoyaltyService;
     recommendation: RecommendationService;
}

export interface CheckoutSagaOptions {
     stepTimeoutMs?: number;
     compensationPolicy?: CompensationPolicy;
     holdMinutes?: number;
     publisher?: EventPublisher;
     idGenerator?: () => string;
}

interface Compensation {
     step: SagaStep;
     action: CompensationAction;
     reference: string;
     run: () => Promise<TaskResult>;
}

type StepOutcome = Omit<TaskResult, 'taskId'>;

function readString(payload: Record<string, unknown>, key: string): string | undefined {
     const value = payload[key];
     return typeof value === 'string' && value !== '' ? value : undefined;
}

function toLines(cart: CartItem[]): StockLine[] {
     return cart.map((item) => ({ sku: item.sku, qty: item.qty }));
}

function hasCode(outcome: StepOutcome, code: string): boolean {
     return outcome.errors.some((e) => e.code === code);
}

function orderAmount(cart: CartItem[]): number {
     return cart.reduce((sum, item) => sum + item.price * item.qty, 0);
}

/**
 * State of one checkout call: the step log and the compensation stack. Never
 * shared between calls.
 */
class SagaRun {
     readonly state: SagaState;
     readonly log: Logger;
     private readonly compensations: Compensation[] = [];

     constructor(
          orderId: string,
          sessionId: string,
          readonly customerId: string,
          private readonly stepTimeoutMs: number,
          private readonly nextId: () => string
     ) {
          this.state = { sessionId, orderId, log: [], compensated: false, compensations: [] };
          this.log = checkoutLogger({ orderId, sessionId, customerId });
     }

     get orderId(): string {
          return this.state.orderId;
     }

     /**
      * Send one task to a collaborator. Thrown errors and timeouts come back as
      * a failed result so every step has a structured outcome.
      */
     async call<TRequest extends { type: string; payload: unknown }>(
          step: SagaStep,
          agent: Agent<TRequest>,
          request: TRequest,
          required = true
     ): Promise<TaskResult> {
          const task = {
               ...request,
               taskId: this.nextId(),
               sessionId: this.state.sessionId,
               customerId: this.customerId,
          };
          const startedAt = Date.now();

          let result: TaskResult;
          try {
               result = await withTimeout(agent.handle(task), this.stepTimeoutMs, step);
          } catch (error) {
               const detail: ErrorDetail =
                    error instanceof DomainError
                         ? toErrorDetail(error)
                         : {
                                code: 'COLLABORATOR_ERROR',
                                message: error instanceof Error ? error.message : 'Unknown error',
                                details: { step, agent: agent.name },
                           };
               this.log.error({ err: error, step }, 'Collaborator call raised');
               result = {
                    taskId: task.taskId,
                    agent: agent.name,
                    status: 'failed',
                    payload: {},
                    errors: [detail],
                    nextActions: [],
               };
          }

          this.state.log.push({
               step,
               required,
               status: result.status,
               payload: result.payload,
               errors: result.errors,
               durationMs: Date.now() - startedAt,
          });

          if (result.status === 'failed') {
               const level = required ? 'warn' : 'debug';
               this.log[level]({ step, errors: result.errors }, 'Step failed');
          } else {
               this.log.debug({ step, status: result.status }, 'Step completed');
          }

          return result;
     }

     pushCompensation(compensation: Compensation): void {
          this.compensations.push(compensation);
     }

     /** Run every registered compensation, most recent first */
     async compensate(failedStep: SagaStep): Promise<void> {
          this.state.compensated = true;
          this.log.info({ failedStep, count: this.compensations.length }, 'Compensating');

          while (this.compensations.length > 0) {
               const compensation = this.compensations.pop();
               if (!compensation) break;

               let status: TaskStatus;
               let errors: ErrorDetail[];
               try {
                    const result = await withTimeout(
                         compensation.run(),
                         this.stepTimeoutMs,
                         compensation.step
                    );
                    status = result.status;
                    errors = result.errors;
               } catch (error) {
                    status = 'failed';
                    errors = [toErrorDetail(error)];
               }

               this.state.compensations.push({
                    step: compensation.step,
                    action: compensation.action,
                    reference: compensation.reference,
                    status,
                    errors,
               });

               if (status !== 'success') {
                    this.log.error(
                         { action: compensation.action, reference: compensation.reference, errors },
                         'Compensation failed'
                    );
               }
          }
     }

     /** Side effects still in place: never compensated, or compensation failed */
     outstanding(): OutstandingAction[] {
          const pendingCompensations = this.compensations.map(({ step, action, reference }) => ({
               step,
               action,
               reference,
          }));
          const failedCompensations = this.state.compensations
               .filter((c) => c.status !== 'success')
               .map(({ step, action, reference }) => ({ step, action, reference }));
          return [...pendingCompensations, ...failedCompensations];
     }
}

/**
 * Drives one checkout across inventory, payment, fulfillment and loyalty as a
 * sequential saga. Every call ends in exactly one of success, pending or
 * failed; nothing is thrown to the caller.
 */
export class CheckoutSaga {
     private readonly stepTimeoutMs: number;
     private readonly compensationPolicy: CompensationPolicy;
     private readonly holdMinutes: number;
     private readonly publisher?: EventPublisher;
     private readonly nextId: () => string;
     /** Orders with a re-drive or cancel in flight */
     private readonly settling = new Set<string>();

     constructor(
          private readonly collaborators: CheckoutCollaborators,
          options: CheckoutSagaOptions = {}
     ) {
          this.stepTimeoutMs = options.stepTimeoutMs ?? 5000;
          this.compensationPolicy = options.compensationPolicy ?? 'payment-only';
          this.holdMinutes = options.holdMinutes ?? 30;
          this.publisher = options.publisher;
          this.nextId = options.idGenerator ?? (() => randomUUID());
     }

     async checkout(request: CheckoutRequest): Promise<CheckoutResult> {
          const { inventory, payment, recommendation, loyalty } = this.collaborators;
          const orderId = `order_${this.nextId()}`;
          const run = new SagaRun(
               orderId,
               this.nextId(),
               request.customerId,
               this.stepTimeoutMs,
               this.nextId
          );
          const items = toLines(request.cart);
          const amount = orderAmount(request.cart);

          run.log.info({ lineCount: request.cart.length, amount }, 'Checkout started');

          const checked = await run.call('CHECK_INVENTORY', inventory, {
               type: 'INVENTORY_CHECK',
               payload: { items, preferredLocation: request.preferredLocation },
          });
          if (checked.status !== 'success') {
               return this.fail(run, 'inventory_unavailable', checked);
          }

          const recommended = await run.call(
               'RECOMMEND',
               recommendation,
               { type: 'RECOMMEND_FOR_CART', payload: { cart: items } },
               false
          );

          const quoted = await run.call(
               'LOYALTY_CALCULATE',
               loyalty,
               { type: 'LOYALTY_CALCULATE', payload: { orderAmount: amount } },
               false
          );

          const reserved = await run.call('RESERVE', inventory, {
               type: 'INVENTORY_RESERVE',
               payload: { orderId, items, holdForMinutes: this.holdMinutes },
          });
          const reservationId = readString(reserved.payload, 'reservationId');
          if (reserved.status !== 'success' || !reservationId) {
               // The ledger may still commit a reservation nobody holds an id for
               if (reserved.status === 'success' || hasCode(reserved, 'STEP_TIMEOUT')) {
                    this.registerOrderRelease(run, orderId);
                    await run.compensate('RESERVE');
               }
               return this.fail(run, 'reserve_failed', reserved);
          }
          this.registerRelease(run, reservationId);

          const authorized = await run.call('AUTHORIZE_PAYMENT', payment, {
               type: 'PAYMENT_AUTHORIZE',
               payload: { amount, payment: request.payment },
          });
          const authId = readString(authorized.payload, 'authId');
          const txId = readString(authorized.payload, 'txId');

          if (authorized.status === 'failed' || !authId || !txId) {
               await run.compensate('AUTHORIZE_PAYMENT');
               return this.fail(run, 'payment_failed', authorized);
          }

          const ref: PendingCheckoutRef = {
               orderId,
               sessionId: run.state.sessionId,
               customerId: request.customerId,
               reservationId,
               authId,
               txId,
               amount,
               cart: request.cart,
               address: request.address,
               fulfillmentMode: request.fulfillmentMode ?? 'ship_to_home',
               storeId: request.storeId,
          };

          if (authorized.status === 'pending') {
               const result: CheckoutPending = {
                    status: 'pending',
                    orderId,
                    payment: authorized.payload,
                    nextActions: authorized.nextActions,
                    resume: ref,
                    saga: run.state,
               };
               run.log.info({ authId }, 'Checkout pending on payment confirmation');
               await this.publish('checkout.CheckoutPending', { orderId, authId, reservationId });
               return result;
          }

          this.registerRefund(run, txId);

          return this.settle(run, ref, {
               inventory: checked.payload,
               recommendations: recommended.status === 'success' ? recommended.payload : {},
               loyaltyQuote: quoted.status === 'success' ? quoted.payload : {},
               reservation: reserved.payload,
               authorization: authorized.payload,
          });
     }

     /**
      * Re-drive a checkout that stopped on a pending payment: capture,
      * fulfillment and loyalty, with the same failure handling as `checkout`.
      * Refused when the reservation is gone or the payment was already
      * captured, so a cancelled or completed checkout is never settled again.
      */
     async completePending(ref: PendingCheckoutRef): Promise<CheckoutResult> {
          const run = this.resumeRun(ref);
          if (this.settling.has(ref.orderId)) {
               return this.busy(run, 'capture_failed');
          }

          this.settling.add(ref.orderId);
          try {
               run.log.info({ authId: ref.authId }, 'Resuming pending checkout');

               const held = await run.call('VERIFY_PENDING', this.collaborators.inventory, {
                    type: 'INVENTORY_GET',
                    payload: { reservationId: ref.reservationId },
               });
               if (held.status !== 'success') {
                    return await this.fail(run, 'capture_failed', held);
               }
               const uncaptured = await this.verifyUncaptured(run, ref);
               if (uncaptured) {
                    return await this.fail(run, 'capture_failed', uncaptured);
               }

               this.registerRelease(run, ref.reservationId);
               this.registerRefund(run, ref.txId);

               return await this.settle(run, ref, {
                    inventory: {},
                    recommendations: {},
                    loyaltyQuote: {},
                    reservation: { reservationId: ref.reservationId },
                    authorization: { authId: ref.authId, txId: ref.txId },
               });
          } finally {
               this.settling.delete(ref.orderId);
          }
     }

     /** Abandon a pending checkout and give its reservation back */
     async cancelPending(ref: PendingCheckoutRef): Promise<CheckoutFailure> {
          const run = this.resumeRun(ref);
          if (this.settling.has(ref.orderId)) {
               return this.busy(run, 'payment_failed');
          }

          this.settling.add(ref.orderId);
          try {
               // An unreadable status still cancels; only a capture keeps the reservation
               const captured = await this.verifyUncaptured(run, ref);
               if (captured && hasCode(captured, 'ALREADY_CAPTURED')) {
                    return await this.fail(run, 'payment_failed', captured);
               }

               this.registerRelease(run, ref.reservationId);
               await run.compensate('AUTHORIZE_PAYMENT');

               const cancelled: StepOutcome = {
                    agent: 'payment',
                    status: 'failed',
                    payload: { authId: ref.authId },
                    errors: [
                         {
                              code: 'PAYMENT_CANCELLED',
                              message: 'Pending payment was not confirmed',
                              details: { authId: ref.authId },
                         },
                    ],
                    nextActions: [],
               };
               return await this.fail(run, 'payment_failed', cancelled);
          } finally {
               this.settling.delete(ref.orderId);
          }
     }

     private resumeRun(ref: PendingCheckoutRef): SagaRun {
          return new SagaRun(
               ref.orderId,
               ref.sessionId,
               ref.customerId,
               this.stepTimeoutMs,
               this.nextId
          );
     }

     /** A failed outcome when the transaction is already captured */
     private async verifyUncaptured(
          run: SagaRun,
          ref: PendingCheckoutRef
     ): Promise<StepOutcome | undefined> {
          const status = await run.call('VERIFY_PENDING', this.collaborators.payment, {
               type: 'PAYMENT_STATUS',
               payload: { txId: ref.txId },
          });
          if (status.status !== 'success') {
               return status;
          }
          if (readString(status.payload, 'status') !== 'CAPTURED') {
               return undefined;
          }
          return {
               agent: 'payment',
               status: 'failed',
               payload: status.payload,
               errors: [
                    {
                         code: 'ALREADY_CAPTURED',
                         message: `Transaction ${ref.txId} was already captured`,
                         details: { txId: ref.txId },
                    },
               ],
               nextActions: [],
          };
     }

     /** Another re-drive or cancel of the same order is running; nothing is touched */
     private busy(run: SagaRun, reason: FailureReason): CheckoutFailure {
          run.log.warn('Pending checkout already being settled');
          return {
               status: 'failed',
               orderId: run.orderId,
               reason,
               detail: [
                    {
                         code: 'CHECKOUT_IN_PROGRESS',
                         message: `Order ${run.orderId} is already being settled`,
                         details: { orderId: run.orderId },
                    },
               ],
               payload: {},
               nextActions: [],
               outstanding: [],
               saga: run.state,
          };
     }

     private async settle(
          run: SagaRun,
          ref: PendingCheckoutRef,
          earlier: Pick<
               CheckoutSuccess,
               'inventory' | 'recommendations' | 'loyaltyQuote' | 'reservation' | 'authorization'
          >
     ): Promise<CheckoutResult> {
          const { payment, fulfillment, loyalty } = this.collaborators;

          const captured = await run.call('CAPTURE_PAYMENT', payment, {
               type: 'PAYMENT_CAPTURE',
               payload: { authId: ref.authId },
          });
          if (captured.status !== 'success') {
               return this.failAfterPayment(run, 'CAPTURE_PAYMENT', 'capture_failed', captured);
          }

          const fulfilled = await run.call('CREATE_FULFILLMENT', fulfillment, {
               type: 'FULFILLMENT_CREATE',
               payload: {
                    orderId: ref.orderId,
                    items: toLines(ref.cart),
                    address: ref.address,
                    mode: ref.fulfillmentMode,
                    inventoryConfirmed: true,
                    storeId: ref.storeId,
               },
          });
          if (fulfilled.status !== 'success') {
               return this.failAfterPayment(run, 'CREATE_FULFILLMENT', 'fulfillment_failed', fulfilled);
          }

          const issued = await run.call(
               'ISSUE_LOYALTY',
               loyalty,
               { type: 'LOYALTY_ISSUE', payload: { orderId: ref.orderId, orderAmount: ref.amount } },
               false
          );

          const result: CheckoutSuccess = {
               status: 'success',
               orderId: ref.orderId,
               ...earlier,
               payment: captured.payload,
               fulfillment: fulfilled.payload,
               loyalty: issued.status === 'success' ? issued.payload : {},
               nextActions: fulfilled.nextActions,
               saga: run.state,
          };

          run.log.info('Checkout completed');
          await this.publish('checkout.CheckoutCompleted', {
               orderId: ref.orderId,
               customerId: ref.customerId,
               amount: ref.amount,
               reservationId: ref.reservationId,
          });
          return result;
     }

     private async failAfterPayment(
          run: SagaRun,
          step: SagaStep,
          reason: FailureReason,
          outcome: TaskResult
     ): Promise<CheckoutFailure> {
          if (this.compensationPolicy === 'full') {
               await run.compensate(step);
          }
          return this.fail(run, reason, outcome);
     }

     private registerRelease(run: SagaRun, reservationId: string): void {
          run.pushCompensation({
               step: 'RESERVE',
               action: 'RELEASE_RESERVATION',
               reference: reservationId,
               run: () =>
                    this.collaborators.inventory.handle({
                         type: 'INVENTORY_RELEASE',
                         payload: { reservationId },
                         taskId: this.nextId(),
                         sessionId: run.state.sessionId,
                         customerId: run.customerId,
                    }),
          });
     }

     /** Release keyed by order, for a reserve whose outcome is unknown */
     private registerOrderRelease(run: SagaRun, orderId: string): void {
          run.pushCompensation({
               step: 'RESERVE',
               action: 'RELEASE_RESERVATION',
               reference: orderId,
               run: () =>
                    this.collaborators.inventory.handle({
                         type: 'INVENTORY_RELEASE_ORDER',
                         payload: { orderId },
                         taskId: this.nextId(),
                         sessionId: run.state.sessionId,
                         customerId: run.customerId,
                    }),
          });
     }

     private registerRefund(run: SagaRun, txId: string): void {
          run.pushCompensation({
               step: 'AUTHORIZE_PAYMENT',
               action: 'REFUND_PAYMENT',
               reference: txId,
               run: () =>
                    this.collaborators.payment.handle({
                         type: 'PAYMENT_REFUND',
                         payload: { txId },
                         taskId: this.nextId(),
                         sessionId: run.state.sessionId,
                         customerId: run.customerId,
                    }),
          });
     }

     private async fail(
          run: SagaRun,
          reason: FailureReason,
          outcome: StepOutcome
     ): Promise<CheckoutFailure> {
          const detail: ErrorDetail[] =
               outcome.errors.length > 0
                    ? outcome.errors
                    : [
                           {
                                code: 'MALFORMED_RESPONSE',
                                message: `${outcome.agent} returned ${outcome.status} without the expected references`,
                                details: { payload: outcome.payload },
                           },
                      ];

          const result: CheckoutFailure = {
               status: 'failed',
               orderId: run.orderId,
               reason,
               detail,
               payload: outcome.payload,
               nextActions: outcome.nextActions,
               outstanding: run.outstanding(),
               saga: run.state,
          };

          run.log.warn(
               { reason, codes: detail.map((d) => d.code), outstanding: result.outstanding.length },
               'Checkout failed'
          );
          await this.publish('checkout.CheckoutFailed', {
               orderId: run.orderId,
               reason,
               codes: detail.map((d) => d.code),
               compensated: run.state.compensated,
          });
          return result;
     }

     private async publish(routingKey: string, payload: Record<string, unknown>): Promise<void> {
          if (this.publisher) {
               await publishSafely(this.publisher, routingKey, payload);
          }
     }
}
