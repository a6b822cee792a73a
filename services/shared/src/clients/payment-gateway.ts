import { randomUUID } from 'node:crypto';
import type { Agent, Task, TaskResult } from '../types/task.types';
import { logger } from '../utils/logger';
import { askCustomer, assertNever, failed, pending, succeeded } from '../utils/task-result';

export type PaymentMethod =
     | { method: 'card'; cardNumber?: string; token?: string }
     | { method: 'upi'; upiId: string }
     | { method: 'gift_card'; cardCode: string; mockBalance?: number }
     | { method: 'pos'; terminalId?: string };

export interface PaymentAuthorizePayload {
     amount: number;
     payment: PaymentMethod;
}

export interface PaymentCapturePayload {
     authId: string;
}

export interface PaymentRefundPayload {
     txId: string;
     amount?: number;
}

export interface PaymentStatusPayload {
     txId?: string;
     authId?: string;
}

export type PaymentRequest =
     | { type: 'PAYMENT_AUTHORIZE'; payload: PaymentAuthorizePayload }
     | { type: 'PAYMENT_CAPTURE'; payload: PaymentCapturePayload }
     | { type: 'PAYMENT_REFUND'; payload: PaymentRefundPayload }
     | { type: 'PAYMENT_STATUS'; payload: PaymentStatusPayload };

export type TransactionStatus = 'AUTHORIZED' | 'PENDING' | 'CAPTURED';

export interface PaymentRefund {
     refundId: string;
     amount: number;
     refundedAt: string;
}

export interface PaymentTransaction {
     txId: string;
     authId: string;
     method: PaymentMethod['method'];
     amount: number;
     status: TransactionStatus;
     createdAt: string;
     capturedAt?: string;
     refunds: PaymentRefund[];
}

export type PaymentGateway = Agent<PaymentRequest>;

export interface MockPaymentGatewayOptions {
     idGenerator?: () => string;
     clock?: () => Date;
}

/**
 * In-process gateway with deterministic approval rules per payment method.
 * Stands in for a real processor in the demo and in tests.
 */
export class MockPaymentGateway implements PaymentGateway {
     readonly name = 'payment' as const;
     private readonly transactions = new Map<string, PaymentTransaction>();
     private readonly idGenerator: () => string;
     private readonly clock: () => Date;

     constructor(options: MockPaymentGatewayOptions = {}) {
          this.idGenerator = options.idGenerator ?? (() => randomUUID().replace(/-/g, '').slice(0, 8));
          this.clock = options.clock ?? (() => new Date());
     }

     async handle(task: Task<PaymentRequest>): Promise<TaskResult> {
          switch (task.type) {
               case 'PAYMENT_AUTHORIZE':
                    return this.authorize(task.taskId, task.payload);
               case 'PAYMENT_CAPTURE':
                    return this.capture(task.taskId, task.payload);
               case 'PAYMENT_REFUND':
                    return this.refund(task.taskId, task.payload);
               case 'PAYMENT_STATUS':
                    return this.status(task.taskId, task.payload);
               default:
                    return assertNever(task);
          }
     }

     getTransaction(txId: string): PaymentTransaction | undefined {
          return this.transactions.get(txId);
     }

     listTransactions(): PaymentTransaction[] {
          return [...this.transactions.values()];
     }

     private authorize(taskId: string, payload: PaymentAuthorizePayload): TaskResult {
          const { amount, payment } = payload;

          if (!Number.isFinite(amount) || amount <= 0) {
               return failed(taskId, this.name, 'INVALID_AMOUNT', 'Amount must be > 0', { amount });
          }

          switch (payment.method) {
               case 'card':
                    return this.authorizeCard(taskId, amount, payment);
               case 'upi':
                    return this.authorizeUpi(taskId, amount, payment);
               case 'gift_card':
                    return this.authorizeGiftCard(taskId, amount, payment);
               case 'pos':
                    return this.record(taskId, amount, 'pos', 'AUTHORIZED');
               default:
                    return assertNever(payment);
          }
     }

     private authorizeCard(
          taskId: string,
          amount: number,
          payment: Extract<PaymentMethod, { method: 'card' }>
     ): TaskResult {
          const cardNumber = payment.cardNumber ?? '';

          if (cardNumber && cardNumber.length < 12) {
               return failed(
                    taskId,
                    this.name,
                    'INVALID_CARD',
                    'Card number too short',
                    {},
                    [askCustomer('Please re-enter card details.')]
               );
          }

          const source = cardNumber || payment.token || '';
          const last4 = source ? source.slice(-4) : '0000';

          if (last4 === '0000') {
               return failed(
                    taskId,
                    this.name,
                    'INSUFFICIENT_FUNDS',
                    'Card declined - insufficient funds',
                    { last4 },
                    [askCustomer('Your card was declined. Would you like to try UPI or another card?')]
               );
          }

          const lastDigit = parseInt(last4.slice(-1), 10);
          if (Number.isNaN(lastDigit) || lastDigit % 2 === 0) {
               return this.record(taskId, amount, 'card', 'AUTHORIZED');
          }

          return failed(
               taskId,
               this.name,
               'CARD_DECLINED',
               'Issuer declined the card',
               { last4 },
               [askCustomer('Card was declined. Try another payment method?')]
          );
     }

     private authorizeUpi(
          taskId: string,
          amount: number,
          payment: Extract<PaymentMethod, { method: 'upi' }>
     ): TaskResult {
          const { upiId } = payment;

          if (!upiId.includes('@')) {
               return failed(taskId, this.name, 'INVALID_UPI', 'UPI id looks invalid', { upiId }, [
                    askCustomer('Please check the UPI ID.'),
               ]);
          }

          if (upiId.includes('fail')) {
               return failed(taskId, this.name, 'UPI_FAILURE', 'UPI collect failed', { upiId }, [
                    askCustomer('UPI failed. Try another method?'),
               ]);
          }

          const tx = this.store(amount, 'upi', 'PENDING');
          return pending(
               taskId,
               this.name,
               { txId: tx.txId, authId: tx.authId, method: 'upi', status: 'COLLECT_REQUEST_SENT' },
               [askCustomer(`UPI collect request sent to ${upiId}. Please approve to continue.`)]
          );
     }

     private authorizeGiftCard(
          taskId: string,
          amount: number,
          payment: Extract<PaymentMethod, { method: 'gift_card' }>
     ): TaskResult {
          const balance = payment.mockBalance ?? 1000;
          if (balance < amount) {
               return failed(
                    taskId,
                    this.name,
                    'INSUFFICIENT_GIFT_BALANCE',
                    'Gift card balance too low',
                    { balance },
                    [askCustomer('Gift card low. Pay remainder via another method?')]
               );
          }
          return this.record(taskId, amount, 'gift_card', 'AUTHORIZED');
     }

     private record(
          taskId: string,
          amount: number,
          method: PaymentMethod['method'],
          status: TransactionStatus
     ): TaskResult {
          const tx = this.store(amount, method, status);
          return succeeded(taskId, this.name, { txId: tx.txId, authId: tx.authId, method, amount });
     }

     private store(
          amount: number,
          method: PaymentMethod['method'],
          status: TransactionStatus
     ): PaymentTransaction {
          const txId = `tx_${this.idGenerator()}`;
          const tx: PaymentTransaction = {
               txId,
               authId: `auth_${txId}`,
               method,
               amount,
               status,
               createdAt: this.clock().toISOString(),
               refunds: [],
          };
          this.transactions.set(txId, tx);
          logger.debug({ txId, method, status }, 'Payment transaction recorded');
          return tx;
     }

     private findByAuthId(authId: string | undefined): PaymentTransaction | undefined {
          if (!authId) return undefined;
          for (const tx of this.transactions.values()) {
               if (tx.authId === authId) return tx;
          }
          return undefined;
     }

     private capture(taskId: string, payload: PaymentCapturePayload): TaskResult {
          const tx = this.findByAuthId(payload.authId);
          if (!tx) {
               return failed(taskId, this.name, 'AUTH_NOT_FOUND', 'Authorization not found', {
                    authId: payload.authId,
               });
          }

          if (tx.status === 'CAPTURED') {
               return succeeded(taskId, this.name, { message: 'Already captured', tx: { ...tx } });
          }

          tx.status = 'CAPTURED';
          tx.capturedAt = this.clock().toISOString();
          return succeeded(taskId, this.name, { captureId: `cap_${tx.txId}`, tx: { ...tx } });
     }

     private refund(taskId: string, payload: PaymentRefundPayload): TaskResult {
          const tx = this.transactions.get(payload.txId);
          if (!tx) {
               return failed(taskId, this.name, 'TX_NOT_FOUND', 'Transaction not found', {
                    txId: payload.txId,
               });
          }

          if (tx.status !== 'CAPTURED' && tx.status !== 'AUTHORIZED') {
               return failed(
                    taskId,
                    this.name,
                    'REFUND_NOT_ALLOWED',
                    `Cannot refund tx in status ${tx.status}`,
                    { txId: tx.txId, status: tx.status }
               );
          }

          const refund: PaymentRefund = {
               refundId: `ref_${this.idGenerator()}`,
               amount: payload.amount ?? tx.amount,
               refundedAt: this.clock().toISOString(),
          };
          tx.refunds.push(refund);
          return succeeded(taskId, this.name, { refundId: refund.refundId, txId: tx.txId });
     }

     private status(taskId: string, payload: PaymentStatusPayload): TaskResult {
          const tx = payload.txId
               ? this.transactions.get(payload.txId)
               : this.findByAuthId(payload.authId);
          if (!tx) {
               return failed(taskId, this.name, 'TX_NOT_FOUND', 'Transaction not found');
          }
          return succeeded(taskId, this.name, {
               txId: tx.txId,
               status: tx.status,
               tx: { ...tx },
          });
     }
}
