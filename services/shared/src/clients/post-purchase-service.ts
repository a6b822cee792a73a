import { randomUUID } from 'node:crypto';
import type { AdjustStockRequest, StockEntry, StockLine } from '../types/inventory.types';
import type { Agent, Task, TaskResult } from '../types/task.types';
import { logger } from '../utils/logger';
import {
     assertNever,
     failed,
     failedFromError,
     notifyCustomer,
     succeeded,
} from '../utils/task-result';

export interface ReturnsInitiatePayload {
     orderId: string;
     items: StockLine[];
     reason?: string;
}

export interface ReturnsStatusPayload {
     returnId: string;
}

export interface ReturnsReceivePayload {
     returnId: string;
}

export interface FeedbackSubmitPayload {
     orderId: string;
     rating: number;
     comments?: string;
}

export interface WarrantyCheckPayload {
     sku: string;
     /** YYYY-MM-DD */
     purchaseDate: string;
}

export type PostPurchaseRequest =
     | { type: 'RETURNS_INITIATE'; payload: ReturnsInitiatePayload }
     | { type: 'RETURNS_STATUS'; payload: ReturnsStatusPayload }
     | { type: 'RETURNS_RECEIVE'; payload: ReturnsReceivePayload }
     | { type: 'FEEDBACK_SUBMIT'; payload: FeedbackSubmitPayload }
     | { type: 'WARRANTY_CHECK'; payload: WarrantyCheckPayload };

export type PostPurchaseService = Agent<PostPurchaseRequest>;

export type ReturnStatus = 'INITIATED' | 'RECEIVED';

export interface ReturnRecord {
     returnId: string;
     orderId: string;
     items: StockLine[];
     reason: string;
     status: ReturnStatus;
     createdAt: string;
     expectedCompleteAt: string;
     receivedAt?: string;
     restocked?: boolean;
}

export interface FeedbackRecord {
     orderId: string;
     rating: number;
     comments: string;
     customerId: string | null;
     createdAt: string;
}

/** Anything that can put units back on a shelf, normally the inventory ledger */
export interface Restocker {
     adjust(request: AdjustStockRequest): Promise<StockEntry>;
}

export interface MockPostPurchaseServiceOptions {
     restocker?: Restocker;
     /** Bucket credited when a returned item is restocked */
     returnLocation?: string;
     processingDays?: number;
     warrantyDays?: number;
     idGenerator?: () => string;
     clock?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Returns that cannot go back on sale */
const NOT_RESELLABLE = new Set(['defective', 'damaged']);

export class MockPostPurchaseService implements PostPurchaseService {
     readonly name = 'post_purchase' as const;
     private readonly returns = new Map<string, ReturnRecord>();
     private readonly feedback: FeedbackRecord[] = [];
     private readonly restocker?: Restocker;
     private readonly returnLocation: string;
     private readonly processingDays: number;
     private readonly warrantyDays: number;
     private readonly idGenerator: () => string;
     private readonly clock: () => Date;

     constructor(options: MockPostPurchaseServiceOptions = {}) {
          this.restocker = options.restocker;
          this.returnLocation = options.returnLocation ?? 'WAREHOUSE';
          this.processingDays = options.processingDays ?? 3;
          this.warrantyDays = options.warrantyDays ?? 365;
          this.idGenerator = options.idGenerator ?? (() => randomUUID().replace(/-/g, '').slice(0, 8));
          this.clock = options.clock ?? (() => new Date());
     }

     async handle(task: Task<PostPurchaseRequest>): Promise<TaskResult> {
          switch (task.type) {
               case 'RETURNS_INITIATE':
                    return this.initiateReturn(task.taskId, task.payload);
               case 'RETURNS_STATUS':
                    return this.returnStatus(task.taskId, task.payload);
               case 'RETURNS_RECEIVE':
                    return this.receiveReturn(task.taskId, task.payload);
               case 'FEEDBACK_SUBMIT':
                    return this.submitFeedback(task.taskId, task.customerId, task.payload);
               case 'WARRANTY_CHECK':
                    return this.checkWarranty(task.taskId, task.payload);
               default:
                    return assertNever(task);
          }
     }

     feedbackFor(orderId: string): FeedbackRecord[] {
          return this.feedback.filter((f) => f.orderId === orderId);
     }

     private initiateReturn(taskId: string, payload: ReturnsInitiatePayload): TaskResult {
          if (!payload.orderId || payload.items.length === 0) {
               return failed(taskId, this.name, 'MISSING_FIELDS', 'orderId and items required');
          }

          const now = this.clock();
          const returnId = `ret_${this.idGenerator()}`;
          const record: ReturnRecord = {
               returnId,
               orderId: payload.orderId,
               items: payload.items,
               reason: payload.reason ?? 'customer_request',
               status: 'INITIATED',
               createdAt: now.toISOString(),
               expectedCompleteAt: new Date(now.getTime() + this.processingDays * DAY_MS).toISOString(),
          };
          this.returns.set(returnId, record);

          return succeeded(
               taskId,
               this.name,
               { returnId, status: record.status, expectedCompleteAt: record.expectedCompleteAt },
               [
                    notifyCustomer(
                         `Return initiated (id: ${returnId}). We'll process it within ${this.processingDays} days.`
                    ),
               ]
          );
     }

     private returnStatus(taskId: string, payload: ReturnsStatusPayload): TaskResult {
          const record = this.returns.get(payload.returnId);
          if (!record) {
               return failed(taskId, this.name, 'INVALID_RETURN_ID', 'returnId invalid', {
                    returnId: payload.returnId,
               });
          }
          return succeeded(taskId, this.name, { ...record });
     }

     /** Goods arrived back; resellable items go back into stock */
     private async receiveReturn(taskId: string, payload: ReturnsReceivePayload): Promise<TaskResult> {
          const record = this.returns.get(payload.returnId);
          if (!record) {
               return failed(taskId, this.name, 'INVALID_RETURN_ID', 'returnId invalid', {
                    returnId: payload.returnId,
               });
          }
          if (record.status !== 'INITIATED') {
               return failed(taskId, this.name, 'RETURN_ALREADY_RECEIVED', 'Return was already received', {
                    returnId: record.returnId,
               });
          }

          // Claimed before the first await so a concurrent receive is refused
          record.status = 'RECEIVED';
          const restocker = NOT_RESELLABLE.has(record.reason) ? undefined : this.restocker;
          if (restocker) {
               try {
                    for (const item of record.items) {
                         await restocker.adjust({
                              sku: item.sku,
                              location: this.returnLocation,
                              delta: item.qty,
                              reason: `return ${record.returnId}`,
                         });
                    }
               } catch (error) {
                    logger.error({ err: error, returnId: record.returnId }, 'Restock of return failed');
                    record.status = 'INITIATED';
                    return failedFromError(taskId, this.name, error);
               }
          }

          record.receivedAt = this.clock().toISOString();
          record.restocked = restocker !== undefined;
          return succeeded(taskId, this.name, {
               returnId: record.returnId,
               status: record.status,
               restocked: record.restocked,
          });
     }

     private submitFeedback(
          taskId: string,
          customerId: string | undefined,
          payload: FeedbackSubmitPayload
     ): TaskResult {
          if (!payload.orderId) {
               return failed(taskId, this.name, 'MISSING_FIELDS', 'orderId required');
          }
          if (!Number.isInteger(payload.rating) || payload.rating < 1 || payload.rating > 5) {
               return failed(taskId, this.name, 'INVALID_RATING', 'rating must be an integer from 1 to 5', {
                    rating: payload.rating,
               });
          }

          this.feedback.push({
               orderId: payload.orderId,
               rating: payload.rating,
               comments: payload.comments ?? '',
               customerId: customerId ?? null,
               createdAt: this.clock().toISOString(),
          });
          return succeeded(taskId, this.name, { saved: true });
     }

     private checkWarranty(taskId: string, payload: WarrantyCheckPayload): TaskResult {
          if (!payload.sku || !payload.purchaseDate) {
               return failed(taskId, this.name, 'MISSING_FIELDS', 'sku and purchaseDate required');
          }

          const purchased = new Date(`${payload.purchaseDate}T00:00:00.000Z`);
          if (!ISO_DATE.test(payload.purchaseDate) || Number.isNaN(purchased.getTime())) {
               return failed(taskId, this.name, 'INVALID_DATE', 'purchaseDate must be ISO YYYY-MM-DD', {
                    purchaseDate: payload.purchaseDate,
               });
          }

          const expires = new Date(purchased.getTime() + this.warrantyDays * DAY_MS);
          return succeeded(taskId, this.name, {
               sku: payload.sku,
               warrantyValid: expires.getTime() > this.clock().getTime(),
               warrantyExpiresOn: expires.toISOString().slice(0, 10),
          });
     }
}
