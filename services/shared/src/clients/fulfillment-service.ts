import { randomUUID } from 'node:crypto';
import type { StockLine } from '../types/inventory.types';
import type { Agent, Task, TaskResult } from '../types/task.types';
import { assertNever, callAgent, failed, notifyCustomer, succeeded } from '../utils/task-result';

export type FulfillmentMode = 'ship_to_home' | 'click_and_collect';

export type FulfillmentStatus =
     | 'SCHEDULED'
     | 'READY_SOON'
     | 'SHIPPED'
     | 'DELIVERED'
     | 'COLLECTED'
     | 'CANCELLED';

export interface Address {
     line1?: string;
     city?: string;
     pincode?: string;
}

export interface FulfillmentCreatePayload {
     orderId: string;
     items: StockLine[];
     address: Address;
     mode: FulfillmentMode;
     inventoryConfirmed: boolean;
     storeId?: string;
}

export interface FulfillmentUpdateStatusPayload {
     fulfillmentId: string;
     status: FulfillmentStatus;
}

export interface FulfillmentCancelPayload {
     fulfillmentId: string;
     reason?: string;
}

export interface FulfillmentGetPayload {
     fulfillmentId?: string;
}

export type FulfillmentRequest =
     | { type: 'FULFILLMENT_CREATE'; payload: FulfillmentCreatePayload }
     | { type: 'FULFILLMENT_UPDATE_STATUS'; payload: FulfillmentUpdateStatusPayload }
     | { type: 'FULFILLMENT_CANCEL'; payload: FulfillmentCancelPayload }
     | { type: 'FULFILLMENT_GET'; payload: FulfillmentGetPayload };

export interface FulfillmentRecord {
     fulfillmentId: string;
     orderId: string;
     mode: FulfillmentMode;
     status: FulfillmentStatus;
     eta: string;
     slot: string;
     storeId: string | null;
     items: StockLine[];
     createdAt: string;
     updatedAt?: string;
     cancelReason?: string;
}

export type FulfillmentService = Agent<FulfillmentRequest>;

export interface MockFulfillmentServiceOptions {
     /** Pickup capacity per store, in iteration order */
     storeCapacity?: Record<string, number>;
     /** Cities served by express delivery (lower case) */
     expressCities?: string[];
     idGenerator?: () => string;
     clock?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class MockFulfillmentService implements FulfillmentService {
     readonly name = 'fulfillment' as const;
     private readonly records = new Map<string, FulfillmentRecord>();
     private readonly storeCapacity: Map<string, number>;
     private readonly expressCities: Set<string>;
     private readonly idGenerator: () => string;
     private readonly clock: () => Date;

     constructor(options: MockFulfillmentServiceOptions = {}) {
          this.storeCapacity = new Map(Object.entries(options.storeCapacity ?? { WAREHOUSE: 100 }));
          this.expressCities = new Set(options.expressCities ?? []);
          this.idGenerator = options.idGenerator ?? (() => randomUUID().replace(/-/g, '').slice(0, 8));
          this.clock = options.clock ?? (() => new Date());
     }

     async handle(task: Task<FulfillmentRequest>): Promise<TaskResult> {
          switch (task.type) {
               case 'FULFILLMENT_CREATE':
                    return this.create(task.taskId, task.payload);
               case 'FULFILLMENT_UPDATE_STATUS':
                    return this.updateStatus(task.taskId, task.payload);
               case 'FULFILLMENT_CANCEL':
                    return this.cancel(task.taskId, task.payload);
               case 'FULFILLMENT_GET':
                    return this.get(task.taskId, task.payload);
               default:
                    return assertNever(task);
          }
     }

     listFulfillments(): FulfillmentRecord[] {
          return [...this.records.values()];
     }

     private datePlusDays(days: number): string {
          return new Date(this.clock().getTime() + days * DAY_MS).toISOString().slice(0, 10);
     }

     private create(taskId: string, payload: FulfillmentCreatePayload): TaskResult {
          if (!payload.orderId || payload.items.length === 0) {
               return failed(taskId, this.name, 'MISSING_FIELDS', 'orderId and items required');
          }

          if (!payload.inventoryConfirmed) {
               return failed(
                    taskId,
                    this.name,
                    'INVENTORY_NOT_CONFIRMED',
                    'Inventory must be confirmed before fulfillment',
                    {},
                    [callAgent('Ask inventory to confirm or reserve stock.', { agent: 'inventory' })]
               );
          }

          const fulfillmentId = `ful_${this.idGenerator()}`;
          const createdAt = this.clock().toISOString();

          if (payload.mode === 'ship_to_home') {
               const city = (payload.address.city ?? '').toLowerCase();
               const eta = this.datePlusDays(this.expressCities.has(city) ? 2 : 4);
               const record: FulfillmentRecord = {
                    fulfillmentId,
                    orderId: payload.orderId,
                    mode: 'ship_to_home',
                    status: 'SCHEDULED',
                    eta,
                    slot: '10:00-14:00',
                    storeId: null,
                    items: payload.items,
                    createdAt,
               };
               this.records.set(fulfillmentId, record);
               return succeeded(taskId, this.name, { ...record }, [
                    notifyCustomer(`Your order will be delivered by ${eta} between ${record.slot}.`),
               ]);
          }

          const storeId =
               payload.storeId ??
               [...this.storeCapacity.entries()].find(([, capacity]) => capacity > 0)?.[0];
          const capacity = storeId !== undefined ? this.storeCapacity.get(storeId) : undefined;
          if (storeId === undefined || capacity === undefined || capacity <= 0) {
               return failed(taskId, this.name, 'NO_STORE_AVAILABLE', 'No store available for pickup', {
                    storeId: storeId ?? null,
               });
          }

          this.storeCapacity.set(storeId, capacity - 1);
          const eta = this.datePlusDays(1);
          const record: FulfillmentRecord = {
               fulfillmentId,
               orderId: payload.orderId,
               mode: 'click_and_collect',
               status: 'READY_SOON',
               eta,
               slot: '16:00-21:00',
               storeId,
               items: payload.items,
               createdAt,
          };
          this.records.set(fulfillmentId, record);
          return succeeded(taskId, this.name, { ...record }, [
               notifyCustomer(
                    `Your order will be ready for pickup at ${storeId} by ${eta}, between ${record.slot}.`
               ),
          ]);
     }

     private updateStatus(taskId: string, payload: FulfillmentUpdateStatusPayload): TaskResult {
          const record = this.records.get(payload.fulfillmentId);
          if (!record) {
               return failed(taskId, this.name, 'FULFILLMENT_NOT_FOUND', 'fulfillmentId invalid');
          }
          record.status = payload.status;
          record.updatedAt = this.clock().toISOString();
          return succeeded(taskId, this.name, { ...record });
     }

     private cancel(taskId: string, payload: FulfillmentCancelPayload): TaskResult {
          const record = this.records.get(payload.fulfillmentId);
          if (!record) {
               return failed(taskId, this.name, 'FULFILLMENT_NOT_FOUND', 'fulfillmentId invalid');
          }

          record.status = 'CANCELLED';
          record.cancelReason = payload.reason ?? 'customer_request';
          record.updatedAt = this.clock().toISOString();

          if (record.mode === 'click_and_collect' && record.storeId) {
               const capacity = this.storeCapacity.get(record.storeId);
               if (capacity !== undefined) {
                    this.storeCapacity.set(record.storeId, capacity + 1);
               }
          }

          return succeeded(taskId, this.name, { ...record }, [
               notifyCustomer('Your delivery has been cancelled.'),
          ]);
     }

     private get(taskId: string, payload: FulfillmentGetPayload): TaskResult {
          if (!payload.fulfillmentId) {
               return succeeded(taskId, this.name, { fulfillments: [...this.records.values()] });
          }
          const record = this.records.get(payload.fulfillmentId);
          if (!record) {
               return failed(taskId, this.name, 'FULFILLMENT_NOT_FOUND', 'No fulfillment found');
          }
          return succeeded(taskId, this.name, { ...record });
     }
}
