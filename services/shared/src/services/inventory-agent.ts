import type { InventoryRequest } from '../types/inventory.types';
import type { Agent, NextAction, Task, TaskResult } from '../types/task.types';
import { DomainError, InvalidReservationError } from '../utils/errors';
import { logger } from '../utils/logger';
import {
     assertNever,
     callAgent,
     failedFromError,
     succeeded,
} from '../utils/task-result';
import { InventoryLedger } from './inventory-ledger';

/**
 * Task-level facade over the ledger. Ledger errors become failed results; the
 * ledger itself stays free of envelope concerns.
 */
export class InventoryAgent implements Agent<InventoryRequest> {
     readonly name = 'inventory' as const;

     constructor(private readonly ledger: InventoryLedger) {}

     async handle(task: Task<InventoryRequest>): Promise<TaskResult> {
          try {
               return await this.dispatch(task);
          } catch (error) {
               if (!(error instanceof DomainError)) {
                    logger.error({ err: error, taskId: task.taskId, type: task.type }, 'Inventory task failed');
               }
               return failedFromError(task.taskId, this.name, error, this.suggestionsFor(error));
          }
     }

     private async dispatch(task: Task<InventoryRequest>): Promise<TaskResult> {
          switch (task.type) {
               case 'INVENTORY_CHECK': {
                    const items = this.ledger.check(task.payload.items, task.payload.preferredLocation);
                    const allAvailable = items.every((item) => item.available);
                    if (allAvailable) {
                         return succeeded(task.taskId, this.name, { items });
                    }
                    return {
                         taskId: task.taskId,
                         agent: this.name,
                         status: 'failed',
                         payload: { items },
                         errors: [
                              {
                                   code: 'INSUFFICIENT_STOCK',
                                   message: 'Some items are out of stock',
                                   details: {
                                        skus: items.filter((i) => !i.available).map((i) => i.sku),
                                   },
                              },
                         ],
                         nextActions: [
                              callAgent(
                                   'Some items are out of stock. Ask recommendation for alternatives.',
                                   { agent: 'recommendation', reason: 'inventory_low' }
                              ),
                         ],
                    };
               }

               case 'INVENTORY_RESERVE': {
                    const reservation = await this.ledger.reserve({
                         orderId: task.payload.orderId,
                         items: task.payload.items,
                         holdMinutes: task.payload.holdForMinutes,
                    });
                    return succeeded(task.taskId, this.name, {
                         reservationId: reservation.reservationId,
                         reservedItems: reservation.lines,
                         holdForMinutes: reservation.holdMinutes,
                         expiresAt: reservation.expiresAt.toISOString(),
                    });
               }

               case 'INVENTORY_RELEASE': {
                    const released = await this.ledger.release(task.payload.reservationId);
                    return succeeded(task.taskId, this.name, {
                         releasedReservation: released.reservationId,
                         orderId: released.orderId,
                    });
               }

               case 'INVENTORY_RELEASE_ORDER': {
                    const released = await this.ledger.releaseOrder(task.payload.orderId);
                    return succeeded(task.taskId, this.name, {
                         releasedReservation: released.reservationId,
                         orderId: released.orderId,
                    });
               }

               case 'INVENTORY_GET': {
                    if (task.payload.reservationId) {
                         const reservation = this.ledger.getReservation(task.payload.reservationId);
                         if (!reservation) {
                              throw new InvalidReservationError(task.payload.reservationId);
                         }
                         return succeeded(task.taskId, this.name, {
                              reservationId: reservation.reservationId,
                              reservation,
                         });
                    }
                    if (task.payload.sku) {
                         const entry = this.ledger.getStock(task.payload.sku);
                         return succeeded(task.taskId, this.name, { sku: entry.sku, entry });
                    }
                    return succeeded(task.taskId, this.name, { stock: this.ledger.listStock() });
               }

               default:
                    return assertNever(task);
          }
     }

     private suggestionsFor(error: unknown): NextAction[] {
          if (error instanceof DomainError && error.code === 'INSUFFICIENT_STOCK') {
               return [callAgent('Ask inventory manager to restock', { sku: error.details.sku })];
          }
          return [];
     }
}
