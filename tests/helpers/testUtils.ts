import { StockStore } from '@storefront/shared/src/db/stock-store';
import { InMemoryEventPublisher } from '@storefront/shared/src/messaging/client';
import { InventoryLedger } from '@storefront/shared/src/services/inventory-ledger';
import type { StockEntry } from '@storefront/shared/src/types/inventory.types';
import type {
     Agent,
     AgentName,
     Task,
     TaskResult,
} from '@storefront/shared/src/types/task.types';

/**
 * Test utilities for building stores, ledgers and scripted collaborators
 */

export const FIXED_NOW = new Date('2024-05-01T10:00:00.000Z');

export function fixedClock(): Date {
     return new Date(FIXED_NOW);
}

/** Entry whose quantity is the sum of its locations */
export function stockEntry(sku: string, locations: Record<string, number>): StockEntry {
     const quantity = Object.values(locations).reduce((sum, qty) => sum + qty, 0);
     return { sku, quantity, locations: { ...locations } };
}

export function createTestLedger(entries: StockEntry[] = []): {
     store: StockStore;
     ledger: InventoryLedger;
     publisher: InMemoryEventPublisher;
} {
     const store = new StockStore(entries);
     const publisher = new InMemoryEventPublisher();
     const ledger = new InventoryLedger(store, { publisher, clock: fixedClock });
     return { store, ledger, publisher };
}

/** Ids `id-1`, `id-2`, ... in call order */
export function sequentialIds(prefix = 'id'): () => string {
     let next = 0;
     return () => `${prefix}-${++next}`;
}

export function task<TRequest extends { type: string; payload: unknown }>(
     request: TRequest,
     taskId = 'task-1',
     customerId = 'cust-001'
): Task<TRequest> {
     return { ...request, taskId, sessionId: 'session-1', customerId };
}

type Reply = (task: Task<{ type: string; payload: unknown }>) => Promise<TaskResult> | TaskResult;

/**
 * Collaborator that answers from a per-type script and records every task
 * it received. Types without a script reply with an empty success.
 */
export class ScriptedAgent<TRequest extends { type: string; payload: unknown }>
     implements Agent<TRequest>
{
     readonly received: Array<Task<TRequest>> = [];
     private readonly replies = new Map<string, Reply>();

     constructor(readonly name: AgentName) {}

     on(type: string, reply: Reply): this {
          this.replies.set(type, reply);
          return this;
     }

     succeedWith(type: string, payload: Record<string, unknown>): this {
          return this.on(type, (t) => ({
               taskId: t.taskId,
               agent: this.name,
               status: 'success',
               payload,
               errors: [],
               nextActions: [],
          }));
     }

     failWith(type: string, code: string, message = `${code} from ${this.name}`): this {
          return this.on(type, (t) => ({
               taskId: t.taskId,
               agent: this.name,
               status: 'failed',
               payload: {},
               errors: [{ code, message, details: {} }],
               nextActions: [],
          }));
     }

     typesReceived(): string[] {
          return this.received.map((t) => t.type);
     }

     async handle(t: Task<TRequest>): Promise<TaskResult> {
          this.received.push(t);
          const reply = this.replies.get(t.type);
          if (!reply) {
               return {
                    taskId: t.taskId,
                    agent: this.name,
                    status: 'success',
                    payload: {},
                    errors: [],
                    nextActions: [],
               };
          }
          return reply(t);
     }
}
