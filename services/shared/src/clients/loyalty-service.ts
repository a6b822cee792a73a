import type { Agent, Task, TaskResult } from '../types/task.types';
import { askCustomer, assertNever, failed, succeeded } from '../utils/task-result';

export interface LoyaltyCalculatePayload {
     orderAmount: number;
}

export interface LoyaltyRedeemPayload {
     amountToRedeem: number;
     orderId?: string;
}

export interface LoyaltyIssuePayload {
     orderId: string;
     orderAmount: number;
}

export type LoyaltyRequest =
     | { type: 'LOYALTY_CALCULATE'; payload: LoyaltyCalculatePayload }
     | { type: 'LOYALTY_REDEEM'; payload: LoyaltyRedeemPayload }
     | { type: 'LOYALTY_ISSUE'; payload: LoyaltyIssuePayload }
     | { type: 'LOYALTY_GET'; payload: Record<string, never> };

export type LoyaltyService = Agent<LoyaltyRequest>;

export interface MockLoyaltyServiceOptions {
     balances?: Record<string, number>;
     /** Points worth one currency unit */
     pointsPerUnit?: number;
     /** Points issued per currency unit spent */
     earnRate?: number;
}

/**
 * Points ledger keyed by customer id. The conversion rates are placeholders;
 * the real programme rules live with the loyalty team.
 */
export class MockLoyaltyService implements LoyaltyService {
     readonly name = 'loyalty' as const;
     private readonly balances: Map<string, number>;
     private readonly pointsPerUnit: number;
     private readonly earnRate: number;

     constructor(options: MockLoyaltyServiceOptions = {}) {
          this.balances = new Map(Object.entries(options.balances ?? {}));
          this.pointsPerUnit = options.pointsPerUnit ?? 100;
          this.earnRate = options.earnRate ?? 1;
     }

     async handle(task: Task<LoyaltyRequest>): Promise<TaskResult> {
          const customerId = task.customerId;
          if (!customerId) {
               return failed(task.taskId, this.name, 'MISSING_FIELDS', 'customerId required');
          }

          switch (task.type) {
               case 'LOYALTY_CALCULATE':
                    return this.calculate(task.taskId, customerId, task.payload);
               case 'LOYALTY_REDEEM':
                    return this.redeem(task.taskId, customerId, task.payload);
               case 'LOYALTY_ISSUE':
                    return this.issue(task.taskId, customerId, task.payload);
               case 'LOYALTY_GET':
                    return succeeded(task.taskId, this.name, { points: this.balanceOf(customerId) });
               default:
                    return assertNever(task);
          }
     }

     balanceOf(customerId: string): number {
          return this.balances.get(customerId) ?? 0;
     }

     private calculate(taskId: string, customerId: string, payload: LoyaltyCalculatePayload): TaskResult {
          const amount = payload.orderAmount;
          if (!(amount > 0)) {
               return failed(taskId, this.name, 'INVALID_AMOUNT', 'orderAmount must be > 0');
          }

          const points = this.balanceOf(customerId);
          const maxRedeemableValue = Math.min(Math.floor(points / this.pointsPerUnit), Math.floor(amount));
          return succeeded(taskId, this.name, {
               orderAmount: amount,
               customerPoints: points,
               maxRedeemableValue,
          });
     }

     private redeem(taskId: string, customerId: string, payload: LoyaltyRedeemPayload): TaskResult {
          const value = payload.amountToRedeem;
          if (!Number.isInteger(value) || value <= 0) {
               return failed(taskId, this.name, 'INVALID_REDEEM', 'amountToRedeem must be > 0');
          }

          const needed = value * this.pointsPerUnit;
          const current = this.balanceOf(customerId);
          if (current < needed) {
               return failed(
                    taskId,
                    this.name,
                    'INSUFFICIENT_POINTS',
                    'Not enough points',
                    { availablePoints: current },
                    [askCustomer('Not enough points. Would you like to use a different payment method?')]
               );
          }

          this.balances.set(customerId, current - needed);
          return succeeded(taskId, this.name, {
               redeemedValue: value,
               remainingPoints: current - needed,
          });
     }

     private issue(taskId: string, customerId: string, payload: LoyaltyIssuePayload): TaskResult {
          const amount = payload.orderAmount;
          if (!(amount > 0)) {
               return failed(taskId, this.name, 'INVALID_AMOUNT', 'orderAmount must be > 0');
          }

          const issued = Math.floor(amount * this.earnRate);
          const balance = this.balanceOf(customerId) + issued;
          this.balances.set(customerId, balance);
          return succeeded(taskId, this.name, {
               orderId: payload.orderId,
               issuedPoints: issued,
               newBalance: balance,
          });
     }
}
