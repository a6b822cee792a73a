import type { AvailabilityItem, StockLine } from '../types/inventory.types';
import type { Agent, Task, TaskResult } from '../types/task.types';
import { assertNever, failed, succeeded } from '../utils/task-result';

export interface CatalogProduct {
     sku: string;
     name: string;
     category: string;
     price: number;
     related: string[];
}

export interface RecommendForCartPayload {
     cart: StockLine[];
     preferenceCategory?: string;
}

export interface RecommendAlternativesPayload {
     sku: string;
}

export type RecommendationRequest =
     | { type: 'RECOMMEND_FOR_CART'; payload: RecommendForCartPayload }
     | { type: 'RECOMMEND_ALTERNATIVES'; payload: RecommendAlternativesPayload };

export interface Recommendation {
     sku: string;
     name: string;
     price: number;
     score: number;
     available: boolean;
     availableQty: number | null;
}

/** Anything that can answer a stock check, normally the inventory ledger */
export interface AvailabilityReader {
     check(items: StockLine[]): AvailabilityItem[];
}

export type RecommendationService = Agent<RecommendationRequest>;

const PREFERENCE_BOOST = 1.2;

export class MockRecommendationService implements RecommendationService {
     readonly name = 'recommendation' as const;
     private readonly catalog: Map<string, CatalogProduct>;

     constructor(
          catalog: CatalogProduct[],
          private readonly inventory?: AvailabilityReader
     ) {
          this.catalog = new Map(catalog.map((product) => [product.sku, product]));
     }

     async handle(task: Task<RecommendationRequest>): Promise<TaskResult> {
          switch (task.type) {
               case 'RECOMMEND_FOR_CART':
                    return this.forCart(task.taskId, task.payload);
               case 'RECOMMEND_ALTERNATIVES':
                    return this.alternatives(task.taskId, task.payload);
               default:
                    return assertNever(task);
          }
     }

     private availability(sku: string): { available: boolean; availableQty: number | null } {
          if (!this.inventory) return { available: true, availableQty: null };
          const [item] = this.inventory.check([{ sku, qty: 1 }]);
          return { available: item.available, availableQty: item.availableQty };
     }

     private forCart(taskId: string, payload: RecommendForCartPayload): TaskResult {
          const inCart = new Set(payload.cart.map((line) => line.sku));
          const scores = new Map<string, number>();

          for (const line of payload.cart) {
               for (const related of this.catalog.get(line.sku)?.related ?? []) {
                    if (inCart.has(related) || !this.catalog.has(related)) continue;
                    scores.set(related, (scores.get(related) ?? 0) + 1);
               }
          }

          if (payload.preferenceCategory) {
               for (const [sku, score] of scores) {
                    if (this.catalog.get(sku)?.category === payload.preferenceCategory) {
                         scores.set(sku, score * PREFERENCE_BOOST);
                    }
               }
          }

          const ranked = [...scores.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
          const recommendations: Recommendation[] = [];
          for (const [sku, score] of ranked) {
               const product = this.catalog.get(sku);
               if (!product) continue;
               recommendations.push({
                    sku,
                    name: product.name,
                    price: product.price,
                    score,
                    ...this.availability(sku),
               });
          }

          return succeeded(taskId, this.name, { recommendations });
     }

     private alternatives(taskId: string, payload: RecommendAlternativesPayload): TaskResult {
          const source = this.catalog.get(payload.sku);
          if (!source) {
               return failed(taskId, this.name, 'SKU_NOT_IN_CATALOG', `${payload.sku} not found`, {
                    sku: payload.sku,
               });
          }

          const candidates = [
               ...source.related,
               ...[...this.catalog.values()]
                    .filter((p) => p.category === source.category && p.sku !== source.sku)
                    .map((p) => p.sku),
          ];

          const alternatives = [...new Set(candidates)].flatMap((sku) => {
               const product = this.catalog.get(sku);
               if (!product) return [];
               const { available } = this.availability(sku);
               return [{ sku, name: product.name, price: product.price, available }];
          });

          return succeeded(taskId, this.name, { alternatives });
     }
}
