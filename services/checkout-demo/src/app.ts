import { parseStockEntries, loadStockSeed } from '@storefront/shared/src/db/seed';
import { StockStore } from '@storefront/shared/src/db/stock-store';
import type { EventPublisher } from '@storefront/shared/src/messaging/client';
import { MockFulfillmentService } from '@storefront/shared/src/clients/fulfillment-service';
import { MockLoyaltyService } from '@storefront/shared/src/clients/loyalty-service';
import { MockPaymentGateway } from '@storefront/shared/src/clients/payment-gateway';
import { MockPostPurchaseService } from '@storefront/shared/src/clients/post-purchase-service';
import { MockRecommendationService } from '@storefront/shared/src/clients/recommendation-service';
import { CheckoutSaga } from '@storefront/shared/src/services/checkout-saga';
import { InventoryAgent } from '@storefront/shared/src/services/inventory-agent';
import { InventoryLedger } from '@storefront/shared/src/services/inventory-ledger';
import { TaskRouter } from '@storefront/shared/src/services/task-router';
import type { StockEntry } from '@storefront/shared/src/types/inventory.types';
import type { CheckoutConfig } from '@storefront/shared/src/utils/config';
import stockData from '../data/stock.json';
import catalogData from '../data/catalog.json';
import collaboratorData from '../data/collaborators.json';

export interface CheckoutApp {
     store: StockStore;
     ledger: InventoryLedger;
     payment: MockPaymentGateway;
     fulfillment: MockFulfillmentService;
     loyalty: MockLoyaltyService;
     recommendation: MockRecommendationService;
     postPurchase: MockPostPurchaseService;
     saga: CheckoutSaga;
     router: TaskRouter;
}

export interface CheckoutAppOptions {
     publisher?: EventPublisher;
     /** Overrides the bundled stock seed */
     stock?: StockEntry[];
     stockSeedPath?: string;
     idGenerator?: () => string;
}

function initialStock(options: CheckoutAppOptions): StockEntry[] {
     if (options.stock) return options.stock;
     if (options.stockSeedPath) return loadStockSeed(options.stockSeedPath);
     return parseStockEntries(stockData);
}

/** Wire the ledger, the mock collaborators and the saga around one store */
export function createCheckoutApp(
     config: CheckoutConfig,
     options: CheckoutAppOptions = {}
): CheckoutApp {
     const store = new StockStore(initialStock(options));
     const ledger = new InventoryLedger(store, {
          fallbackLocation: config.fallbackLocation,
          defaultHoldMinutes: config.reservationHoldMinutes,
          publisher: options.publisher,
     });
     const inventory = new InventoryAgent(ledger);

     const payment = new MockPaymentGateway();
     const fulfillment = new MockFulfillmentService({
          storeCapacity: collaboratorData.stores,
          expressCities: collaboratorData.expressCities,
     });
     const loyalty = new MockLoyaltyService({ balances: collaboratorData.loyaltyBalances });
     const recommendation = new MockRecommendationService(catalogData, ledger);
     const postPurchase = new MockPostPurchaseService({
          restocker: ledger,
          returnLocation: config.fallbackLocation,
     });

     const saga = new CheckoutSaga(
          { inventory, payment, fulfillment, loyalty, recommendation },
          {
               stepTimeoutMs: config.stepTimeoutMs,
               compensationPolicy: config.compensationPolicy,
               holdMinutes: config.reservationHoldMinutes,
               publisher: options.publisher,
               idGenerator: options.idGenerator,
          }
     );

     const router = new TaskRouter({
          inventory,
          payment,
          fulfillment,
          loyalty,
          recommendation,
          postPurchase,
     });

     return {
          store,
          ledger,
          payment,
          fulfillment,
          loyalty,
          recommendation,
          postPurchase,
          saga,
          router,
     };
}
