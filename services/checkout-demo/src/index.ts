import dotenv from 'dotenv';
import { createEventPublisher } from '@storefront/shared/src/messaging/client';
import type { CheckoutRequest, CheckoutResult } from '@storefront/shared/src/types/checkout.types';
import { loadConfig } from '@storefront/shared/src/utils/config';
import { logger } from '@storefront/shared/src/utils/logger';
import { createCheckoutApp } from './app';

dotenv.config();

const scenarios: Array<{ name: string; request: CheckoutRequest }> = [
     {
          name: 'card, ship to home',
          request: {
               customerId: 'cust-001',
               cart: [
                    { sku: 'SKU-TEE-001', qty: 2, price: 19.99 },
                    { sku: 'SKU-SOCKS-001', qty: 3, price: 6.5 },
               ],
               payment: { method: 'card', cardNumber: '4111111111111112' },
               address: { line1: '1 Main St', city: 'Springfield', pincode: '10001' },
          },
     },
     {
          name: 'declined card',
          request: {
               customerId: 'cust-002',
               cart: [{ sku: 'SKU-JEANS-001', qty: 1, price: 59 }],
               payment: { method: 'card', cardNumber: '4111111111111111' },
               address: { city: 'Riverton' },
          },
     },
     {
          name: 'upi collect, click and collect',
          request: {
               customerId: 'cust-003',
               cart: [{ sku: 'SKU-BELT-001', qty: 1, price: 25 }],
               payment: { method: 'upi', upiId: 'shopper@bank' },
               address: {},
               fulfillmentMode: 'click_and_collect',
          },
     },
     {
          name: 'out of stock',
          request: {
               customerId: 'cust-001',
               cart: [{ sku: 'SKU-CAP-001', qty: 1, price: 15 }],
               payment: { method: 'pos' },
               address: { city: 'Springfield' },
          },
     },
];

function summarize(result: CheckoutResult): Record<string, unknown> {
     switch (result.status) {
          case 'success':
               return { orderId: result.orderId, fulfillment: result.fulfillment };
          case 'pending':
               return { orderId: result.orderId, authId: result.resume.authId };
          case 'failed':
               return {
                    orderId: result.orderId,
                    reason: result.reason,
                    codes: result.detail.map((d) => d.code),
                    outstanding: result.outstanding,
               };
     }
}

async function main() {
     const config = loadConfig();
     const publisher = createEventPublisher(config);
     const app = createCheckoutApp(config, {
          publisher,
          stockSeedPath: process.env.STOCK_SEED_PATH,
     });

     logger.info({ config }, 'Starting checkout demo');

     for (const { name, request } of scenarios) {
          const result = await app.saga.checkout(request);
          logger.info({ scenario: name, status: result.status, ...summarize(result) }, 'Checkout finished');

          if (result.status === 'pending') {
               const resumed = await app.saga.completePending(result.resume);
               logger.info(
                    { scenario: name, status: resumed.status, ...summarize(resumed) },
                    'Pending checkout resumed'
               );
          }
     }

     const lookup = await app.router.dispatch({
          task_id: 'demo-stock-lookup',
          type: 'INVENTORY_GET',
          session_id: 'demo',
          payload: { sku: 'SKU-TEE-001' },
     });
     logger.info({ lookup }, 'Stock after checkouts');

     const returned = await app.router.dispatch({
          task_id: 'demo-return',
          type: 'RETURNS_INITIATE',
          session_id: 'demo',
          customer_id: 'cust-001',
          payload: { order_id: 'demo-order', items: [{ sku: 'SKU-TEE-001', qty: 1 }], reason: 'too_small' },
     });
     const returnId = returned.payload.returnId;
     if (typeof returnId === 'string') {
          const received = await app.router.dispatch({
               task_id: 'demo-return-receive',
               type: 'RETURNS_RECEIVE',
               session_id: 'demo',
               payload: { return_id: returnId },
          });
          logger.info({ received }, 'Return received');
     }

     await publisher.close();
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in checkout demo');
     process.exit(1);
});
