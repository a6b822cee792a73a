import {
     FulfillmentRequest,
     MockFulfillmentService,
} from '@storefront/shared/src/clients/fulfillment-service';
import { fixedClock, sequentialIds, task } from '../helpers/testUtils';

describe('MockFulfillmentService (Unit)', () => {
     let service: MockFulfillmentService;

     beforeEach(() => {
          service = new MockFulfillmentService({
               storeCapacity: { 'STORE-01': 1, 'STORE-02': 2 },
               expressCities: ['springfield'],
               idGenerator: sequentialIds('f'),
               clock: fixedClock,
          });
     });

     function send(request: FulfillmentRequest) {
          return service.handle(task(request));
     }

     const items = [{ sku: 'SKU-1', qty: 1 }];

     describe('Create', () => {
          it('should schedule express delivery for an express city', async () => {
               const result = await send({
                    type: 'FULFILLMENT_CREATE',
                    payload: {
                         orderId: 'order-1',
                         items,
                         address: { city: 'Springfield' },
                         mode: 'ship_to_home',
                         inventoryConfirmed: true,
                    },
               });

               expect(result.payload).toEqual({
                    fulfillmentId: 'ful_f-1',
                    orderId: 'order-1',
                    mode: 'ship_to_home',
                    status: 'SCHEDULED',
                    eta: '2024-05-03',
                    slot: '10:00-14:00',
                    storeId: null,
                    items,
                    createdAt: '2024-05-01T10:00:00.000Z',
               });
               expect(result.nextActions).toEqual([
                    {
                         type: 'NOTIFY_CUSTOMER',
                         message: 'Your order will be delivered by 2024-05-03 between 10:00-14:00.',
                         data: {},
                    },
               ]);
          });

          it('should take four days elsewhere', async () => {
               const result = await send({
                    type: 'FULFILLMENT_CREATE',
                    payload: {
                         orderId: 'order-1',
                         items,
                         address: {},
                         mode: 'ship_to_home',
                         inventoryConfirmed: true,
                    },
               });
               expect(result.payload.eta).toBe('2024-05-05');
          });

          it('should pick the first store with capacity for click and collect', async () => {
               const first = await send({
                    type: 'FULFILLMENT_CREATE',
                    payload: { orderId: 'order-1', items, address: {}, mode: 'click_and_collect', inventoryConfirmed: true },
               });
               const second = await send({
                    type: 'FULFILLMENT_CREATE',
                    payload: { orderId: 'order-2', items, address: {}, mode: 'click_and_collect', inventoryConfirmed: true },
               });

               expect(first.payload).toMatchObject({
                    storeId: 'STORE-01',
                    status: 'READY_SOON',
                    eta: '2024-05-02',
                    slot: '16:00-21:00',
               });
               expect(second.payload.storeId).toBe('STORE-02');
          });

          it('should fail when the requested store is full', async () => {
               await send({
                    type: 'FULFILLMENT_CREATE',
                    payload: { orderId: 'order-1', items, address: {}, mode: 'click_and_collect', inventoryConfirmed: true, storeId: 'STORE-01' },
               });
               const result = await send({
                    type: 'FULFILLMENT_CREATE',
                    payload: { orderId: 'order-2', items, address: {}, mode: 'click_and_collect', inventoryConfirmed: true, storeId: 'STORE-01' },
               });

               expect(result.errors).toEqual([
                    {
                         code: 'NO_STORE_AVAILABLE',
                         message: 'No store available for pickup',
                         details: { storeId: 'STORE-01' },
                    },
               ]);
          });

          it('should require inventory confirmation', async () => {
               const result = await send({
                    type: 'FULFILLMENT_CREATE',
                    payload: { orderId: 'order-1', items, address: {}, mode: 'ship_to_home', inventoryConfirmed: false },
               });
               expect(result.errors[0].code).toBe('INVENTORY_NOT_CONFIRMED');
               expect(result.nextActions[0]).toEqual({
                    type: 'CALL_AGENT',
                    message: 'Ask inventory to confirm or reserve stock.',
                    data: { agent: 'inventory' },
               });
          });

          it('should require an order id and items', async () => {
               const result = await send({
                    type: 'FULFILLMENT_CREATE',
                    payload: { orderId: 'order-1', items: [], address: {}, mode: 'ship_to_home', inventoryConfirmed: true },
               });
               expect(result.errors[0].code).toBe('MISSING_FIELDS');
          });
     });

     describe('Update, cancel and get', () => {
          it('should update status and return the record', async () => {
               await send({
                    type: 'FULFILLMENT_CREATE',
                    payload: { orderId: 'order-1', items, address: {}, mode: 'ship_to_home', inventoryConfirmed: true },
               });
               const result = await send({
                    type: 'FULFILLMENT_UPDATE_STATUS',
                    payload: { fulfillmentId: 'ful_f-1', status: 'SHIPPED' },
               });
               expect(result.payload).toMatchObject({ status: 'SHIPPED', updatedAt: '2024-05-01T10:00:00.000Z' });
          });

          it('should give store capacity back on cancel', async () => {
               await send({
                    type: 'FULFILLMENT_CREATE',
                    payload: { orderId: 'order-1', items, address: {}, mode: 'click_and_collect', inventoryConfirmed: true, storeId: 'STORE-01' },
               });
               const cancelled = await send({
                    type: 'FULFILLMENT_CANCEL',
                    payload: { fulfillmentId: 'ful_f-1' },
               });
               const again = await send({
                    type: 'FULFILLMENT_CREATE',
                    payload: { orderId: 'order-2', items, address: {}, mode: 'click_and_collect', inventoryConfirmed: true, storeId: 'STORE-01' },
               });

               expect(cancelled.payload).toMatchObject({ status: 'CANCELLED', cancelReason: 'customer_request' });
               expect(again.status).toBe('success');
          });

          it('should list records or fail for an unknown id', async () => {
               await send({
                    type: 'FULFILLMENT_CREATE',
                    payload: { orderId: 'order-1', items, address: {}, mode: 'ship_to_home', inventoryConfirmed: true },
               });

               const all = await send({ type: 'FULFILLMENT_GET', payload: {} });
               const missing = await send({ type: 'FULFILLMENT_GET', payload: { fulfillmentId: 'ful_missing' } });

               expect(all.payload.fulfillments).toHaveLength(1);
               expect(missing.errors[0].code).toBe('FULFILLMENT_NOT_FOUND');
          });
     });
});
