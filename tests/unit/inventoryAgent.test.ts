import { InventoryAgent } from '@storefront/shared/src/services/inventory-agent';
import type { InventoryRequest } from '@storefront/shared/src/types/inventory.types';
import { createTestLedger, stockEntry, task } from '../helpers/testUtils';

describe('InventoryAgent (Unit)', () => {
     function setup() {
          const { ledger, store } = createTestLedger([
               stockEntry('SKU-1', { A: 2, B: 3 }),
               stockEntry('SKU-2', { A: 1 }),
          ]);
          return { agent: new InventoryAgent(ledger), ledger, store };
     }

     function inventoryTask(request: InventoryRequest) {
          return task(request);
     }

     describe('INVENTORY_CHECK', () => {
          it('should succeed when every line is available', async () => {
               const { agent } = setup();
               const result = await agent.handle(
                    inventoryTask({ type: 'INVENTORY_CHECK', payload: { items: [{ sku: 'SKU-1', qty: 2 }] } })
               );

               expect(result).toEqual({
                    taskId: 'task-1',
                    agent: 'inventory',
                    status: 'success',
                    payload: {
                         items: [{ sku: 'SKU-1', requested: 2, available: true, availableQty: 5 }],
                    },
                    errors: [],
                    nextActions: [],
               });
          });

          it('should fail and point at recommendations when a line is short', async () => {
               const { agent } = setup();
               const result = await agent.handle(
                    inventoryTask({
                         type: 'INVENTORY_CHECK',
                         payload: {
                              items: [
                                   { sku: 'SKU-1', qty: 1 },
                                   { sku: 'SKU-2', qty: 2 },
                              ],
                         },
                    })
               );

               expect(result.status).toBe('failed');
               expect(result.errors).toEqual([
                    {
                         code: 'INSUFFICIENT_STOCK',
                         message: 'Some items are out of stock',
                         details: { skus: ['SKU-2'] },
                    },
               ]);
               expect(result.nextActions).toEqual([
                    {
                         type: 'CALL_AGENT',
                         message: 'Some items are out of stock. Ask recommendation for alternatives.',
                         data: { agent: 'recommendation', reason: 'inventory_low' },
                    },
               ]);
          });

          it('should succeed with no items for an empty cart', async () => {
               const { agent } = setup();
               const result = await agent.handle(
                    inventoryTask({ type: 'INVENTORY_CHECK', payload: { items: [] } })
               );

               expect(result.status).toBe('success');
               expect(result.payload).toEqual({ items: [] });
          });
     });

     describe('INVENTORY_RESERVE', () => {
          it('should return the reservation id and hold window', async () => {
               const { agent, ledger } = setup();
               const result = await agent.handle(
                    inventoryTask({
                         type: 'INVENTORY_RESERVE',
                         payload: { orderId: 'order-1', items: [{ sku: 'SKU-2', qty: 1 }] },
                    })
               );

               const [reservation] = ledger.listReservations();
               expect(result.status).toBe('success');
               expect(result.payload).toEqual({
                    reservationId: reservation.reservationId,
                    reservedItems: [{ sku: 'SKU-2', qty: 1, allocations: { A: 1 } }],
                    holdForMinutes: 30,
                    expiresAt: '2024-05-01T10:30:00.000Z',
               });
          });

          it('should suggest a restock when stock is short', async () => {
               const { agent, store } = setup();
               const result = await agent.handle(
                    inventoryTask({
                         type: 'INVENTORY_RESERVE',
                         payload: { orderId: 'order-1', items: [{ sku: 'SKU-2', qty: 3 }] },
                    })
               );

               expect(result.status).toBe('failed');
               expect(result.errors).toEqual([
                    {
                         code: 'INSUFFICIENT_STOCK',
                         message: 'SKU SKU-2 insufficient: requested 3, available 1',
                         details: { sku: 'SKU-2', requested: 3, available: 1 },
                    },
               ]);
               expect(result.nextActions).toEqual([
                    { type: 'CALL_AGENT', message: 'Ask inventory manager to restock', data: { sku: 'SKU-2' } },
               ]);
               expect(store.read('SKU-2')?.quantity).toBe(1);
          });
     });

     describe('INVENTORY_RELEASE', () => {
          it('should release and echo the order id', async () => {
               const { agent, ledger } = setup();
               const reservation = await ledger.reserve({
                    orderId: 'order-1',
                    items: [{ sku: 'SKU-1', qty: 1 }],
               });

               const result = await agent.handle(
                    inventoryTask({
                         type: 'INVENTORY_RELEASE',
                         payload: { reservationId: reservation.reservationId },
                    })
               );

               expect(result.status).toBe('success');
               expect(result.payload).toEqual({
                    releasedReservation: reservation.reservationId,
                    orderId: 'order-1',
               });
          });

          it('should fail for an unknown reservation', async () => {
               const { agent } = setup();
               const result = await agent.handle(
                    inventoryTask({ type: 'INVENTORY_RELEASE', payload: { reservationId: 'res_missing' } })
               );

               expect(result.status).toBe('failed');
               expect(result.errors[0].code).toBe('INVALID_RESERVATION');
               expect(result.nextActions).toEqual([]);
          });
     });

     describe('INVENTORY_RELEASE_ORDER', () => {
          it('should release the reservation held by an order', async () => {
               const { agent, ledger, store } = setup();
               const reservation = await ledger.reserve({
                    orderId: 'order-1',
                    items: [{ sku: 'SKU-1', qty: 3 }],
               });

               const result = await agent.handle(
                    inventoryTask({ type: 'INVENTORY_RELEASE_ORDER', payload: { orderId: 'order-1' } })
               );

               expect(result.payload).toEqual({
                    releasedReservation: reservation.reservationId,
                    orderId: 'order-1',
               });
               expect(store.read('SKU-1')).toEqual({ sku: 'SKU-1', quantity: 5, locations: { A: 2, B: 3 } });
          });

          it('should fail when the order holds nothing', async () => {
               const { agent } = setup();
               const result = await agent.handle(
                    inventoryTask({ type: 'INVENTORY_RELEASE_ORDER', payload: { orderId: 'order-9' } })
               );

               expect(result.errors).toEqual([
                    {
                         code: 'ORDER_NOT_RESERVED',
                         message: 'Order order-9 holds no reservation',
                         details: { orderId: 'order-9' },
                    },
               ]);
          });
     });

     describe('INVENTORY_GET', () => {
          it('should return a held reservation by id', async () => {
               const { agent, ledger } = setup();
               const reservation = await ledger.reserve({
                    orderId: 'order-1',
                    items: [{ sku: 'SKU-2', qty: 1 }],
               });

               const result = await agent.handle(
                    inventoryTask({
                         type: 'INVENTORY_GET',
                         payload: { reservationId: reservation.reservationId },
                    })
               );

               expect(result.status).toBe('success');
               expect(result.payload).toEqual({
                    reservationId: reservation.reservationId,
                    reservation,
               });
          });

          it('should fail for a reservation that is no longer held', async () => {
               const { agent, ledger } = setup();
               const reservation = await ledger.reserve({
                    orderId: 'order-1',
                    items: [{ sku: 'SKU-2', qty: 1 }],
               });
               await ledger.release(reservation.reservationId);

               const result = await agent.handle(
                    inventoryTask({
                         type: 'INVENTORY_GET',
                         payload: { reservationId: reservation.reservationId },
                    })
               );

               expect(result.status).toBe('failed');
               expect(result.errors[0].code).toBe('INVALID_RESERVATION');
          });

          it('should return one entry when a sku is given', async () => {
               const { agent } = setup();
               const result = await agent.handle(
                    inventoryTask({ type: 'INVENTORY_GET', payload: { sku: 'SKU-2' } })
               );
               expect(result.payload).toEqual({
                    sku: 'SKU-2',
                    entry: { sku: 'SKU-2', quantity: 1, locations: { A: 1 } },
               });
          });

          it('should return all stock otherwise', async () => {
               const { agent } = setup();
               const result = await agent.handle(inventoryTask({ type: 'INVENTORY_GET', payload: {} }));
               expect(result.payload).toEqual({
                    stock: [
                         { sku: 'SKU-1', quantity: 5, locations: { A: 2, B: 3 } },
                         { sku: 'SKU-2', quantity: 1, locations: { A: 1 } },
                    ],
               });
          });

          it('should fail for an unknown sku', async () => {
               const { agent } = setup();
               const result = await agent.handle(
                    inventoryTask({ type: 'INVENTORY_GET', payload: { sku: 'SKU-X' } })
               );
               expect(result.errors[0]).toEqual({
                    code: 'SKU_NOT_FOUND',
                    message: 'SKU SKU-X not found',
                    details: { sku: 'SKU-X' },
               });
          });
     });

     it('should report unexpected errors as INTERNAL_ERROR', async () => {
          const { agent, ledger } = setup();
          jest.spyOn(ledger, 'listStock').mockImplementation(() => {
               throw new Error('store unavailable');
          });

          const result = await agent.handle(inventoryTask({ type: 'INVENTORY_GET', payload: {} }));

          expect(result.status).toBe('failed');
          expect(result.errors).toEqual([
               { code: 'INTERNAL_ERROR', message: 'store unavailable', details: {} },
          ]);
     });
});
