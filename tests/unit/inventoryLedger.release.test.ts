import {
     InvalidReservationError,
     MissingFieldsError,
     OrderNotReservedError,
} from '@storefront/shared/src/utils/errors';
import { createTestLedger, FIXED_NOW, stockEntry } from '../helpers/testUtils';

describe('InventoryLedger - Release Reservation (Unit)', () => {
     function setup() {
          return createTestLedger([
               stockEntry('SKU-1', { A: 2, B: 3 }),
               stockEntry('SKU-2', { WAREHOUSE: 1 }),
          ]);
     }

     it('should return units to the locations they came from', async () => {
          const { ledger, store } = setup();
          const reservation = await ledger.reserve({
               orderId: 'order-1',
               items: [
                    { sku: 'SKU-1', qty: 4 },
                    { sku: 'SKU-2', qty: 1 },
               ],
          });

          const released = await ledger.release(reservation.reservationId);

          expect(released.orderId).toBe('order-1');
          expect(store.read('SKU-1')).toEqual({ sku: 'SKU-1', quantity: 5, locations: { A: 2, B: 3 } });
          expect(store.read('SKU-2')).toEqual({ sku: 'SKU-2', quantity: 1, locations: { WAREHOUSE: 1 } });
          expect(ledger.getReservation(reservation.reservationId)).toBeUndefined();
     });

     it('should reject a second release of the same reservation', async () => {
          const { ledger, store } = setup();
          const reservation = await ledger.reserve({
               orderId: 'order-1',
               items: [{ sku: 'SKU-1', qty: 1 }],
          });
          await ledger.release(reservation.reservationId);

          await expect(ledger.release(reservation.reservationId)).rejects.toThrow(
               InvalidReservationError
          );
          expect(store.read('SKU-1')?.quantity).toBe(5);
     });

     it('should reject unknown and empty reservation ids', async () => {
          const { ledger } = setup();
          await expect(ledger.release('res_missing')).rejects.toThrow('Reservation missing or invalid');
          await expect(ledger.release('')).rejects.toThrow(InvalidReservationError);
     });

     it('should credit the fallback location when a line has no usable breakdown', async () => {
          const { ledger, store } = setup();
          await store.withTransaction((tx) =>
               tx.putReservation({
                    reservationId: 'res_legacy',
                    orderId: 'order-legacy',
                    lines: [{ sku: 'SKU-1', qty: 2, allocations: {} }],
                    holdMinutes: 30,
                    createdAt: FIXED_NOW,
                    expiresAt: FIXED_NOW,
               })
          );

          await ledger.release('res_legacy');

          expect(store.read('SKU-1')).toEqual({
               sku: 'SKU-1',
               quantity: 7,
               locations: { A: 2, B: 3, WAREHOUSE: 2 },
          });
     });

     it('should recreate an entry that no longer exists', async () => {
          const { ledger, store } = setup();
          await store.withTransaction((tx) =>
               tx.putReservation({
                    reservationId: 'res_orphan',
                    orderId: 'order-orphan',
                    lines: [{ sku: 'SKU-GONE', qty: 3, allocations: { C: 3 } }],
                    holdMinutes: 30,
                    createdAt: FIXED_NOW,
                    expiresAt: FIXED_NOW,
               })
          );

          await ledger.release('res_orphan');

          expect(store.read('SKU-GONE')).toEqual({ sku: 'SKU-GONE', quantity: 3, locations: { C: 3 } });
     });

     it('should publish InventoryReleased', async () => {
          const { ledger, publisher } = setup();
          const reservation = await ledger.reserve({
               orderId: 'order-1',
               items: [{ sku: 'SKU-2', qty: 1 }],
          });

          await ledger.release(reservation.reservationId);

          expect(publisher.ofType('inventory.InventoryReleased')).toEqual([
               {
                    reservationId: reservation.reservationId,
                    orderId: 'order-1',
                    lines: [{ sku: 'SKU-2', qty: 1, allocations: { WAREHOUSE: 1 } }],
                    timestamp: '2024-05-01T10:00:00.000Z',
               },
          ]);
     });

     describe('releaseOrder', () => {
          it('should release whatever the order holds', async () => {
               const { ledger, store, publisher } = setup();
               const reservation = await ledger.reserve({
                    orderId: 'order-1',
                    items: [{ sku: 'SKU-1', qty: 4 }],
               });

               const released = await ledger.releaseOrder('order-1');

               expect(released.reservationId).toBe(reservation.reservationId);
               expect(store.read('SKU-1')).toEqual({ sku: 'SKU-1', quantity: 5, locations: { A: 2, B: 3 } });
               expect(ledger.listReservations()).toEqual([]);
               expect(publisher.ofType('inventory.InventoryReleased')).toHaveLength(1);
          });

          it('should let the order reserve again once released', async () => {
               const { ledger } = setup();
               await ledger.reserve({ orderId: 'order-1', items: [{ sku: 'SKU-2', qty: 1 }] });
               await ledger.releaseOrder('order-1');

               const again = await ledger.reserve({ orderId: 'order-1', items: [{ sku: 'SKU-2', qty: 1 }] });

               expect(again.orderId).toBe('order-1');
               expect(ledger.listReservations()).toHaveLength(1);
          });

          it('should reject an order that holds no reservation', async () => {
               const { ledger, publisher } = setup();

               await expect(ledger.releaseOrder('order-9')).rejects.toThrow(OrderNotReservedError);
               await expect(ledger.releaseOrder('')).rejects.toThrow(MissingFieldsError);
               expect(publisher.ofType('inventory.InventoryReleased')).toEqual([]);
          });
     });
});
