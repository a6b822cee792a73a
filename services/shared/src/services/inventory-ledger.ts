import { StockStore, StockTransaction } from '../db/stock-store';
import type { EventPublisher } from '../messaging/client';
import { publishSafely } from '../messaging/client';
import type {
     AdjustStockRequest,
     AvailabilityItem,
     InventoryAdjustedEvent,
     InventoryReleasedEvent,
     InventoryReservedEvent,
     Reservation,
     ReservationLine,
     ReserveStockRequest,
     StockEntry,
     StockLine,
} from '../types/inventory.types';
import {
     InsufficientStockError,
     InvalidQuantityError,
     InvalidReservationError,
     MissingFieldsError,
     OrderAlreadyReservedError,
     OrderNotReservedError,
     SkuNotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';

export interface InventoryLedgerOptions {
     /** Location credited when a released line has no recorded breakdown */
     fallbackLocation?: string;
     defaultHoldMinutes?: number;
     publisher?: EventPublisher;
     clock?: () => Date;
}

function validateLines(items: StockLine[]): void {
     if (!items || items.length === 0) {
          throw new MissingFieldsError(['items']);
     }

     for (const item of items) {
          if (!item.sku) {
               throw new MissingFieldsError(['items.sku']);
          }
          if (!Number.isInteger(item.qty) || item.qty <= 0) {
               throw new InvalidQuantityError(`Quantity must be a positive integer for SKU ${item.sku}`, {
                    sku: item.sku,
                    qty: item.qty,
               });
          }
     }
}

/** Sum quantities per SKU, keeping first-seen order */
function mergeLines(items: StockLine[]): StockLine[] {
     const merged = new Map<string, number>();
     for (const item of items) {
          merged.set(item.sku, (merged.get(item.sku) ?? 0) + item.qty);
     }
     return [...merged.entries()].map(([sku, qty]) => ({ sku, qty }));
}

/**
 * Take `qty` units from the entry's locations in lexicographic order of
 * location id. The caller has already checked `entry.quantity >= qty`.
 */
function depleteLocations(entry: StockEntry, qty: number): Record<string, number> {
     const allocations: Record<string, number> = {};
     let remaining = qty;

     for (const location of Object.keys(entry.locations).sort()) {
          if (remaining === 0) break;

          const onHand = entry.locations[location];
          const taken = Math.min(onHand, remaining);
          if (taken === 0) continue;

          entry.locations[location] = onHand - taken;
          allocations[location] = taken;
          remaining -= taken;
     }

     entry.quantity -= qty;
     return allocations;
}

export class InventoryLedger {
     private readonly fallbackLocation: string;
     private readonly defaultHoldMinutes: number;
     private readonly publisher?: EventPublisher;
     private readonly clock: () => Date;
     private sequence = 0;

     constructor(
          private readonly store: StockStore,
          options: InventoryLedgerOptions = {}
     ) {
          this.fallbackLocation = options.fallbackLocation ?? 'WAREHOUSE';
          this.defaultHoldMinutes = options.defaultHoldMinutes ?? 30;
          this.publisher = options.publisher;
          this.clock = options.clock ?? (() => new Date());
     }

     /**
      * Report availability per requested line. Reads committed state only,
      * never takes the lock and never throws: malformed lines are left for
      * `reserve` to reject.
      */
     check(items: StockLine[], preferredLocation?: string): AvailabilityItem[] {
          return items.map((item) => {
               const entry = this.store.read(item.sku);
               if (!entry) {
                    return { sku: item.sku, requested: item.qty, available: false, availableQty: 0 };
               }

               const result: AvailabilityItem = {
                    sku: item.sku,
                    requested: item.qty,
                    available: entry.quantity >= item.qty,
                    availableQty: entry.quantity,
               };

               if (preferredLocation !== undefined && preferredLocation in entry.locations) {
                    const locationQty = entry.locations[preferredLocation];
                    result.locationQty = locationQty;
                    result.availableAtLocation = locationQty >= item.qty;
               }

               return result;
          });
     }

     /**
      * Reserve every line or none. Availability is re-validated inside the
      * store lock, so an earlier `check` is never trusted.
      */
     async reserve(request: ReserveStockRequest): Promise<Reservation> {
          const { orderId, items } = request;
          const holdMinutes = request.holdMinutes ?? this.defaultHoldMinutes;

          if (!orderId) {
               throw new MissingFieldsError(['orderId']);
          }
          validateLines(items);
          if (!Number.isInteger(holdMinutes) || holdMinutes <= 0) {
               throw new InvalidQuantityError('Hold duration must be a positive number of minutes', {
                    holdMinutes,
               });
          }

          logger.info({ orderId, lineCount: items.length }, 'Reserving stock for order');

          const lines = mergeLines(items);

          const reservation = await this.store.withTransaction((tx) => {
               const existing = tx.findReservationByOrder(orderId);
               if (existing) {
                    throw new OrderAlreadyReservedError(orderId, existing.reservationId);
               }

               // Validate all lines before touching any entry
               for (const line of lines) {
                    const entry = tx.getEntry(line.sku);
                    const available = entry?.quantity ?? 0;
                    if (available < line.qty) {
                         throw new InsufficientStockError(line.sku, line.qty, available);
                    }
               }

               const reservedLines: ReservationLine[] = [];
               for (const line of lines) {
                    const entry = tx.getEntry(line.sku);
                    if (!entry) {
                         throw new InsufficientStockError(line.sku, line.qty, 0);
                    }
                    const allocations = depleteLocations(entry, line.qty);
                    reservedLines.push({ sku: line.sku, qty: line.qty, allocations });

                    logger.debug(
                         { orderId, sku: line.sku, qty: line.qty, remaining: entry.quantity },
                         'SKU allocated'
                    );
               }

               const createdAt = this.clock();
               const created: Reservation = {
                    reservationId: `res_${orderId}_${createdAt.getTime()}_${++this.sequence}`,
                    orderId,
                    lines: reservedLines,
                    holdMinutes,
                    createdAt,
                    expiresAt: new Date(createdAt.getTime() + holdMinutes * 60_000),
               };
               tx.putReservation(created);
               return created;
          });

          logger.info(
               { orderId, reservationId: reservation.reservationId },
               'Stock reserved successfully'
          );

          if (this.publisher) {
               const event: InventoryReservedEvent = {
                    reservationId: reservation.reservationId,
                    orderId,
                    lines: reservation.lines,
                    timestamp: reservation.createdAt.toISOString(),
               };
               await publishSafely(this.publisher, 'inventory.InventoryReserved', { ...event });
          }

          return reservation;
     }

     /**
      * Return a reservation's units to stock and delete the reservation. A
      * second release of the same id is rejected rather than ignored.
      */
     async release(reservationId: string): Promise<Reservation> {
          if (!reservationId) {
               throw new InvalidReservationError(reservationId);
          }

          logger.info({ reservationId }, 'Releasing reservation');

          const released = await this.store.withTransaction((tx) => {
               const reservation = tx.getReservation(reservationId);
               if (!reservation) {
                    throw new InvalidReservationError(reservationId);
               }
               this.restore(tx, reservation);
               return reservation;
          });

          await this.afterRelease(released);
          return released;
     }

     /**
      * Release whatever reservation an order holds. Used when the caller never
      * learned the reservation id, e.g. after a reserve that timed out.
      */
     async releaseOrder(orderId: string): Promise<Reservation> {
          if (!orderId) {
               throw new MissingFieldsError(['orderId']);
          }

          logger.info({ orderId }, 'Releasing reservation by order');

          const released = await this.store.withTransaction((tx) => {
               const reservation = tx.findReservationByOrder(orderId);
               if (!reservation) {
                    throw new OrderNotReservedError(orderId);
               }
               this.restore(tx, reservation);
               return reservation;
          });

          await this.afterRelease(released);
          return released;
     }

     private restore(tx: StockTransaction, reservation: Reservation): void {
          for (const line of reservation.lines) {
               const entry = tx.getEntry(line.sku) ?? {
                    sku: line.sku,
                    quantity: 0,
                    locations: {},
               };

               const allocated = Object.values(line.allocations).reduce((sum, q) => sum + q, 0);
               if (allocated === line.qty) {
                    for (const [location, qty] of Object.entries(line.allocations)) {
                         entry.locations[location] = (entry.locations[location] ?? 0) + qty;
                    }
               } else {
                    entry.locations[this.fallbackLocation] =
                         (entry.locations[this.fallbackLocation] ?? 0) + line.qty;
               }
               entry.quantity += line.qty;
               tx.putEntry(entry);
          }

          tx.deleteReservation(reservation.reservationId);
     }

     private async afterRelease(released: Reservation): Promise<void> {
          logger.info(
               {
                    reservationId: released.reservationId,
                    orderId: released.orderId,
                    lineCount: released.lines.length,
               },
               'Reservation released'
          );

          if (this.publisher) {
               const event: InventoryReleasedEvent = {
                    reservationId: released.reservationId,
                    orderId: released.orderId,
                    lines: released.lines,
                    timestamp: this.clock().toISOString(),
               };
               await publishSafely(this.publisher, 'inventory.InventoryReleased', { ...event });
          }
     }

     /**
      * Restock or write off one location bucket. Creates the SKU when it is
      * unknown and the delta is positive.
      */
     async adjust(request: AdjustStockRequest): Promise<StockEntry> {
          const { sku, location, delta, reason } = request;

          if (!sku || !location) {
               throw new MissingFieldsError([!sku ? 'sku' : 'location']);
          }
          if (!Number.isInteger(delta) || delta === 0) {
               throw new InvalidQuantityError('Adjustment must be a non-zero integer', { sku, delta });
          }

          const adjusted = await this.store.withTransaction((tx) => {
               const entry = tx.getEntry(sku) ?? { sku, quantity: 0, locations: {} };
               const onHand = entry.locations[location] ?? 0;

               if (onHand + delta < 0) {
                    throw new InvalidQuantityError(
                         `Adjustment of ${delta} would leave ${sku} at ${location} negative`,
                         { sku, location, onHand, delta }
                    );
               }

               entry.locations[location] = onHand + delta;
               entry.quantity += delta;
               tx.putEntry(entry);
               return { sku: entry.sku, quantity: entry.quantity, locations: { ...entry.locations } };
          });

          logger.info({ sku, location, delta, reason, newQuantity: adjusted.quantity }, 'Stock adjusted');

          if (this.publisher) {
               const event: InventoryAdjustedEvent = {
                    sku,
                    location,
                    quantityDelta: delta,
                    newQuantity: adjusted.quantity,
                    reason,
                    timestamp: this.clock().toISOString(),
               };
               await publishSafely(this.publisher, 'inventory.InventoryAdjusted', { ...event });
          }

          return adjusted;
     }

     getStock(sku: string): StockEntry {
          const entry = this.store.read(sku);
          if (!entry) {
               throw new SkuNotFoundError(sku);
          }
          return entry;
     }

     listStock(): StockEntry[] {
          return this.store.readAll();
     }

     getReservation(reservationId: string): Reservation | undefined {
          return this.store.readReservation(reservationId);
     }

     listReservations(): Reservation[] {
          return this.store.readReservations();
     }
}
