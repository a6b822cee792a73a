import type { Reservation, StockEntry } from '../types/inventory.types';
import { InvalidStockEntryError } from '../utils/errors';
import { Mutex } from '../utils/mutex';

function cloneEntry(entry: StockEntry): StockEntry {
     return { sku: entry.sku, quantity: entry.quantity, locations: { ...entry.locations } };
}

function cloneReservation(reservation: Reservation): Reservation {
     return {
          ...reservation,
          lines: reservation.lines.map((line) => ({
               ...line,
               allocations: { ...line.allocations },
          })),
          createdAt: new Date(reservation.createdAt),
          expiresAt: new Date(reservation.expiresAt),
     };
}

export function assertValidEntry(entry: StockEntry): void {
     let sum = 0;
     for (const [location, qty] of Object.entries(entry.locations)) {
          if (!Number.isInteger(qty) || qty < 0) {
               throw new InvalidStockEntryError(
                    entry.sku,
                    `Location ${location} of SKU ${entry.sku} has invalid quantity ${qty}`
               );
          }
          sum += qty;
     }

     if (!Number.isInteger(entry.quantity) || entry.quantity < 0) {
          throw new InvalidStockEntryError(
               entry.sku,
               `SKU ${entry.sku} has invalid quantity ${entry.quantity}`
          );
     }

     if (sum !== entry.quantity) {
          throw new InvalidStockEntryError(
               entry.sku,
               `SKU ${entry.sku} quantity ${entry.quantity} does not match location total ${sum}`
          );
     }
}

/**
 * Working view handed to `StockStore.withTransaction`. Reads see the
 * transaction's own writes; nothing reaches the store until commit.
 */
export class StockTransaction {
     private readonly stagedEntries = new Map<string, StockEntry>();
     private readonly stagedReservations = new Map<string, Reservation | null>();
     /** orderId → reservationId, `null` once deleted in this transaction */
     private readonly stagedOrders = new Map<string, string | null>();

     constructor(
          private readonly entries: ReadonlyMap<string, StockEntry>,
          private readonly reservations: ReadonlyMap<string, Reservation>,
          private readonly orders: ReadonlyMap<string, string>
     ) {}

     getEntry(sku: string): StockEntry | undefined {
          const staged = this.stagedEntries.get(sku);
          if (staged) return staged;

          const committed = this.entries.get(sku);
          if (!committed) return undefined;

          const copy = cloneEntry(committed);
          this.stagedEntries.set(sku, copy);
          return copy;
     }

     putEntry(entry: StockEntry): void {
          this.stagedEntries.set(entry.sku, entry);
     }

     getReservation(reservationId: string): Reservation | undefined {
          if (this.stagedReservations.has(reservationId)) {
               return this.stagedReservations.get(reservationId) ?? undefined;
          }
          return this.reservations.get(reservationId);
     }

     findReservationByOrder(orderId: string): Reservation | undefined {
          const reservationId = this.stagedOrders.has(orderId)
               ? this.stagedOrders.get(orderId)
               : this.orders.get(orderId);
          return reservationId ? this.getReservation(reservationId) : undefined;
     }

     putReservation(reservation: Reservation): void {
          this.stagedReservations.set(reservation.reservationId, reservation);
          this.stagedOrders.set(reservation.orderId, reservation.reservationId);
     }

     deleteReservation(reservationId: string): void {
          const existing = this.getReservation(reservationId);
          if (
               existing &&
               this.findReservationByOrder(existing.orderId)?.reservationId === reservationId
          ) {
               this.stagedOrders.set(existing.orderId, null);
          }
          this.stagedReservations.set(reservationId, null);
     }

     /** @internal */
     changes(): {
          entries: StockEntry[];
          reservations: Array<[string, Reservation | null]>;
          orders: Array<[string, string | null]>;
     } {
          return {
               entries: [...this.stagedEntries.values()],
               reservations: [...this.stagedReservations.entries()],
               orders: [...this.stagedOrders.entries()],
          };
     }
}

/**
 * In-memory owner of stock entries and reservations. Every mutation runs inside
 * `withTransaction`, which holds one exclusive lock for the whole store and
 * applies the staged changes in a single synchronous step.
 */
export class StockStore {
     private readonly entries = new Map<string, StockEntry>();
     private readonly reservations = new Map<string, Reservation>();
     private readonly orders = new Map<string, string>();
     private readonly mutex = new Mutex();

     constructor(initial: StockEntry[] = []) {
          for (const entry of initial) {
               assertValidEntry(entry);
               this.entries.set(entry.sku, cloneEntry(entry));
          }
     }

     get isLocked(): boolean {
          return this.mutex.isLocked;
     }

     read(sku: string): StockEntry | undefined {
          const entry = this.entries.get(sku);
          return entry ? cloneEntry(entry) : undefined;
     }

     readAll(): StockEntry[] {
          return [...this.entries.values()]
               .map(cloneEntry)
               .sort((a, b) => a.sku.localeCompare(b.sku));
     }

     readReservation(reservationId: string): Reservation | undefined {
          const reservation = this.reservations.get(reservationId);
          return reservation ? cloneReservation(reservation) : undefined;
     }

     readReservations(): Reservation[] {
          return [...this.reservations.values()].map(cloneReservation);
     }

     async withTransaction<T>(fn: (tx: StockTransaction) => Promise<T> | T): Promise<T> {
          return this.mutex.runExclusive(async () => {
               const tx = new StockTransaction(this.entries, this.reservations, this.orders);
               const result = await fn(tx);
               this.commit(tx);
               return result;
          });
     }

     /** Validate every staged entry first, then apply only what changed */
     private commit(tx: StockTransaction): void {
          const { entries, reservations, orders } = tx.changes();

          for (const entry of entries) {
               assertValidEntry(entry);
          }

          for (const entry of entries) {
               this.entries.set(entry.sku, cloneEntry(entry));
          }

          for (const [id, reservation] of reservations) {
               if (reservation) {
                    this.reservations.set(id, cloneReservation(reservation));
               } else {
                    this.reservations.delete(id);
               }
          }

          for (const [orderId, reservationId] of orders) {
               if (reservationId) {
                    this.orders.set(orderId, reservationId);
               } else {
                    this.orders.delete(orderId);
               }
          }
     }
}
