// Type definitions for stock and reservations

export interface StockLine {
     sku: string;
     qty: number;
}

export interface StockEntry {
     sku: string;
     quantity: number;
     locations: Record<string, number>;
}

export interface ReservationLine extends StockLine {
     /** Units taken from each location bucket; sums to `qty` */
     allocations: Record<string, number>;
}

export interface Reservation {
     reservationId: string;
     orderId: string;
     lines: ReservationLine[];
     holdMinutes: number;
     createdAt: Date;
     expiresAt: Date;
}

export interface AvailabilityItem {
     sku: string;
     requested: number;
     available: boolean;
     availableQty: number;
     locationQty?: number;
     availableAtLocation?: boolean;
}

export interface ReserveStockRequest {
     orderId: string;
     items: StockLine[];
     holdMinutes?: number;
}

export interface AdjustStockRequest {
     sku: string;
     location: string;
     delta: number;
     reason: string;
}

// Domain events
export interface InventoryReservedEvent {
     reservationId: string;
     orderId: string;
     lines: ReservationLine[];
     timestamp: string;
}

export interface InventoryReleasedEvent {
     reservationId: string;
     orderId: string;
     lines: ReservationLine[];
     timestamp: string;
}

export interface InventoryAdjustedEvent {
     sku: string;
     location: string;
     quantityDelta: number;
     newQuantity: number;
     reason: string;
     timestamp: string;
}

// Inventory agent requests
export interface InventoryCheckPayload {
     items: StockLine[];
     preferredLocation?: string;
}

export interface InventoryReservePayload {
     orderId: string;
     items: StockLine[];
     holdForMinutes?: number;
}

export interface InventoryReleasePayload {
     reservationId: string;
}

export interface InventoryReleaseOrderPayload {
     orderId: string;
}

/** Stock for one SKU, one reservation, or everything when both are absent */
export interface InventoryGetPayload {
     sku?: string;
     reservationId?: string;
}

export type InventoryRequest =
     | { type: 'INVENTORY_CHECK'; payload: InventoryCheckPayload }
     | { type: 'INVENTORY_RESERVE'; payload: InventoryReservePayload }
     | { type: 'INVENTORY_RELEASE'; payload: InventoryReleasePayload }
     | { type: 'INVENTORY_RELEASE_ORDER'; payload: InventoryReleaseOrderPayload }
     | { type: 'INVENTORY_GET'; payload: InventoryGetPayload };
