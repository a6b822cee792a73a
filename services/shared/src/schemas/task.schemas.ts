import { z } from 'zod';

// Wire schemas for the task envelope. Field names on the wire are snake_case;
// each schema transforms its payload into the camelCase request types.

export const taskEnvelopeSchema = z.object({
     task_id: z.string().min(1),
     type: z.string().min(1),
     session_id: z.string().min(1),
     customer_id: z.string().min(1).optional(),
     payload: z.record(z.unknown()).default({}),
});

const stockLineSchema = z.object({
     sku: z.string().min(1),
     qty: z.number().int().positive(),
});

const addressSchema = z
     .object({
          line1: z.string().optional(),
          city: z.string().optional(),
          pincode: z.string().optional(),
     })
     .default({});

// Inventory

export const inventoryCheckSchema = z
     .object({
          items: z.array(stockLineSchema),
          preferred_location: z.string().min(1).optional(),
     })
     .transform((p) => ({ items: p.items, preferredLocation: p.preferred_location }));

export const inventoryReserveSchema = z
     .object({
          order_id: z.string().min(1),
          items: z.array(stockLineSchema).min(1),
          hold_for_minutes: z.number().int().positive().optional(),
     })
     .transform((p) => ({ orderId: p.order_id, items: p.items, holdForMinutes: p.hold_for_minutes }));

export const inventoryReleaseSchema = z
     .object({ reservation_id: z.string().min(1) })
     .transform((p) => ({ reservationId: p.reservation_id }));

export const inventoryReleaseOrderSchema = z
     .object({ order_id: z.string().min(1) })
     .transform((p) => ({ orderId: p.order_id }));

export const inventoryGetSchema = z
     .object({
          sku: z.string().min(1).optional(),
          reservation_id: z.string().min(1).optional(),
     })
     .transform((p) => ({ sku: p.sku, reservationId: p.reservation_id }));

// Payment

const paymentMethodSchema = z
     .discriminatedUnion('method', [
          z.object({
               method: z.literal('card'),
               card_number: z.string().optional(),
               token: z.string().optional(),
          }),
          z.object({ method: z.literal('upi'), upi_id: z.string() }),
          z.object({
               method: z.literal('gift_card'),
               card_code: z.string(),
               mock_balance: z.number().optional(),
          }),
          z.object({ method: z.literal('pos'), terminal_id: z.string().optional() }),
     ])
     .transform((p) => {
          if (p.method === 'card') {
               return { method: p.method, cardNumber: p.card_number, token: p.token };
          }
          if (p.method === 'upi') {
               return { method: p.method, upiId: p.upi_id };
          }
          if (p.method === 'gift_card') {
               return { method: p.method, cardCode: p.card_code, mockBalance: p.mock_balance };
          }
          return { method: p.method, terminalId: p.terminal_id };
     });

export const paymentAuthorizeSchema = z.object({
     amount: z.number(),
     payment: paymentMethodSchema,
});

export const paymentCaptureSchema = z
     .object({ auth_id: z.string().min(1) })
     .transform((p) => ({ authId: p.auth_id }));

export const paymentRefundSchema = z
     .object({ tx_id: z.string().min(1), amount: z.number().positive().optional() })
     .transform((p) => ({ txId: p.tx_id, amount: p.amount }));

export const paymentStatusSchema = z
     .object({ tx_id: z.string().min(1).optional(), auth_id: z.string().min(1).optional() })
     .transform((p) => ({ txId: p.tx_id, authId: p.auth_id }));

// Fulfillment

const fulfillmentModeSchema = z.enum(['ship_to_home', 'click_and_collect']);

export const fulfillmentCreateSchema = z
     .object({
          order_id: z.string().min(1),
          items: z.array(stockLineSchema).min(1),
          address: addressSchema,
          mode: fulfillmentModeSchema.default('ship_to_home'),
          inventory_confirmation: z.boolean().default(false),
          store_id: z.string().min(1).optional(),
     })
     .transform((p) => ({
          orderId: p.order_id,
          items: p.items,
          address: p.address,
          mode: p.mode,
          inventoryConfirmed: p.inventory_confirmation,
          storeId: p.store_id,
     }));

export const fulfillmentUpdateStatusSchema = z
     .object({
          fulfillment_id: z.string().min(1),
          status: z.enum(['SCHEDULED', 'READY_SOON', 'SHIPPED', 'DELIVERED', 'COLLECTED', 'CANCELLED']),
     })
     .transform((p) => ({ fulfillmentId: p.fulfillment_id, status: p.status }));

export const fulfillmentCancelSchema = z
     .object({ fulfillment_id: z.string().min(1), reason: z.string().optional() })
     .transform((p) => ({ fulfillmentId: p.fulfillment_id, reason: p.reason }));

export const fulfillmentGetSchema = z
     .object({ fulfillment_id: z.string().min(1).optional() })
     .transform((p) => ({ fulfillmentId: p.fulfillment_id }));

// Loyalty

export const loyaltyCalculateSchema = z
     .object({ order_amount: z.number() })
     .transform((p) => ({ orderAmount: p.order_amount }));

export const loyaltyRedeemSchema = z
     .object({ amount_to_redeem: z.number().int(), order_id: z.string().optional() })
     .transform((p) => ({ amountToRedeem: p.amount_to_redeem, orderId: p.order_id }));

export const loyaltyIssueSchema = z
     .object({ order_id: z.string().min(1), order_amount: z.number() })
     .transform((p) => ({ orderId: p.order_id, orderAmount: p.order_amount }));

export const loyaltyGetSchema = z.object({}).transform((): Record<string, never> => ({}));

// Recommendation

export const recommendForCartSchema = z
     .object({
          cart: z.array(stockLineSchema),
          preference_category: z.string().optional(),
     })
     .transform((p) => ({ cart: p.cart, preferenceCategory: p.preference_category }));

export const recommendAlternativesSchema = z.object({ sku: z.string().min(1) });

// Post-purchase

export const returnsInitiateSchema = z
     .object({
          order_id: z.string().min(1),
          items: z.array(stockLineSchema).min(1),
          reason: z.string().min(1).optional(),
     })
     .transform((p) => ({ orderId: p.order_id, items: p.items, reason: p.reason }));

export const returnIdSchema = z
     .object({ return_id: z.string().min(1) })
     .transform((p) => ({ returnId: p.return_id }));

export const feedbackSubmitSchema = z
     .object({
          order_id: z.string().min(1),
          rating: z.number().int(),
          comments: z.string().optional(),
     })
     .transform((p) => ({ orderId: p.order_id, rating: p.rating, comments: p.comments }));

export const warrantyCheckSchema = z
     .object({ sku: z.string().min(1), purchase_date: z.string().min(1) })
     .transform((p) => ({ sku: p.sku, purchaseDate: p.purchase_date }));
