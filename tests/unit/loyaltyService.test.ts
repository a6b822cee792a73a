import { LoyaltyRequest, MockLoyaltyService } from '@storefront/shared/src/clients/loyalty-service';
import { task } from '../helpers/testUtils';

describe('MockLoyaltyService (Unit)', () => {
     let service: MockLoyaltyService;

     beforeEach(() => {
          service = new MockLoyaltyService({ balances: { 'cust-001': 2500 } });
     });

     function send(request: LoyaltyRequest, customerId = 'cust-001') {
          return service.handle(task(request, 'task-1', customerId));
     }

     it('should quote the redeemable value capped by points and order amount', async () => {
          const capped = await send({ type: 'LOYALTY_CALCULATE', payload: { orderAmount: 100.5 } });
          const small = await send({ type: 'LOYALTY_CALCULATE', payload: { orderAmount: 12.9 } });

          expect(capped.payload).toEqual({ orderAmount: 100.5, customerPoints: 2500, maxRedeemableValue: 25 });
          expect(small.payload.maxRedeemableValue).toBe(12);
     });

     it('should reject a non-positive order amount', async () => {
          const result = await send({ type: 'LOYALTY_CALCULATE', payload: { orderAmount: 0 } });
          expect(result.errors[0].code).toBe('INVALID_AMOUNT');
     });

     it('should redeem points when the balance covers them', async () => {
          const result = await send({ type: 'LOYALTY_REDEEM', payload: { amountToRedeem: 20 } });

          expect(result.payload).toEqual({ redeemedValue: 20, remainingPoints: 500 });
          expect(service.balanceOf('cust-001')).toBe(500);
     });

     it('should refuse to redeem more than the balance', async () => {
          const result = await send({ type: 'LOYALTY_REDEEM', payload: { amountToRedeem: 26 } });

          expect(result.errors[0]).toEqual({
               code: 'INSUFFICIENT_POINTS',
               message: 'Not enough points',
               details: { availablePoints: 2500 },
          });
          expect(service.balanceOf('cust-001')).toBe(2500);
     });

     it('should reject a non-integer redemption', async () => {
          const result = await send({ type: 'LOYALTY_REDEEM', payload: { amountToRedeem: 1.5 } });
          expect(result.errors[0].code).toBe('INVALID_REDEEM');
     });

     it('should issue points for an order', async () => {
          const result = await send({
               type: 'LOYALTY_ISSUE',
               payload: { orderId: 'order-1', orderAmount: 59.99 },
          });

          expect(result.payload).toEqual({ orderId: 'order-1', issuedPoints: 59, newBalance: 2559 });
     });

     it('should start unknown customers at zero', async () => {
          const result = await send({ type: 'LOYALTY_GET', payload: {} }, 'cust-new');
          expect(result.payload).toEqual({ points: 0 });
     });

     it('should require a customer id', async () => {
          const result = await service.handle({
               type: 'LOYALTY_GET',
               payload: {},
               taskId: 'task-1',
               sessionId: 'session-1',
          });
          expect(result.errors[0]).toEqual({
               code: 'MISSING_FIELDS',
               message: 'customerId required',
               details: {},
          });
     });
});
