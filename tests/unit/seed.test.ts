import { join } from 'node:path';
import { loadStockSeed, parseStockEntries } from '@storefront/shared/src/db/seed';
import { StockStore } from '@storefront/shared/src/db/stock-store';
import { InvalidStockEntryError } from '@storefront/shared/src/utils/errors';

describe('Stock seed (Unit)', () => {
     it('should accept well-formed entries', () => {
          const entries = parseStockEntries([{ sku: 'SKU-1', quantity: 3, locations: { A: 1, B: 2 } }]);
          expect(entries).toEqual([{ sku: 'SKU-1', quantity: 3, locations: { A: 1, B: 2 } }]);
     });

     it('should name the first invalid field', () => {
          const data = [
               { sku: 'SKU-1', quantity: 1, locations: { A: 1 } },
               { sku: 'SKU-2', quantity: -1, locations: {} },
          ];

          expect(() => parseStockEntries(data)).toThrow(InvalidStockEntryError);
          expect(() => parseStockEntries(data)).toThrow('Invalid stock seed at 1.quantity');
     });

     it('should reject a seed that is not a list', () => {
          expect(() => parseStockEntries({ sku: 'SKU-1' })).toThrow('Invalid stock seed at root');
     });

     it('should load the bundled demo seed into a store', () => {
          const entries = loadStockSeed(join(__dirname, '../../services/checkout-demo/data/stock.json'));
          const store = new StockStore(entries);

          expect(store.read('SKU-TEE-001')).toEqual({
               sku: 'SKU-TEE-001',
               quantity: 12,
               locations: { 'STORE-01': 4, WAREHOUSE: 8 },
          });
     });
});
