import { toPurchaseLines, toPurchaseLinesForOrders } from '@bricktally/shared/src/services/order-costing';
import { InvalidQuantityError } from '@bricktally/shared/src/utils/errors';
import type { Order } from '@bricktally/shared/src/types/inventory.types';

describe('Order costing', () => {
     const order: Order = {
          orderId: '24810077',
          orderDate: '2024-08-15T10:30:00.000Z',
          seller: 'TestSeller',
          orderTotal: 10,
          baseGrandTotal: 12,
          items: [
               { itemId: '3001', itemType: 'P', colorId: 5, quantity: 4, price: 2, description: 'Brick 2 x 4' },
               { itemId: 'sw0001a', itemType: 'M', colorId: 11, quantity: 1, price: 2 },
          ],
     };

     it('should spread order fees in proportion to each item total', () => {
          const [brick, figure] = toPurchaseLines(order);

          // 8 of 10 subtotal carries 1.60 of the 2.00 fees
          expect(brick.unitCost).toBeCloseTo(2.4, 10);
          expect(brick.quantity).toBe(4);
          // 2 of 10 subtotal carries 0.40
          expect(figure.unitCost).toBeCloseTo(2.4, 10);
     });

     it('should keep the fee-inclusive total equal to what was paid', () => {
          const lines = toPurchaseLines(order);
          const paid = lines.reduce((sum, line) => sum + line.quantity * line.unitCost, 0);

          expect(paid).toBeCloseTo(order.baseGrandTotal, 10);
     });

     it('should keep part colors and drop minifig colors', () => {
          const [brick, figure] = toPurchaseLines(order);

          expect(brick).toMatchObject({ itemType: 'PART', itemId: '3001', colorId: 5 });
          expect(figure).toMatchObject({ itemType: 'MINIFIG', itemId: 'sw0001a', colorId: null });
     });

     it('should carry the item description', () => {
          expect(toPurchaseLines(order)[0].description).toBe('Brick 2 x 4');
     });

     it('should use the bare price when the order subtotal is zero', () => {
          const lines = toPurchaseLines({
               orderId: 'no-subtotal',
               orderTotal: 0,
               baseGrandTotal: 3,
               items: [{ itemId: '3023', itemType: 'P', colorId: 1, quantity: 2, price: 0.5 }],
          });

          expect(lines[0].unitCost).toBe(0.5);
     });

     it('should cost a zero-quantity item at zero', () => {
          const lines = toPurchaseLines({
               orderId: 'empty-lot',
               orderTotal: 5,
               baseGrandTotal: 6,
               items: [
                    { itemId: '3023', itemType: 'P', colorId: 1, quantity: 0, price: 1 },
                    { itemId: '3024', itemType: 'P', colorId: 1, quantity: 5, price: 1 },
               ],
          });

          expect(lines[0].unitCost).toBe(0);
          expect(lines[1].unitCost).toBeCloseTo(1.2, 10);
     });

     it('should cost a fully discounted order at zero without going negative', () => {
          const lines = toPurchaseLines({
               orderId: 'free',
               orderTotal: 0.1 + 0.7,
               baseGrandTotal: 0,
               items: [
                    { itemId: '3001', itemType: 'P', colorId: 1, quantity: 1, price: 0.1 },
                    { itemId: '3002', itemType: 'P', colorId: 1, quantity: 1, price: 0.7 },
               ],
          });

          expect(lines).toHaveLength(2);
          for (const line of lines) {
               expect(line.unitCost).toBeGreaterThanOrEqual(0);
               expect(line.unitCost).toBeCloseTo(0, 10);
          }
     });

     it('should stock a part sold without a color under color 0', () => {
          const [line] = toPurchaseLines({
               orderId: 'no-color',
               orderTotal: 1,
               baseGrandTotal: 1,
               items: [{ itemId: '3003', itemType: 'P', colorId: null, quantity: 1, price: 1 }],
          });

          expect(line).toMatchObject({ itemType: 'PART', itemId: '3003', colorId: 0 });
     });

     it('should skip item types that are not stocked for builds', () => {
          const lines = toPurchaseLines({
               orderId: 'gear',
               orderTotal: 4,
               baseGrandTotal: 4,
               items: [
                    { itemId: '853373', itemType: 'G', colorId: 0, quantity: 1, price: 3 },
                    { itemId: '75192-1', itemType: 'S', colorId: 0, quantity: 1, price: 1 },
               ],
          });

          expect(lines).toHaveLength(1);
          expect(lines[0]).toMatchObject({ itemType: 'SET', itemId: '75192-1', unitCost: 1 });
     });

     it('should reject malformed quantities', () => {
          expect(() =>
               toPurchaseLines({
                    orderId: 'bad',
                    orderTotal: 1,
                    baseGrandTotal: 1,
                    items: [{ itemId: '3001', itemType: 'P', colorId: 1, quantity: -2, price: 1 }],
               })
          ).toThrow(InvalidQuantityError);
     });

     it('should flatten several orders in order', () => {
          const second: Order = { ...order, orderId: '24810078', items: [order.items[1]] };

          expect(toPurchaseLinesForOrders([order, second]).map((line) => line.itemId)).toEqual([
               '3001',
               'sw0001a',
               'sw0001a',
          ]);
     });
});
