import { Order, PurchaseLine } from '../types/inventory.types';
import { createInventoryLine, parseItemCode } from '../domain/items';
import { logger } from '../utils/logger';

/**
 * Turn one order into purchase lines whose unit cost carries that item's share
 * of the order's shipping and extra charges. Fees are split in proportion to
 * each item's share of the order subtotal. A part sold without a color is
 * stocked under color 0.
 */
export function toPurchaseLines(order: Order): PurchaseLine[] {
     const totalFees = order.baseGrandTotal - order.orderTotal;
     const lines: PurchaseLine[] = [];

     for (const item of order.items) {
          const itemType = parseItemCode(item.itemType);

          if (!itemType) {
               logger.warn(
                    { orderId: order.orderId, itemId: item.itemId, itemType: item.itemType },
                    'Skipping order item with unsupported item type'
               );
               continue;
          }

          const itemTotal = item.price * item.quantity;
          const share = order.orderTotal ? itemTotal / order.orderTotal : 0;
          // A fully discounted order can round a few ulps below zero
          const totalWithFees = Math.max(0, itemTotal + totalFees * share);

          lines.push(
               createInventoryLine({
                    itemId: item.itemId,
                    itemType,
                    colorId: itemType === 'PART' ? (item.colorId ?? 0) : null,
                    quantity: item.quantity,
                    unitCost: item.quantity ? totalWithFees / item.quantity : 0,
                    description: item.description,
               })
          );
     }

     logger.debug({ orderId: order.orderId, lineCount: lines.length, totalFees }, 'Order costed');

     return lines;
}

export function toPurchaseLinesForOrders(orders: readonly Order[]): PurchaseLine[] {
     return orders.flatMap(toPurchaseLines);
}
