import { InventoryLine, PurchaseLine } from '../types/inventory.types';
import { stockingKey } from '../domain/items';

interface StockAccumulator {
     first: PurchaseLine;
     quantity: number;
     totalCost: number;
     description?: string;
}

/**
 * Fold purchase lines into one inventory line per stocking unit, carrying the
 * summed quantity and the weighted-average unit cost. Sets and minifigs are
 * merged across colors; parts stay split by color. Output follows the order in
 * which each stocking unit was first seen.
 */
export function aggregateInventory(purchaseLines: readonly PurchaseLine[]): InventoryLine[] {
     const groups = new Map<string, StockAccumulator>();

     for (const line of purchaseLines) {
          const key = stockingKey(line);
          const group = groups.get(key) ?? { first: line, quantity: 0, totalCost: 0 };

          group.quantity += line.quantity;
          group.totalCost += line.quantity * line.unitCost;
          if (line.description) {
               group.description = line.description;
          }

          groups.set(key, group);
     }

     return [...groups.values()].map(({ first, quantity, totalCost, description }): InventoryLine => {
          const unitCost = quantity ? totalCost / quantity : 0;

          if (first.itemType === 'PART') {
               return {
                    itemType: 'PART',
                    itemId: first.itemId,
                    colorId: first.colorId,
                    quantity,
                    unitCost,
                    description,
               };
          }

          return {
               itemType: first.itemType,
               itemId: first.itemId,
               colorId: null,
               quantity,
               unitCost,
               description,
          };
     });
}
