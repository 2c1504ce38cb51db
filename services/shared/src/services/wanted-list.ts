import { BundleRequirement, RequiredItem, WantedList } from '../types/inventory.types';
import { createRequiredItem, parseItemCode } from '../domain/items';
import { logger } from '../utils/logger';

/**
 * Normalize a wanted list into a bundle requirement.
 *
 * An entry without a minimum quantity counts once per bundle; on a part it
 * also marks a loose part with no named container. Entries with a zero,
 * negative or fractional quantity, or an unsupported item type, are dropped.
 */
export function toBundleRequirement(wantedList: WantedList): BundleRequirement {
     const items: RequiredItem[] = [];

     for (const entry of wantedList.items) {
          const itemType = parseItemCode(entry.itemType);
          const quantity = entry.minQty ?? 1;

          if (!itemType || !Number.isInteger(quantity) || quantity < 1) {
               logger.debug(
                    { title: wantedList.title, itemId: entry.itemId, itemType: entry.itemType, quantity },
                    'Dropping wanted list entry'
               );
               continue;
          }

          items.push(
               createRequiredItem({
                    itemId: entry.itemId,
                    itemType,
                    colorId: itemType === 'PART' ? entry.colorId : null,
                    quantity,
                    isUnspecifiedBundleComponent: itemType === 'PART' && entry.minQty === undefined,
               })
          );
     }

     return { title: wantedList.title, items };
}
