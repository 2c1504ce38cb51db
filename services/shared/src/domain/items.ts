import {
     BrickLinkItemCode,
     InventoryLine,
     InventoryLineInput,
     ItemType,
     RequiredItem,
     RequiredItemInput,
} from '../types/inventory.types';
import { InvalidCostError, InvalidItemError, InvalidQuantityError } from '../utils/errors';

const ITEM_CODES: Record<BrickLinkItemCode, ItemType> = {
     S: 'SET',
     M: 'MINIFIG',
     P: 'PART',
};

function isItemCode(code: string): code is BrickLinkItemCode {
     return Object.prototype.hasOwnProperty.call(ITEM_CODES, code);
}

/**
 * Map a BrickLink item type code onto an item type. Returns undefined for
 * catalog types that are never stocked for builds (gear, books, instructions).
 */
export function parseItemCode(code: string): ItemType | undefined {
     const normalized = code.trim().toUpperCase();
     return isItemCode(normalized) ? ITEM_CODES[normalized] : undefined;
}

/**
 * Identity of a stocking position: item id plus, for parts only, color.
 */
export function stockingKey(item: {
     itemType: ItemType;
     itemId: string;
     colorId?: number | null;
}): string {
     const colorKey = item.itemType === 'PART' ? String(item.colorId ?? 'none') : '-';
     return `${item.itemType}:${item.itemId}:${colorKey}`;
}

function requireItemId(itemId: string): string {
     const trimmed = typeof itemId === 'string' ? itemId.trim() : '';
     if (!trimmed) {
          throw new InvalidItemError('Item id must be a non-empty string');
     }
     return trimmed;
}

export function createInventoryLine(input: InventoryLineInput): InventoryLine {
     const itemId = requireItemId(input.itemId);

     if (!Number.isInteger(input.quantity) || input.quantity < 0) {
          throw new InvalidQuantityError(
               `Quantity must be a non-negative integer for item ${itemId}`,
               itemId
          );
     }

     if (!Number.isFinite(input.unitCost) || input.unitCost < 0) {
          throw new InvalidCostError(`Unit cost must be non-negative for item ${itemId}`, itemId);
     }

     const base = {
          itemId,
          colorId: input.colorId ?? null,
          quantity: input.quantity,
          unitCost: input.unitCost,
          description: input.description,
     };

     switch (input.itemType) {
          case 'SET':
               return { ...base, itemType: 'SET' };
          case 'MINIFIG':
               return { ...base, itemType: 'MINIFIG' };
          case 'PART':
               return { ...base, itemType: 'PART' };
          default:
               throw new InvalidItemError(
                    `Unsupported item type ${String(input.itemType)} for item ${itemId}`
               );
     }
}

export function createRequiredItem(input: RequiredItemInput): RequiredItem {
     const itemId = requireItemId(input.itemId);

     if (!Number.isInteger(input.quantity) || input.quantity < 1) {
          throw new InvalidQuantityError(
               `Required quantity must be a positive integer for item ${itemId}`,
               itemId
          );
     }

     switch (input.itemType) {
          case 'SET':
               return { itemType: 'SET', itemId, quantity: input.quantity };
          case 'MINIFIG':
               return { itemType: 'MINIFIG', itemId, quantity: input.quantity };
          case 'PART':
               return {
                    itemType: 'PART',
                    itemId,
                    colorId: input.colorId ?? null,
                    quantity: input.quantity,
                    isUnspecifiedBundleComponent: input.isUnspecifiedBundleComponent ?? false,
               };
          default:
               throw new InvalidItemError(
                    `Unsupported item type ${String(input.itemType)} for item ${itemId}`
               );
     }
}
