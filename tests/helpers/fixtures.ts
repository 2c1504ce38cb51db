import type {
     InventoryLine,
     RequiredMinifig,
     RequiredPart,
     RequiredSet,
} from '@bricktally/shared/src/types/inventory.types';

/**
 * Builders for inventory lines and requirements used across unit tests
 */

export function setLine(itemId: string, quantity: number, unitCost: number, colorId?: number): InventoryLine {
     return { itemType: 'SET', itemId, colorId: colorId ?? null, quantity, unitCost };
}

export function minifigLine(
     itemId: string,
     quantity: number,
     unitCost: number,
     colorId?: number
): InventoryLine {
     return { itemType: 'MINIFIG', itemId, colorId: colorId ?? null, quantity, unitCost };
}

export function partLine(
     itemId: string,
     colorId: number | null,
     quantity: number,
     unitCost: number
): InventoryLine {
     return { itemType: 'PART', itemId, colorId, quantity, unitCost };
}

export function needSet(itemId: string, quantity = 1): RequiredSet {
     return { itemType: 'SET', itemId, quantity };
}

export function needMinifig(itemId: string, quantity = 1): RequiredMinifig {
     return { itemType: 'MINIFIG', itemId, quantity };
}

export function needPart(itemId: string, colorId: number | null, quantity = 1): RequiredPart {
     return { itemType: 'PART', itemId, colorId, quantity, isUnspecifiedBundleComponent: false };
}

export function needKitPart(itemId: string, colorId: number | null, quantity = 1): RequiredPart {
     return { itemType: 'PART', itemId, colorId, quantity, isUnspecifiedBundleComponent: true };
}

export function totalQuantity(lines: readonly InventoryLine[]): number {
     return lines.reduce((sum, line) => sum + line.quantity, 0);
}
