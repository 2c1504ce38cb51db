// Type definitions for domain models

export type ItemType = 'SET' | 'MINIFIG' | 'PART';

// BrickLink item type codes as they appear in order exports and wanted lists
export type BrickLinkItemCode = 'S' | 'M' | 'P';

interface StockedItem {
     readonly itemId: string;
     readonly quantity: number;
     readonly unitCost: number;
     readonly description?: string;
}

export interface PartLine extends StockedItem {
     readonly itemType: 'PART';
     readonly colorId: number | null;
}

// Color on sets and minifigs is order metadata only, never part of the stocking key
export interface SetLine extends StockedItem {
     readonly itemType: 'SET';
     readonly colorId?: number | null;
}

export interface MinifigLine extends StockedItem {
     readonly itemType: 'MINIFIG';
     readonly colorId?: number | null;
}

export type InventoryLine = SetLine | MinifigLine | PartLine;

/**
 * One purchased order item, with order-level fees already folded into its unit cost.
 */
export type PurchaseLine = InventoryLine;

export interface InventoryLineInput {
     itemId: string;
     itemType: ItemType;
     colorId?: number | null;
     quantity: number;
     unitCost: number;
     description?: string;
}

export interface RequiredSet {
     readonly itemType: 'SET';
     readonly itemId: string;
     readonly quantity: number;
}

export interface RequiredMinifig {
     readonly itemType: 'MINIFIG';
     readonly itemId: string;
     readonly quantity: number;
}

export interface RequiredPart {
     readonly itemType: 'PART';
     readonly itemId: string;
     readonly colorId: number | null;
     readonly quantity: number;
     /** Loose part with no named container: marks the bundle as a flat parts kit. */
     readonly isUnspecifiedBundleComponent: boolean;
}

export type RequiredItem = RequiredSet | RequiredMinifig | RequiredPart;

export interface RequiredItemInput {
     itemId: string;
     itemType: ItemType;
     colorId?: number | null;
     quantity: number;
     isUnspecifiedBundleComponent?: boolean;
}

export interface BundleRequirement {
     readonly title: string;
     readonly items: readonly RequiredItem[];
}

export type DeductionOrder = 'STORAGE' | 'LOWEST_COST_FIRST';

export interface PhaseBuilds {
     container: number;
     components: number;
     partsKit: number;
}

export interface AllocationResult {
     buildCount: number;
     totalCost: number;
     residualInventory: InventoryLine[];
     phases: PhaseBuilds;
}

export interface BundleBuildResult extends AllocationResult {
     title: string;
}

export interface BuildPlan {
     results: BundleBuildResult[];
     residualInventory: InventoryLine[];
}

// Order feed
export interface OrderItem {
     itemId: string;
     itemType: string;
     colorId: number | null;
     quantity: number;
     price: number;
     description?: string;
}

export interface Order {
     orderId: string;
     orderDate?: string;
     seller?: string;
     /** Sum of item totals, before shipping and other charges. */
     orderTotal: number;
     /** What was actually paid: item subtotal plus shipping and additional charges. */
     baseGrandTotal: number;
     items: OrderItem[];
}

// Wanted lists
export interface WantedListEntry {
     itemId: string;
     itemType: string;
     colorId?: number | null;
     minQty?: number;
}

export interface WantedList {
     title: string;
     items: WantedListEntry[];
}

// Reporting
export interface BuildSummaryRow {
     title: string;
     buildCount: number;
     totalCost: number;
     averageCost: number;
}

export interface InventoryReportRow {
     itemId: string;
     itemType: ItemType;
     colorId: number | null;
     description: string;
     quantity: number;
     totalCost: number;
     unitCost: number;
}

export interface ReconciliationReport {
     summary: BuildSummaryRow[];
     inventory: InventoryReportRow[];
     leftovers: InventoryReportRow[];
}
