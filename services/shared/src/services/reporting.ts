import {
     AllocationResult,
     BuildSummaryRow,
     InventoryLine,
     InventoryReportRow,
} from '../types/inventory.types';
import { aggregateInventory } from './inventory-aggregator';

export function roundCurrency(value: number): number {
     return Math.round(value * 100) / 100;
}

export function averageCost(totalCost: number, buildCount: number): number {
     return buildCount > 0 ? totalCost / buildCount : 0;
}

export function toSummaryRow(title: string, result: AllocationResult): BuildSummaryRow {
     return {
          title,
          buildCount: result.buildCount,
          totalCost: result.totalCost,
          averageCost: roundCurrency(averageCost(result.totalCost, result.buildCount)),
     };
}

/**
 * Report rows for the stock on hand: one per stocking unit, empty positions
 * left out, money rounded to cents.
 */
export function toInventoryReport(lines: readonly InventoryLine[]): InventoryReportRow[] {
     return aggregateInventory(lines)
          .filter((line) => line.quantity > 0)
          .map((line) => ({
               itemId: line.itemId,
               itemType: line.itemType,
               colorId: line.itemType === 'PART' ? line.colorId : null,
               description: line.description ?? '',
               quantity: line.quantity,
               totalCost: roundCurrency(line.quantity * line.unitCost),
               unitCost: roundCurrency(line.unitCost),
          }));
}
