import {
     BuildSummaryRow,
     InventoryReportRow,
     Order,
     WantedList,
} from '../types/inventory.types';
import { logger } from '../utils/logger';

export interface OrderSource {
     getOrders(): Promise<Order[]>;
}

export interface WantedListSource {
     getWantedLists(): Promise<WantedList[]>;
}

export interface ReportingSink {
     publishInventory(rows: InventoryReportRow[]): Promise<void>;
     publishSummary(rows: BuildSummaryRow[]): Promise<void>;
     publishLeftovers(rows: InventoryReportRow[]): Promise<void>;
}

export class InMemoryOrderSource implements OrderSource {
     constructor(private readonly orders: Order[]) {}

     async getOrders(): Promise<Order[]> {
          logger.debug({ orderCount: this.orders.length }, 'In-memory getOrders');
          return [...this.orders];
     }
}

export class InMemoryWantedListSource implements WantedListSource {
     constructor(private readonly wantedLists: WantedList[]) {}

     async getWantedLists(): Promise<WantedList[]> {
          logger.debug({ listCount: this.wantedLists.length }, 'In-memory getWantedLists');
          return [...this.wantedLists];
     }
}

/**
 * Keeps whatever was last published so callers can read the report back.
 */
export class CollectingReportingSink implements ReportingSink {
     inventory: InventoryReportRow[] = [];
     summary: BuildSummaryRow[] = [];
     leftovers: InventoryReportRow[] = [];

     async publishInventory(rows: InventoryReportRow[]): Promise<void> {
          this.inventory = rows;
     }

     async publishSummary(rows: BuildSummaryRow[]): Promise<void> {
          this.summary = rows;
     }

     async publishLeftovers(rows: InventoryReportRow[]): Promise<void> {
          this.leftovers = rows;
     }
}
