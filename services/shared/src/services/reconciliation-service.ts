import { Order, ReconciliationReport, WantedList } from '../types/inventory.types';
import { OrderSource, ReportingSink, WantedListSource } from '../clients/reconciliation-sources';
import { aggregateInventory } from './inventory-aggregator';
import { BuildabilityService } from './buildability-service';
import { toPurchaseLinesForOrders } from './order-costing';
import { toInventoryReport, toSummaryRow } from './reporting';
import { toBundleRequirement } from './wanted-list';
import { logger } from '../utils/logger';

export interface ReconciliationInput {
     orders: Order[];
     wantedLists: WantedList[];
}

export class ReconciliationService {
     constructor(private readonly buildability: BuildabilityService = new BuildabilityService()) {}

     /**
      * Cost the orders, fold them into inventory, then build each wanted list
      * in the order given against the stock the previous lists left behind.
      */
     reconcile(input: ReconciliationInput): ReconciliationReport {
          const { orders, wantedLists } = input;

          logger.info(
               { orderCount: orders.length, wantedListCount: wantedLists.length },
               'Reconciling orders against wanted lists'
          );

          const inventory = aggregateInventory(toPurchaseLinesForOrders(orders));
          const bundles = wantedLists.map(toBundleRequirement);
          const plan = this.buildability.planBuilds(bundles, inventory);

          return {
               summary: plan.results.map((result) => toSummaryRow(result.title, result)),
               inventory: toInventoryReport(inventory),
               leftovers: toInventoryReport(plan.residualInventory),
          };
     }

     async run(
          orderSource: OrderSource,
          wantedListSource: WantedListSource,
          sink: ReportingSink
     ): Promise<ReconciliationReport> {
          const orders = await orderSource.getOrders();
          const wantedLists = await wantedListSource.getWantedLists();

          const report = this.reconcile({ orders, wantedLists });

          await sink.publishInventory(report.inventory);
          await sink.publishSummary(report.summary);
          await sink.publishLeftovers(report.leftovers);

          logger.info(
               {
                    bundleCount: report.summary.length,
                    leftoverLines: report.leftovers.length,
               },
               'Reconciliation published'
          );

          return report;
     }
}
