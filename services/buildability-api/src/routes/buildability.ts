import { FastifyInstance, FastifyReply } from 'fastify';
import { createInventoryLine, createRequiredItem } from '@bricktally/shared/src/domain/items';
import { aggregateInventory } from '@bricktally/shared/src/services/inventory-aggregator';
import {
     BuildabilityService,
     createBuildabilityService,
} from '@bricktally/shared/src/services/buildability-service';
import { ReconciliationService } from '@bricktally/shared/src/services/reconciliation-service';
import { averageCost } from '@bricktally/shared/src/services/reporting';
import {
     CollectingReportingSink,
     InMemoryOrderSource,
     InMemoryWantedListSource,
} from '@bricktally/shared/src/clients/reconciliation-sources';
import { DomainError } from '@bricktally/shared/src/utils/errors';
import { logger } from '@bricktally/shared/src/utils/logger';
import type {
     DeductionOrder,
     InventoryLineInput,
     Order,
     RequiredItemInput,
     WantedList,
} from '@bricktally/shared/src/types/inventory.types';
import {
     aggregateInventorySchema,
     allocateBundleSchema,
     reconcileSchema,
} from '../schemas/buildability.schemas';

interface AllocateBody {
     bundle: {
          title: string;
          items: RequiredItemInput[];
     };
     inventory: InventoryLineInput[];
     deductionOrder?: DeductionOrder;
}

interface OrderItemBody {
     itemId: string;
     itemType: string;
     colorId?: number | null;
     quantity: number;
     price: number;
     description?: string;
}

interface ReconcileBody {
     orders: Array<Omit<Order, 'items'> & { items: OrderItemBody[] }>;
     wantedLists: WantedList[];
}

function sendError(reply: FastifyReply, error: unknown, context: string) {
     if (error instanceof DomainError) {
          return reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
          });
     }

     logger.error({ err: error }, context);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}

export async function registerBuildabilityRoutes(app: FastifyInstance) {
     const defaultService = createBuildabilityService();

     // Fold purchase lines into inventory
     app.post<{ Body: { lines: InventoryLineInput[] } }>(
          '/inventory/aggregate',
          { schema: aggregateInventorySchema },
          async (request, reply) => {
               try {
                    const lines = request.body.lines.map(createInventoryLine);
                    return reply.code(200).send({ lines: aggregateInventory(lines) });
               } catch (error) {
                    return sendError(reply, error, 'Failed to aggregate inventory');
               }
          }
     );

     // Allocate inventory to a single bundle
     app.post<{ Body: AllocateBody }>(
          '/allocate',
          { schema: allocateBundleSchema },
          async (request, reply) => {
               const { bundle, inventory, deductionOrder } = request.body;

               try {
                    const service = deductionOrder
                         ? new BuildabilityService({ deductionOrder })
                         : defaultService;

                    const requirements = bundle.items.filter(
                         (item) => Number.isInteger(item.quantity) && item.quantity >= 1
                    );
                    if (requirements.length < bundle.items.length) {
                         request.log.debug(
                              { dropped: bundle.items.length - requirements.length },
                              'Ignoring requirements without a positive whole quantity'
                         );
                    }

                    const result = service.allocate(
                         { title: bundle.title, items: requirements.map(createRequiredItem) },
                         inventory.map(createInventoryLine)
                    );

                    return reply.code(200).send({
                         title: bundle.title,
                         ...result,
                         averageCost: averageCost(result.totalCost, result.buildCount),
                    });
               } catch (error) {
                    return sendError(reply, error, 'Failed to allocate bundle');
               }
          }
     );

     // Full reconciliation: orders in, summary and leftovers out
     app.post<{ Body: ReconcileBody }>(
          '/reconcile',
          { schema: reconcileSchema },
          async (request, reply) => {
               const orders: Order[] = request.body.orders.map((order) => ({
                    ...order,
                    items: order.items.map((item) => ({ ...item, colorId: item.colorId ?? null })),
               }));

               try {
                    const sink = new CollectingReportingSink();
                    const reconciliation = new ReconciliationService(defaultService);

                    await reconciliation.run(
                         new InMemoryOrderSource(orders),
                         new InMemoryWantedListSource(request.body.wantedLists),
                         sink
                    );

                    request.log.info(
                         { bundleCount: sink.summary.length },
                         'Reconciliation completed'
                    );

                    return reply.code(200).send({
                         summary: sink.summary,
                         inventory: sink.inventory,
                         leftovers: sink.leftovers,
                    });
               } catch (error) {
                    return sendError(reply, error, 'Failed to reconcile');
               }
          }
     );
}
