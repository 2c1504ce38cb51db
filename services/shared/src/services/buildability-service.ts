import {
     AllocationResult,
     BuildPlan,
     BundleBuildResult,
     BundleRequirement,
     DeductionOrder,
     InventoryLine,
     PhaseBuilds,
     RequiredMinifig,
     RequiredPart,
     RequiredSet,
} from '../types/inventory.types';
import { stockingKey } from '../domain/items';
import { InvalidConfigurationError } from '../utils/errors';
import { createChildLogger, logger } from '../utils/logger';

export const DEDUCTION_ORDERS: readonly DeductionOrder[] = ['STORAGE', 'LOWEST_COST_FIRST'];

export interface BuildabilityOptions {
     deductionOrder?: DeductionOrder;
}

interface StockPosition {
     line: InventoryLine;
     quantity: number;
}

interface PhaseRequirement {
     key: string;
     quantity: number;
     matches: (line: InventoryLine) => boolean;
}

interface PhaseOutcome {
     builds: number;
     cost: number;
}

const NO_BUILDS: PhaseOutcome = { builds: 0, cost: 0 };

function containerRequirement(item: RequiredSet): PhaseRequirement {
     return {
          key: stockingKey(item),
          quantity: item.quantity,
          matches: (line) => line.itemType === 'SET' && line.itemId === item.itemId,
     };
}

// Minifigs are counted across every color variant on hand
function minifigRequirement(item: RequiredMinifig): PhaseRequirement {
     return {
          key: stockingKey(item),
          quantity: item.quantity,
          matches: (line) => line.itemType === 'MINIFIG' && line.itemId === item.itemId,
     };
}

function partRequirement(item: RequiredPart): PhaseRequirement {
     return {
          key: stockingKey(item),
          quantity: item.quantity,
          matches: (line) =>
               line.itemType === 'PART' &&
               line.itemId === item.itemId &&
               line.colorId === item.colorId,
     };
}

/**
 * Collapse requirements on the same stocking unit: the last declared quantity
 * wins, the first declared position is kept.
 */
function byStockingUnit(requirements: PhaseRequirement[]): PhaseRequirement[] {
     const unique = new Map<string, PhaseRequirement>();
     for (const requirement of requirements) {
          unique.set(requirement.key, requirement);
     }
     return [...unique.values()];
}

export function resolveDeductionOrder(value: string | undefined): DeductionOrder {
     if (!value || !value.trim()) {
          return 'STORAGE';
     }

     const normalized = value.trim().toUpperCase();
     const match = DEDUCTION_ORDERS.find((order) => order === normalized);

     if (!match) {
          throw new InvalidConfigurationError(
               'DEDUCTION_ORDER',
               `Unknown deduction order ${value}; expected one of ${DEDUCTION_ORDERS.join(', ')}`
          );
     }

     return match;
}

export class BuildabilityService {
     readonly deductionOrder: DeductionOrder;

     constructor(options: BuildabilityOptions = {}) {
          this.deductionOrder = options.deductionOrder ?? 'STORAGE';
     }

     /**
      * Work out how many bundles the inventory can complete and what the
      * consumed units cost. The caller's inventory is left untouched; the
      * residual inventory comes back as new lines in the same order.
      *
      * Three phases run in sequence against the same working copy: the set
      * (container), then minifigs with their named accessory parts, then the
      * flat parts kit when any part is an unspecified-bundle component. Each
      * phase's builds add to the total.
      */
     allocate(bundle: BundleRequirement, inventory: readonly InventoryLine[]): AllocationResult {
          const log = createChildLogger({ bundle: bundle.title });
          const stock: StockPosition[] = inventory.map((line) => ({
               line,
               quantity: line.quantity,
          }));
          const phases: PhaseBuilds = { container: 0, components: 0, partsKit: 0 };
          let totalCost = 0;

          // Only the first set on a list is ever built
          const container = bundle.items.find(
               (item): item is RequiredSet => item.itemType === 'SET'
          );
          if (container) {
               const outcome = this.buildPhase(stock, [containerRequirement(container)]);
               phases.container = outcome.builds;
               totalCost += outcome.cost;
          }

          const parts = bundle.items.filter(
               (item): item is RequiredPart => item.itemType === 'PART'
          );

          const components = byStockingUnit([
               ...bundle.items
                    .filter((item): item is RequiredMinifig => item.itemType === 'MINIFIG')
                    .map(minifigRequirement),
               ...parts
                    .filter((part) => !part.isUnspecifiedBundleComponent)
                    .map(partRequirement),
          ]);
          const componentOutcome = this.buildPhase(stock, components);
          phases.components = componentOutcome.builds;
          totalCost += componentOutcome.cost;

          // A parts kit re-scans every part, named accessories included
          if (parts.some((part) => part.isUnspecifiedBundleComponent)) {
               const kitOutcome = this.buildPhase(
                    stock,
                    byStockingUnit(parts.map(partRequirement))
               );
               phases.partsKit = kitOutcome.builds;
               totalCost += kitOutcome.cost;
          }

          const buildCount = phases.container + phases.components + phases.partsKit;

          log.debug({ phases, buildCount, totalCost }, 'Bundle allocated');

          return {
               buildCount,
               totalCost,
               residualInventory: stock.map(({ line, quantity }) => ({ ...line, quantity })),
               phases,
          };
     }

     /**
      * Allocate each bundle in turn, handing the residual inventory of one to
      * the next, so earlier bundles claim shared stock first.
      */
     planBuilds(
          bundles: readonly BundleRequirement[],
          inventory: readonly InventoryLine[]
     ): BuildPlan {
          logger.info(
               { bundleCount: bundles.length, lineCount: inventory.length },
               'Planning builds'
          );

          const results: BundleBuildResult[] = [];
          let current: readonly InventoryLine[] = inventory;

          for (const bundle of bundles) {
               const result = this.allocate(bundle, current);
               results.push({ title: bundle.title, ...result });
               current = result.residualInventory;
          }

          logger.info(
               { totalBuilds: results.reduce((sum, r) => sum + r.buildCount, 0) },
               'Build plan complete'
          );

          return { results, residualInventory: [...current] };
     }

     private buildPhase(stock: StockPosition[], requirements: PhaseRequirement[]): PhaseOutcome {
          if (requirements.length === 0) {
               return NO_BUILDS;
          }

          const builds = Math.min(
               ...requirements.map((requirement) =>
                    Math.floor(this.available(stock, requirement) / requirement.quantity)
               )
          );

          if (builds <= 0) {
               return NO_BUILDS;
          }

          let cost = 0;
          for (const requirement of requirements) {
               cost += this.deduct(stock, requirement, requirement.quantity * builds);
          }

          return { builds, cost };
     }

     private available(stock: StockPosition[], requirement: PhaseRequirement): number {
          return stock
               .filter((position) => requirement.matches(position.line))
               .reduce((sum, position) => sum + position.quantity, 0);
     }

     /**
      * Take units first-fit from matching lines and return what they cost.
      */
     private deduct(stock: StockPosition[], requirement: PhaseRequirement, amount: number): number {
          const matching = stock.filter((position) => requirement.matches(position.line));
          const ordered =
               this.deductionOrder === 'LOWEST_COST_FIRST'
                    ? [...matching].sort((a, b) => a.line.unitCost - b.line.unitCost)
                    : matching;

          let remaining = amount;
          let cost = 0;

          for (const position of ordered) {
               if (remaining === 0) {
                    break;
               }
               if (position.quantity <= 0) {
                    continue;
               }

               const taken = Math.min(position.quantity, remaining);
               position.quantity -= taken;
               cost += taken * position.line.unitCost;
               remaining -= taken;
          }

          return cost;
     }
}

export function createBuildabilityService(): BuildabilityService {
     const deductionOrder = resolveDeductionOrder(process.env.DEDUCTION_ORDER);
     logger.info({ deductionOrder }, 'Using buildability deduction order');
     return new BuildabilityService({ deductionOrder });
}
