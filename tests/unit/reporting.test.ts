import {
     averageCost,
     roundCurrency,
     toInventoryReport,
     toSummaryRow,
} from '@bricktally/shared/src/services/reporting';
import { minifigLine, partLine } from '../helpers/fixtures';

describe('Reporting', () => {
     describe('averageCost', () => {
          it('should divide total cost by builds', () => {
               expect(averageCost(10, 4)).toBe(2.5);
          });

          it('should be zero when nothing was built', () => {
               expect(averageCost(0, 0)).toBe(0);
               expect(averageCost(5, 0)).toBe(0);
          });
     });

     describe('roundCurrency', () => {
          it('should round to cents', () => {
               expect(roundCurrency(3.3333)).toBe(3.33);
               expect(roundCurrency(0.999)).toBe(1);
          });
     });

     describe('toSummaryRow', () => {
          it('should round only the average cost', () => {
               const row = toSummaryRow('sw0001a', {
                    buildCount: 3,
                    totalCost: 10,
                    residualInventory: [],
                    phases: { container: 0, components: 3, partsKit: 0 },
               });

               expect(row).toEqual({
                    title: 'sw0001a',
                    buildCount: 3,
                    totalCost: 10,
                    averageCost: 3.33,
               });
          });

          it('should report zero average cost for zero builds', () => {
               const row = toSummaryRow('none', {
                    buildCount: 0,
                    totalCost: 0,
                    residualInventory: [],
                    phases: { container: 0, components: 0, partsKit: 0 },
               });

               expect(row.averageCost).toBe(0);
          });
     });

     describe('toInventoryReport', () => {
          it('should merge stocking units, drop empty ones and round money', () => {
               const rows = toInventoryReport([
                    minifigLine('M1', 1, 3, 0),
                    partLine('P1', 5, 0, 1),
                    minifigLine('M1', 3, 1, 11),
                    partLine('P2', 1, 3, 0.333),
               ]);

               expect(rows).toEqual([
                    {
                         itemId: 'M1',
                         itemType: 'MINIFIG',
                         colorId: null,
                         description: '',
                         quantity: 4,
                         totalCost: 6,
                         unitCost: 1.5,
                    },
                    {
                         itemId: 'P2',
                         itemType: 'PART',
                         colorId: 1,
                         description: '',
                         quantity: 3,
                         totalCost: 1,
                         unitCost: 0.33,
                    },
               ]);
          });

          it('should be empty when everything was used', () => {
               expect(toInventoryReport([partLine('P1', 5, 0, 1)])).toEqual([]);
          });
     });
});
