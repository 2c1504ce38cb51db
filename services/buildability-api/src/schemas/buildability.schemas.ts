const itemTypeSchema = {
     type: 'string',
     enum: ['SET', 'MINIFIG', 'PART'],
     description: 'Stocking type; color only identifies parts',
     example: 'PART',
};

const colorIdSchema = {
     type: ['integer', 'null'],
     description: 'BrickLink color id (parts only)',
     example: 11,
};

const inventoryLineSchema = {
     type: 'object',
     required: ['itemId', 'itemType', 'quantity', 'unitCost'],
     properties: {
          itemId: { type: 'string', example: '3001' },
          itemType: itemTypeSchema,
          colorId: colorIdSchema,
          quantity: { type: 'integer', minimum: 0, example: 12 },
          unitCost: { type: 'number', minimum: 0, example: 0.08 },
          description: { type: 'string', example: 'Brick 2 x 4' },
     },
};

const reportRowSchema = {
     type: 'object',
     properties: {
          itemId: { type: 'string', example: 'sw0001a' },
          itemType: { type: 'string', example: 'MINIFIG' },
          colorId: colorIdSchema,
          description: { type: 'string', example: 'Battle Droid' },
          quantity: { type: 'integer', example: 4 },
          totalCost: { type: 'number', example: 10.4 },
          unitCost: { type: 'number', example: 2.6 },
     },
};

const errorSchema = (description: string, code: string, message: string) => ({
     description,
     type: 'object',
     properties: {
          error: { type: 'string', example: code },
          message: { type: 'string', example: message },
     },
});

const badRequestResponse = errorSchema(
     'Invalid request',
     'INVALID_QUANTITY',
     'Quantity must be a non-negative integer for item 3001'
);

const internalErrorResponse = errorSchema(
     'Internal server error',
     'INTERNAL_ERROR',
     'An unexpected error occurred'
);

export const aggregateInventorySchema = {
     tags: ['buildability'],
     summary: 'Aggregate purchase lines into inventory',
     description:
          'Folds purchase lines into one line per stocking unit with summed quantity and weighted-average unit cost. Sets and minifigs merge across colors.',
     body: {
          type: 'object',
          required: ['lines'],
          properties: {
               lines: {
                    type: 'array',
                    description: 'Purchase lines with fee-inclusive unit cost',
                    items: inventoryLineSchema,
               },
          },
     },
     response: {
          200: {
               description: 'Aggregated inventory',
               type: 'object',
               properties: {
                    lines: { type: 'array', items: inventoryLineSchema },
               },
          },
          400: badRequestResponse,
          500: internalErrorResponse,
     },
};

export const allocateBundleSchema = {
     tags: ['buildability'],
     summary: 'Allocate inventory to one bundle',
     description:
          'Computes how many complete bundles the inventory can build, the cost of the units consumed, and the residual inventory. The submitted inventory is not changed.',
     body: {
          type: 'object',
          required: ['bundle', 'inventory'],
          properties: {
               bundle: {
                    type: 'object',
                    required: ['title', 'items'],
                    properties: {
                         title: { type: 'string', example: 'Clone Trooper Battle Pack' },
                         items: {
                              type: 'array',
                              items: {
                                   type: 'object',
                                   required: ['itemId', 'itemType', 'quantity'],
                                   properties: {
                                        itemId: { type: 'string', example: 'sw0001a' },
                                        itemType: itemTypeSchema,
                                        colorId: colorIdSchema,
                                        quantity: {
                                             type: 'number',
                                             description:
                                                  'Units required per bundle; entries below 1 or not whole are ignored',
                                             example: 2,
                                        },
                                        isUnspecifiedBundleComponent: {
                                             type: 'boolean',
                                             description: 'Loose part of a flat parts kit',
                                             default: false,
                                        },
                                   },
                              },
                         },
                    },
               },
               inventory: { type: 'array', items: inventoryLineSchema },
               deductionOrder: {
                    type: 'string',
                    enum: ['STORAGE', 'LOWEST_COST_FIRST'],
                    description: 'Order in which matching lines are drawn down',
               },
          },
     },
     response: {
          200: {
               description: 'Allocation result',
               type: 'object',
               properties: {
                    title: { type: 'string' },
                    buildCount: { type: 'integer', example: 3 },
                    totalCost: { type: 'number', example: 6 },
                    averageCost: { type: 'number', example: 2 },
                    phases: {
                         type: 'object',
                         properties: {
                              container: { type: 'integer' },
                              components: { type: 'integer' },
                              partsKit: { type: 'integer' },
                         },
                    },
                    residualInventory: { type: 'array', items: inventoryLineSchema },
               },
          },
          400: badRequestResponse,
          500: internalErrorResponse,
     },
};

export const reconcileSchema = {
     tags: ['buildability'],
     summary: 'Reconcile orders against wanted lists',
     description:
          'Costs each order with its fees, aggregates inventory, then builds every wanted list in the order given against the stock left by the lists before it.',
     body: {
          type: 'object',
          required: ['orders', 'wantedLists'],
          properties: {
               orders: {
                    type: 'array',
                    items: {
                         type: 'object',
                         required: ['orderId', 'orderTotal', 'baseGrandTotal', 'items'],
                         properties: {
                              orderId: { type: 'string', example: '24810077' },
                              orderDate: { type: 'string', example: '2024-08-15T10:30:00.000Z' },
                              seller: { type: 'string', example: 'brickyard' },
                              orderTotal: { type: 'number', example: 25 },
                              baseGrandTotal: { type: 'number', example: 29.5 },
                              items: {
                                   type: 'array',
                                   items: {
                                        type: 'object',
                                        required: ['itemId', 'itemType', 'quantity', 'price'],
                                        properties: {
                                             itemId: { type: 'string', example: '3001' },
                                             itemType: {
                                                  type: 'string',
                                                  description: 'BrickLink item type code',
                                                  example: 'P',
                                             },
                                             colorId: colorIdSchema,
                                             quantity: { type: 'integer', minimum: 0, example: 10 },
                                             price: { type: 'number', minimum: 0, example: 0.1 },
                                             description: { type: 'string' },
                                        },
                                   },
                              },
                         },
                    },
               },
               wantedLists: {
                    type: 'array',
                    items: {
                         type: 'object',
                         required: ['title', 'items'],
                         properties: {
                              title: { type: 'string', example: 'sw0001a' },
                              items: {
                                   type: 'array',
                                   items: {
                                        type: 'object',
                                        required: ['itemId', 'itemType'],
                                        properties: {
                                             itemId: { type: 'string', example: '3626b' },
                                             itemType: { type: 'string', example: 'P' },
                                             colorId: colorIdSchema,
                                             minQty: {
                                                  type: 'number',
                                                  description:
                                                       'Units per bundle; omitted on loose kit parts',
                                             },
                                        },
                                   },
                              },
                         },
                    },
               },
          },
     },
     response: {
          200: {
               description: 'Reconciliation report',
               type: 'object',
               properties: {
                    summary: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   title: { type: 'string' },
                                   buildCount: { type: 'integer' },
                                   totalCost: { type: 'number' },
                                   averageCost: { type: 'number' },
                              },
                         },
                    },
                    inventory: { type: 'array', items: reportRowSchema },
                    leftovers: { type: 'array', items: reportRowSchema },
               },
          },
          400: badRequestResponse,
          500: internalErrorResponse,
     },
};
