import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import * as dotenv from 'dotenv';
import { registerBuildabilityRoutes } from './routes/buildability';
import { logger } from '@bricktally/shared/src/utils/logger';

// Load environment variables
dotenv.config();

const PORT = parseInt(process.env.BUILDABILITY_API_PORT || '3000', 10);
const HOST = process.env.BUILDABILITY_API_HOST || '0.0.0.0';

async function main() {
     const app = Fastify({
          logger: true,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return typeof header === 'string' && header ? header : `req-${Date.now()}`;
          },
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     await app.register(cors, {
          origin: true,
     });

     // OpenAPI/Swagger
     await app.register(swagger, {
          openapi: {
               info: {
                    title: 'Buildability API',
                    description:
                         'Reconciles purchased inventory against wanted lists: buildable bundle counts, consumed cost, leftover stock',
                    version: '1.0.0',
               },
               servers: [{ url: `http://localhost:${PORT}`, description: 'Development' }],
               tags: [
                    {
                         name: 'buildability',
                         description: 'Inventory aggregation, bundle allocation and reconciliation',
                    },
                    { name: 'health', description: 'Health checks' },
               ],
          },
     });

     await app.register(swaggerUi, {
          routePrefix: '/docs',
          uiConfig: {
               docExpansion: 'list',
               deepLinking: true,
          },
     });

     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     await app.register(registerBuildabilityRoutes, { prefix: '/buildability' });

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Buildability API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     // Graceful shutdown
     const shutdown = () => {
          logger.info('Shutting down gracefully...');
          app.close().then(
               () => process.exit(0),
               (err: unknown) => {
                    logger.error({ err }, 'Error during shutdown');
                    process.exit(1);
               }
          );
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in buildability API');
     process.exit(1);
});
