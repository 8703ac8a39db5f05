import { FastifyRequest, FastifyReply } from 'fastify';
import { DatabaseService } from '../services/database.service';
import { logger } from '../utils/logger';

/**
 * Health check controllers
 */

/**
 * GET /health - Basic health check
 * Returns 200 if service is running
 */
export async function healthCheck(
  _request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  reply.code(200).send({
    status: 'ok',
    timestamp: new Date().toISOString(),
  });
}

/**
 * GET /ready - Readiness check
 * Checks database connectivity
 */
export function createReadinessCheck(databaseService: DatabaseService) {
  return async function readinessCheck(
    _request: FastifyRequest,
    reply: FastifyReply
  ): Promise<void> {
    try {
      const dbHealthy = await databaseService.healthCheck();

      if (!dbHealthy) {
        reply.code(503).send({
          status: 'unhealthy',
          database: 'down',
          timestamp: new Date().toISOString(),
        });
        return;
      }

      reply.code(200).send({
        status: 'ready',
        database: 'up',
        pool: databaseService.getPoolStatus(),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      logger.error('HealthController', 'Readiness check failed', error);
      reply.code(503).send({
        status: 'unhealthy',
        error: 'Readiness check failed',
        timestamp: new Date().toISOString(),
      });
    }
  };
}
