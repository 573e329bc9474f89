import type { FastifyPluginAsync } from 'fastify';

export type ReadinessCheck = () => Promise<boolean>;

export interface HealthRoutesOptions {
  checks: Record<string, ReadinessCheck>;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, { checks }) => {
  fastify.get('/', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'eduflow-api',
      version: '0.1.0',
    };
  });

  fastify.get('/ready', async (request, reply) => {
    const names = Object.keys(checks);
    const results = await Promise.all(
      names.map(async (name) => {
        try {
          return await checks[name]();
        } catch (err) {
          request.log.warn({ err, check: name }, 'Readiness check threw');
          return false;
        }
      })
    );

    const report = Object.fromEntries(names.map((name, i) => [name, results[i] ? 'ok' : 'unavailable']));
    const ready = results.every(Boolean);

    return reply.code(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks: report,
    });
  });
};
