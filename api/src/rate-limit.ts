import type { FastifyInstance } from 'fastify';

export type BurstGuardOptions = {
  threshold: number;
  windowMs: number;
  blockMs: number;
  clock?: () => number;
};

type BurstEntry = { count: number; first: number; blockedUntil: number };

// More than `threshold` requests from one IP inside `windowMs` blocks it for `blockMs`.
export function registerBurstGuard(app: FastifyInstance, opts: BurstGuardOptions) {
  const hits = new Map<string, BurstEntry>();
  const clock = opts.clock ?? Date.now;
  let lastSweep = clock();

  // drop IPs whose window and block have both run out
  const sweep = (now: number) => {
    for (const [key, entry] of hits) {
      if (now - entry.first > opts.windowMs && entry.blockedUntil <= now) {
        hits.delete(key);
      }
    }
    lastSweep = now;
  };

  app.addHook('preHandler', async (req, reply) => {
    const key = req.ip || 'unknown';
    const now = clock();
    if (now - lastSweep > opts.windowMs) {
      sweep(now);
    }
    const entry = hits.get(key) ?? { count: 0, first: now, blockedUntil: 0 };

    if (entry.blockedUntil > now) {
      return reply.code(429).send({ error: 'RATE_LIMITED', message: 'Too many requests; temporarily blocked' });
    }

    if (now - entry.first > opts.windowMs) {
      entry.count = 0;
      entry.first = now;
    }

    entry.count += 1;
    if (entry.count > opts.threshold) {
      entry.blockedUntil = now + opts.blockMs;
      hits.set(key, entry);
      req.log.warn({ ip: key, until: new Date(entry.blockedUntil).toISOString() }, 'Burst limit exceeded');
      return reply.code(429).send({ error: 'RATE_LIMITED', message: 'Burst limit exceeded' });
    }

    hits.set(key, entry);
  });

  return { trackedIps: () => hits.size };
}
