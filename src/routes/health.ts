import { FastifyInstance } from "fastify";

export async function registerHealthRoutes(app: FastifyInstance, ping?: () => Promise<boolean>) {
  app.get("/healthz", async (_req, reply) => {
    // Sans base distante, le serveur tourne sur les sauvegardes locales
    if (!ping) return reply.send({ status: "ok", store: "local" });
    if (await ping()) return reply.send({ status: "ok", store: "remote" });
    app.log.error("healthcheck failed");
    return reply.status(503).send({ status: "degraded", store: "local" });
  });
}
