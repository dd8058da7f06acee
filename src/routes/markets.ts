import { FastifyInstance } from "fastify";
import { z } from "zod";
import type { MarketService } from "../services/market";

export async function registerMarketRoutes(app: FastifyInstance, market: MarketService) {
  app.get("/api/markets/latest", async (_req, reply) => {
    return reply.send({ day: market.day, prices: market.latestPrices() });
  });

  app.get("/api/markets/assets", async (_req, reply) => {
    return reply.send({ day: market.day, assets: market.listAssets() });
  });

  // Historique pour graphiques (borné par HISTORY_CAP)
  app.get("/api/markets/history/:symbol", async (req, reply) => {
    const paramsSchema = z.object({ symbol: z.string().min(1).transform((s) => s.toUpperCase()) });
    const querySchema = z.object({ limit: z.coerce.number().int().min(2).max(5000).optional() });
    const { symbol } = paramsSchema.parse(req.params);
    const { limit } = querySchema.parse(req.query ?? {});
    const data = await market.history(symbol, limit);
    return reply.send({ symbol, data });
  });

  app.get("/api/markets/overview", async (_req, reply) => {
    return reply.send(market.overview());
  });
}
