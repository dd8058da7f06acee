import { FastifyInstance } from "fastify";
import { z } from "zod";
import { LEADERBOARD_SIZE, type Leaderboard } from "../services/leaderboard";

export async function registerLeaderboardRoutes(app: FastifyInstance, leaderboard: Leaderboard) {
  app.get("/api/leaderboard", async (req, reply) => {
    const querySchema = z.object({
      limit: z.coerce.number().int().min(1).max(LEADERBOARD_SIZE).default(LEADERBOARD_SIZE),
      accountId: z.string().min(1).max(64).optional(),
    });
    const { limit, accountId } = querySchema.parse(req.query ?? {});
    const entries = await leaderboard.top(limit, accountId);
    return reply.send({ entries: entries.map((e, i) => ({ rank: i + 1, ...e })) });
  });
}
