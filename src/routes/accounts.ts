import { FastifyInstance } from "fastify";
import { z } from "zod";
import type { AccountService } from "../services/accounts";
import { accountParamsSchema, resolveAccountId, sendRejection } from "./helpers/account";

const positive = z.number().finite().positive();

export async function registerAccountRoutes(app: FastifyInstance, accounts: AccountService) {
  // Création à la première utilisation (cookie invité si aucun id fourni)
  app.post("/api/accounts", async (req, reply) => {
    const bodySchema = z.object({ accountId: z.string().min(1).max(64).optional() });
    const { accountId } = bodySchema.parse(req.body ?? {});
    const id = resolveAccountId(req, reply, accountId);
    const account = await accounts.open(id);
    return reply.status(201).send({ account });
  });

  app.get("/api/accounts/:accountId", async (req, reply) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    const account = await accounts.get(accountId);
    return reply.send({ account });
  });

  app.post("/api/accounts/:accountId/trades", async (req, reply) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    const bodySchema = z.object({
      symbol: z.string().min(1).transform((s) => s.toUpperCase()),
      quantity: positive,
      action: z.enum(["buy", "sell"]),
    });
    const order = bodySchema.parse(req.body);
    const result = await accounts.trade(accountId, order);
    if (!result.ok) return sendRejection(reply, result);
    return reply.send({ status: "ok", ...result });
  });

  app.post("/api/accounts/:accountId/bank", async (req, reply) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    const bodySchema = z.object({
      action: z.enum(["deposit", "withdraw", "loan", "repay"]),
      // repay: 0 = remboursement total
      amount: z.number().finite().nonnegative(),
    });
    const { action, amount } = bodySchema.parse(req.body);
    const result = await accounts.bank(accountId, action, amount);
    if (!result.ok) return sendRejection(reply, result);
    return reply.send({ status: "ok", ...result });
  });

  app.post("/api/accounts/:accountId/miners", async (req, reply) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    const { kh } = z.object({ kh: positive }).parse(req.body);
    const result = await accounts.buyMiner(accountId, kh);
    if (!result.ok) return sendRejection(reply, result);
    return reply.send({ status: "ok", ...result });
  });

  app.post("/api/accounts/:accountId/mined/sell", async (req, reply) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    const { amount } = z.object({ amount: positive }).parse(req.body);
    const result = await accounts.sellMined(accountId, amount);
    if (!result.ok) return sendRejection(reply, result);
    return reply.send({ status: "ok", ...result });
  });

  app.put("/api/accounts/:accountId/drip/:symbol", async (req, reply) => {
    const paramsSchema = accountParamsSchema.extend({ symbol: z.string().min(1).transform((s) => s.toUpperCase()) });
    const { accountId, symbol } = paramsSchema.parse(req.params);
    const { enabled } = z.object({ enabled: z.boolean() }).parse(req.body);
    const result = await accounts.setDrip(accountId, symbol, enabled);
    if (!result.ok) return sendRejection(reply, result);
    return reply.send({ status: "ok", ...result });
  });

  app.get("/api/accounts/:accountId/achievements", async (req, reply) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    const summary = await accounts.achievements(accountId);
    return reply.send(summary);
  });
}
