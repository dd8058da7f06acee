import { FastifyInstance } from "fastify";
import { z } from "zod";
import type { AccountService } from "../services/accounts";
import type { AccountRef, MigrationLog, MigrationRecord } from "../services/migration";
import { accountParamsSchema } from "./helpers/account";

const refSchema = z.object({
  platform: z.string().min(1).max(32),
  accountId: z.string().min(1).max(64),
});

export interface SyncRouteDeps {
  accounts: AccountService;
  migrate: (source: AccountRef, target: AccountRef) => Promise<MigrationRecord>;
  migrations: MigrationLog;
}

export async function registerSyncRoutes(app: FastifyInstance, deps: SyncRouteDeps) {
  app.get("/api/accounts/:accountId/snapshot", async (req, reply) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    const snapshot = await deps.accounts.exportSnapshot(accountId);
    return reply.send({ accountId, snapshot });
  });

  // Import tolérant: clés manquantes par défaut, clés inconnues ignorées
  app.put("/api/accounts/:accountId/snapshot", async (req, reply) => {
    const { accountId } = accountParamsSchema.parse(req.params);
    const { snapshot } = z.object({ snapshot: z.record(z.unknown()) }).parse(req.body);
    const account = await deps.accounts.importSnapshot(accountId, snapshot);
    return reply.send({ status: "ok", account });
  });

  app.post("/api/migrations", async (req, reply) => {
    const { source, target } = z.object({ source: refSchema, target: refSchema }).parse(req.body);
    const record = await deps.migrate(source, target);
    app.log.info({ source, target, runs: record.runs }, "[sync] migration");
    return reply.send({ status: "ok", migration: record });
  });

  app.get("/api/migrations", async (_req, reply) => {
    const migrations = await deps.migrations.list();
    return reply.send({ migrations });
  });
}
