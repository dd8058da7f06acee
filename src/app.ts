import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import cookie from "@fastify/cookie";
import { ZodError } from "zod";
import { EngineError, type EngineErrorKind } from "./engine/errors";
import { loggerOptions } from "./logger";
import { registerAccountRoutes } from "./routes/accounts";
import { registerDocs } from "./routes/docs";
import { registerHealthRoutes } from "./routes/health";
import { registerLeaderboardRoutes } from "./routes/leaderboard";
import { registerMarketRoutes } from "./routes/markets";
import { registerSyncRoutes } from "./routes/sync";
import type { AccountService } from "./services/accounts";
import { MemoryLeaderboard, type Leaderboard } from "./services/leaderboard";
import type { MarketService } from "./services/market";
import type { AccountRef, MigrationLog, MigrationRecord } from "./services/migration";
import { isAllowedOrigin } from "./socket";

export interface AppDeps {
  accounts: AccountService;
  market: MarketService;
  migrate: (source: AccountRef, target: AccountRef) => Promise<MigrationRecord>;
  migrations: MigrationLog;
  leaderboard?: Leaderboard;
  ping?: () => Promise<boolean>;
  docs?: boolean;
  rateLimit?: { max: number; timeWindow: string };
  // false en test: pas de logs de requêtes
  logRequests?: boolean;
}

const STATUS_BY_KIND: Record<EngineErrorKind, number> = {
  ValidationError: 400,
  InsufficientFunds: 400,
  InsufficientHoldings: 400,
  NotFound: 404,
  PredicateError: 500,
  PersistenceError: 503,
};

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: deps.logRequests === false ? false : loggerOptions });

  await app.register(cors, {
    credentials: true,
    origin: (origin, cb) => {
      if (isAllowedOrigin(origin)) return cb(null, true);
      // Log refus pour diagnostic en production (CORS)
      app.log.warn({ origin }, "CORS origin refusé");
      cb(new Error("Origin not allowed"), false);
    },
  });
  await app.register(rateLimit, deps.rateLimit ?? { max: 100, timeWindow: "1 minute" });
  await app.register(cookie);

  // Gestionnaire d'erreurs standardisé (Zod -> 400, erreurs moteur selon leur nature)
  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ZodError) {
      return reply.status(400).send({ error: "Validation error", details: err.issues });
    }
    if (err instanceof EngineError) {
      const status = STATUS_BY_KIND[err.kind];
      if (status >= 500) req.log.error({ err }, "engine error");
      return reply.status(status).send({ error: err.message, kind: err.kind });
    }
    if (typeof err.statusCode === "number" && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }
    req.log.error({ err }, "Unhandled error");
    return reply.status(500).send({ error: "Internal Server Error" });
  });

  await registerHealthRoutes(app, deps.ping);
  await registerAccountRoutes(app, deps.accounts);
  await registerMarketRoutes(app, deps.market);
  await registerSyncRoutes(app, { accounts: deps.accounts, migrate: deps.migrate, migrations: deps.migrations });
  await registerLeaderboardRoutes(app, deps.leaderboard ?? new MemoryLeaderboard());
  if (deps.docs) await registerDocs(app);

  return app;
}
