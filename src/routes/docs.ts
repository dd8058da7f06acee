import { FastifyInstance } from "fastify";
import swagger from "@fastify/swagger";
import swaggerUI from "@fastify/swagger-ui";
import { existsSync } from "fs";
import path from "path";

/** Contrat OpenAPI statique servi sur /docs; ignoré si le fichier est absent. */
export async function registerDocs(app: FastifyInstance, baseDir: string = process.cwd()) {
  const specPath = "openapi/openapi.yaml";
  if (!existsSync(path.join(baseDir, specPath))) {
    app.log.warn({ specPath }, "[docs] contrat OpenAPI introuvable, /docs désactivé");
    return false;
  }
  await app.register(swagger, {
    mode: "static",
    specification: { path: specPath, baseDir },
  });
  await app.register(swaggerUI, {
    routePrefix: "/docs",
    uiConfig: { docExpansion: "list", deepLinking: true },
  });
  return true;
}
