import type { FastifyReply, FastifyRequest } from "fastify";
import { nanoid } from "nanoid";
import { z } from "zod";

export const GUEST_COOKIE = "bq_guest";

export const accountParamsSchema = z.object({ accountId: z.string().min(1).max(64) });

/** Id explicite, sinon cookie invité, sinon nouvel id (posé en cookie pour un an). */
export function resolveAccountId(req: FastifyRequest, reply: FastifyReply, explicit?: string): string {
  const id = explicit ?? req.cookies[GUEST_COOKIE] ?? nanoid();
  if (req.cookies[GUEST_COOKIE] !== id) {
    reply.setCookie(GUEST_COOKIE, id, {
      path: "/",
      httpOnly: true,
      sameSite: "lax",
      maxAge: 60 * 60 * 24 * 365, // 1 an
    });
  }
  return id;
}

/** Rejet métier: 400 avec le message affichable. */
export function sendRejection(reply: FastifyReply, result: { error: string; message: string }) {
  return reply.status(400).send({ error: result.message, kind: result.error });
}
