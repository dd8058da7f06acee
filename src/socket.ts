import { Server as SocketIOServer } from "socket.io";
import type { Server as HTTPServer } from "http";
import { env } from "./env";
import type { EngineEvent, EngineEventSink } from "./engine/events";

export function isAllowedOrigin(origin: string | undefined): boolean {
  // autoriser requêtes serveur-à-serveur et outils (origin nul)
  if (!origin) return true;
  if (env.CLIENT_ORIGINS.includes(origin)) return true;
  // autoriser localhost en dev (http et https, avec/sans port)
  if (origin.startsWith("http://localhost:") || origin.startsWith("https://localhost:")) return true;
  return origin === "http://localhost" || origin === "https://localhost";
}

const roomOf = (accountId: string) => `account:${accountId}`;

export function setupSocket(server: HTTPServer) {
  // Même logique CORS que le HTTP (Fastify)
  const io = new SocketIOServer(server, {
    cors: {
      credentials: true,
      origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
        if (isAllowedOrigin(origin)) return callback(null, true);
        return callback(new Error("Origin not allowed"));
      },
    },
  });

  io.on("connection", (socket) => {
    const { accountId } = socket.handshake.query;
    if (typeof accountId === "string" && accountId) void socket.join(roomOf(accountId));

    socket.on("join-account", (id: unknown) => {
      if (typeof id === "string" && id) void socket.join(roomOf(id));
    });
    socket.on("leave-account", (id: unknown) => {
      if (typeof id === "string" && id) void socket.leave(roomOf(id));
    });
  });

  return { io, sink: new SocketEventSink(io) };
}

/** Diffuse les évènements du moteur sur `event-feed`, room du compte. */
export class SocketEventSink implements EngineEventSink {
  readonly name = "socket.io";

  constructor(private readonly io: Pick<SocketIOServer, "to">) {}

  publish(accountId: string, event: EngineEvent) {
    this.io.to(roomOf(accountId)).emit("event-feed", { accountId, ...event });
  }
}
