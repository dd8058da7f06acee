import { engineLogger } from "../logger";
import { errorMessage } from "./errors";

export type EngineEvent =
  | {
      type: "achievement:unlocked";
      at: string;
      key: string;
      name: string;
      category: string;
      points: number;
      rarity: string;
    }
  | {
      type: "dividend:paid";
      at: string;
      symbol: string;
      day: number;
      amount: number;
      reinvestedShares: number;
    }
  | {
      type: "trade";
      at: string;
      action: "buy" | "sell";
      symbol: string;
      quantity: number;
      price: number;
    }
  | {
      type: "account:reborn";
      at: string;
      day: number;
      rebirths: number;
    }
  | {
      type: "day:completed";
      at: string;
      day: number;
      netWorth: number;
    };

/**
 * Destination externe des évènements (temps réel, statistiques, classement).
 * Livraison "au moins une fois" tolérée: un puits doit accepter les doublons.
 */
export interface EngineEventSink {
  readonly name: string;
  publish(accountId: string, event: EngineEvent): Promise<void> | void;
}

/** Best-effort: un puits en échec est journalisé, jamais propagé. */
export async function dispatchEvents(sinks: readonly EngineEventSink[], accountId: string, events: readonly EngineEvent[]) {
  if (sinks.length === 0 || events.length === 0) return;
  const deliveries = sinks.flatMap((sink) =>
    events.map(async (event) => {
      try {
        await sink.publish(accountId, event);
      } catch (err) {
        engineLogger.warn({ sink: sink.name, accountId, type: event.type, err: errorMessage(err) }, "évènement non livré");
      }
    }),
  );
  await Promise.all(deliveries);
}

export class MemoryEventSink implements EngineEventSink {
  readonly name = "memory";
  readonly received: { accountId: string; event: EngineEvent }[] = [];

  publish(accountId: string, event: EngineEvent) {
    this.received.push({ accountId, event });
  }
}
