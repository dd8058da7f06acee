export type EngineErrorKind =
  | "ValidationError"
  | "InsufficientFunds"
  | "InsufficientHoldings"
  | "PersistenceError"
  | "PredicateError"
  | "NotFound";

/** Erreur métier du moteur; `message` est affichable tel quel au joueur. */
export class EngineError extends Error {
  readonly kind: EngineErrorKind;

  constructor(kind: EngineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineError";
    this.kind = kind;
  }
}

// Stockage injoignable ou illisible: récupérable via un magasin de repli
export class PersistenceError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super("PersistenceError", message, { cause });
    this.name = "PersistenceError";
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
