import dotenv from "dotenv";
import path from "path";

// Charge toujours le .env à la racine du projet, même si le process est lancé depuis un autre dossier
try {
  const envPath = path.resolve(__dirname, "../.env");
  dotenv.config({ path: envPath });
} catch {
  // Fallback: recherche par défaut de dotenv (cwd)
  dotenv.config();
}

const flag = (value: string | undefined, fallback: boolean) =>
  value === undefined ? fallback : value.toLowerCase() === "true";

const optionalNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
};

export const env = {
  PORT: Number(process.env.PORT ?? 3001),
  // Vide = pas de stockage distant, le serveur tourne sur les sauvegardes locales
  DATABASE_URL: process.env.DATABASE_URL ?? "",
  // Un "jour" de jeu toutes les 30 s par défaut (prix -> dividendes -> succès)
  DAY_TICK_CRON: process.env.DAY_TICK_CRON ?? "*/30 * * * * *",
  TIMEZONE: process.env.TIMEZONE ?? "America/Toronto",
  NODE_ENV: process.env.NODE_ENV ?? "development",
  LOG_LEVEL: process.env.LOG_LEVEL ?? "info",
  // Autoriser plusieurs origines, séparées par des virgules
  CLIENT_ORIGINS: (process.env.CLIENT_ORIGIN ?? "http://localhost:3000")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean),
  SAVE_DIR: process.env.SAVE_DIR ?? "saves",
  HISTORY_CAP: Math.max(2, Number(process.env.HISTORY_CAP ?? 250) || 250),
  MIGRATE_ON_BOOT: flag(process.env.MIGRATE_ON_BOOT, false),
  RNG_SEED: optionalNumber(process.env.RNG_SEED),
};
