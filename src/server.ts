import dotenv from "dotenv";
import { createApp, createEngine } from "./app";
import { loadConfig } from "./config";
import { errorMessage, log } from "./utils/logging";

dotenv.config();

const PURGE_INTERVAL_MS = 60_000;

function main(): void {
  const config = loadConfig();
  const engine = createEngine(config);
  const app = createApp(config, engine);

  const purge = setInterval(() => {
    const purged = engine.store.purgeExpired();
    if (purged > 0) log.debug("STORE", `purged ${purged} expired fallback entries`);
  }, PURGE_INTERVAL_MS);
  purge.unref();

  app.listen(config.port, () => {
    log.info("SERVER", `honeypot API listening on port ${config.port}`);
    log.info("SERVER", `persona: ${config.persona.name}; callback ${config.callback.url ? "configured" : "NOT configured"}`);
  });
}

try {
  main();
} catch (err) {
  log.error("SERVER", `failed to start: ${errorMessage(err)}`);
  process.exitCode = 1;
}
