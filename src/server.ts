import dotenv from "dotenv";
import { createHoneypot } from "./app";
import { loadConfig } from "./utils/config";
import { safeLog, safeWarn } from "./utils/logging";

dotenv.config();

const config = loadConfig();
const { app, store, model } = createHoneypot(config);

if (!config.apiKey) {
  safeWarn("[CONFIG] HONEYPOT_API_KEY is not set; requests are not authenticated");
}
if (model.provider === "none") {
  safeWarn("[CONFIG] no model provider configured; replies use local fallbacks");
}

store.startEviction();

const server = app.listen(config.port, () => {
  safeLog(`HoneyPot API listening on port ${config.port} (provider=${model.provider})`);
});

function shutdown(signal: string) {
  safeLog(`[SERVER] ${signal} received, shutting down`);
  store.stop();
  server.close(() => process.exit(0));
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
