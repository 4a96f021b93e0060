import { loadConfig } from "./config";
import { log, errorMessage } from "./log";
import { createApp } from "./app";
import { createDatabaseStorage, type StorageHandle } from "./storage";
import { MemStorage } from "./memStorage";
import { ensureSchema } from "./migrate";
import { AviatorEngine } from "./services/aviatorEngine";
import { PaystackGateway } from "./services/paymentService";
import { createTelegramNotifier } from "./services/telegramBot";

async function main() {
  const config = loadConfig();

  let handle: StorageHandle;
  if (config.databaseUrl) {
    handle = createDatabaseStorage(config.databaseUrl);
    if (handle.pool) await ensureSchema(handle.pool);
  } else {
    log("DATABASE_URL not set, using in-memory storage", "db");
    handle = { storage: new MemStorage() };
  }

  if (config.adminToken === "change-me") {
    log("ADMIN_TOKEN is the default value; set it before exposing admin routes", "config");
  }

  const gateway = config.paystack.secretKey
    ? new PaystackGateway(config.paystack.secretKey, config.paystack.baseUrl)
    : null;
  if (!gateway) log("PAYSTACK_SECRET_KEY not set, deposits are disabled", "paystack");

  const { httpServer } = await createApp({
    store: handle.storage,
    gateway,
    notifier: createTelegramNotifier(config.telegramBotToken),
    adminToken: config.adminToken,
  });

  const engine = new AviatorEngine(handle.storage, config.aviator);
  if (config.aviator.enabled) engine.start();

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log(`${signal} received, shutting down`);
    await engine.stop();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    await handle.pool?.end();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        log(`shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  log(`startup failed: ${errorMessage(error)}`);
  process.exit(1);
});
