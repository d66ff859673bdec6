import "reflect-metadata";
import dotenv from "dotenv";
import { Server } from "http";
import { createApp } from "./app";
import { loadMarketplaceConfig } from "./config/marketplace.config";
import { AppDataSource } from "./config/ormconfig";
import { MarketplaceStore } from "./services/store/marketplaceStore";
import { TypeOrmMarketplaceStore } from "./services/store/typeormStore";
import { InMemoryMarketplaceStore } from "./services/store/memoryStore";
import { createMarketplace, setMarketplace } from "./services/marketplace";
import { logger } from "./utils/logger";

// Load environment variables
dotenv.config();

const startServer = async (): Promise<void> => {
  const config = loadMarketplaceConfig();

  let store: MarketplaceStore;
  if (config.storage === "postgres") {
    logger.info("Initializing database connection...");
    await AppDataSource.initialize();
    logger.info(
      `Database connected: ${process.env.DB_HOST ?? "localhost"}:${process.env.DB_PORT ?? "5432"}/${process.env.DB_NAME ?? "haulbid_db"}`
    );
    store = new TypeOrmMarketplaceStore(AppDataSource);
  } else {
    logger.warn("STORAGE=memory: state is lost on restart");
    store = new InMemoryMarketplaceStore(config.lockTimeoutMs);
  }

  const marketplace = createMarketplace({ store, config });
  setMarketplace(marketplace);
  await marketplace.scheduler.recover();

  const app = createApp();
  const server: Server = app.listen(config.port, () => {
    logger.info(`Server running on http://localhost:${config.port}`);
    logger.info(`API docs: http://localhost:${config.port}/docs`);
  });

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, shutting down`);

    server.close(() => {
      marketplace
        .shutdown()
        .then(() => (AppDataSource.isInitialized ? AppDataSource.destroy() : undefined))
        .then(() => {
          logger.info("Shutdown complete");
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error("Shutdown failed", { error });
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
};

startServer().catch((error: unknown) => {
  logger.error("Failed to start server", { error });
  process.exit(1);
});
