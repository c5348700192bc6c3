import "dotenv/config";
import { loadConfig } from "./utils/Config";
import { ConfigError } from "./utils/Errors";
import { MetaSyncClient } from "./utils/MetaSync";
import { SectorRotationMonitor } from "./utils/Monitor";

async function main() {
  const config = loadConfig();

  const source = new MetaSyncClient({
    apiKey: config.rapidApiKey,
    apiHost: config.rapidApiHost,
    login: config.mt5Login,
    password: config.mt5Password,
    server: config.mt5Server,
    requestTimeoutMs: config.requestTimeoutMs,
    minRequestIntervalMs: config.minRequestIntervalMs,
  });
  const monitor = new SectorRotationMonitor(config, source);

  await monitor.initialize();
  monitor.start();

  const shutdown = () => {
    console.log("\n🛑 Shutdown signal received, closing...");
    monitor
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("💥 Error during shutdown:", error);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(`❌ Configuration error: ${error.message}`);
  } else {
    console.error("💥 Fatal error:", error);
  }
  process.exit(1);
});
