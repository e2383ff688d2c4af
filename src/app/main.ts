import "dotenv/config";
import { loadConfig } from "../config";
import { PerpetualConnector } from "../core/connector";
import { asError } from "../errors/app.errors";
import { ConsoleLogger } from "../utils/logger.util";

const METRICS_LOG_INTERVAL_MS = 60_000;

let connector: PerpetualConnector | undefined;
let metricsTimer: NodeJS.Timeout | undefined;

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new ConsoleLogger(config.logLevel);

  logger.info(
    `[Main] Reconciling subaccount ${config.exchange.subaccountId} for ${config.exchange.tradingPairs.join(", ") || "no trading pairs"}`,
  );

  connector = PerpetualConnector.fromConfig(config, { logger });
  connector.start();

  const running = connector;
  metricsTimer = setInterval(() => {
    const { registry, reconciliation, ledger } = running.getMetrics();
    logger.info(
      `[Main] active=${registry.activeOrders} completed=${registry.completedOrders} ` +
        `fills=${registry.fillsApplied} duplicates=${reconciliation.duplicates} ` +
        `unattributed=${reconciliation.unattributed} positions=${ledger.positions} balances=${ledger.balances}`,
    );
  }, METRICS_LOG_INTERVAL_MS);
}

/**
 * Stop polling and the stream before exit
 */
async function gracefulShutdown(signal: string): Promise<void> {
  console.log(`\n[Shutdown] Received ${signal}, cleaning up...`);
  if (metricsTimer) clearInterval(metricsTimer);
  if (connector) {
    await connector.stop();
  }
  console.log("[Shutdown] Cleanup complete, exiting...");
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    gracefulShutdown(signal).catch((err: unknown) => {
      console.error("[Shutdown] Failed:", asError(err).message);
      process.exit(1);
    });
  });
}

main().catch((err) => {
  console.error("Fatal error in main():", err);
  process.exit(1);
});
