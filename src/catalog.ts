// catalog.ts
import { LineWriter } from "../adapters/console";
import { bootstrapCatalog } from "../app/bootstrap";
import { runCatalogMenu } from "../app/catalog-menu";
import { loadConfig } from "../app/config";
import { createLogger } from "../app/logger";
import { Terminal } from "../app/terminal";
import { metrics } from "../host/metrics";

async function main(): Promise<number> {
  const config = loadConfig();
  const logger = createLogger("catalog", config.logLevel);
  const terminal = new Terminal(process.stdin, new LineWriter(process.stdout));
  const { catalog } = bootstrapCatalog();
  try {
    return await runCatalogMenu({ catalog, io: terminal, logger });
  } finally {
    await terminal.close();
    logger.debug(`metrics\n${metrics.render()}`);
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  err => {
    console.error("[catalog] fatal:", err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  },
);
