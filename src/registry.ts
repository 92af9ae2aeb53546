// registry.ts
import { LineWriter } from "../adapters/console";
import { bootstrapRegistry } from "../app/bootstrap";
import { loadConfig } from "../app/config";
import { createLogger } from "../app/logger";
import { runRegistryMenu } from "../app/registry-menu";
import { Terminal } from "../app/terminal";
import { metrics } from "../host/metrics";

async function main(): Promise<number> {
  const config = loadConfig();
  const logger = createLogger("registry", config.logLevel);
  // one writer for menu text, prompts and observer lines
  const writer = new LineWriter(process.stdout);
  const terminal = new Terminal(process.stdin, writer);
  const { registry, notifier, shutdown } = bootstrapRegistry({ writer });
  try {
    return await runRegistryMenu({
      registry,
      notifier,
      io: terminal,
      logger,
      displayDelayMs: config.displayDelayMs,
    });
  } finally {
    await shutdown();
    await terminal.close();
    logger.debug(`metrics\n${metrics.render()}`);
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  err => {
    console.error("[registry] fatal:", err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  },
);
