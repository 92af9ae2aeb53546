import { AnimalRegistry, Catalog, Notifier } from "@pattern-demos/core";
import { ConsoleObserver, LineWriter } from "../adapters/console";
import type { LineSink } from "../adapters/types";
import { metrics, REGISTRIES_LIVE } from "../host/metrics";

export type RegistryBootstrapOptions = {
  /** Output shared by the console observer; defaults to stdout. */
  writer?: LineWriter;
  sink?: LineSink;
};

export function bootstrapCatalog() {
  return { catalog: new Catalog() };
}

export function bootstrapRegistry(opts: RegistryBootstrapOptions = {}) {
  const writer = opts.writer ?? new LineWriter(opts.sink ?? process.stdout);
  const registry = new AnimalRegistry();
  trackRegistries();
  const notifier = new Notifier();
  const observer = new ConsoleObserver(writer);
  notifier.addObserver(observer);

  /** Close the registry and wait for pending observer output. */
  const shutdown = async (): Promise<void> => {
    registry.close();
    trackRegistries();
    await observer.flush();
  };
  return { registry, notifier, observer, writer, shutdown };
}

function trackRegistries(): void {
  metrics.set(REGISTRIES_LIVE, AnimalRegistry.instanceCount(), "Animal registries constructed and not yet closed");
}
