import { setTimeout as sleep } from "timers/promises";
import { AnimalFactory, AnimalRegistry, DemoError } from "@pattern-demos/core";
import type { Notifier } from "@pattern-demos/core";
import type { Logger } from "./logger";
import { ask as askIO, EndOfInput } from "./terminal";
import type { MenuIO } from "./terminal";
import { metrics, ANIMALS_ADDED } from "../host/metrics";

export const REGISTRY_MENU = [
  "1. Add Animal",
  "2. Display All",
  "3. Remove By Type",
  "4. Display Info By Type",
  "5. Sort By Type",
  "6. Show Registry Count",
  "7. Exit",
] as const;

export type RegistryMenuDeps = {
  registry: AnimalRegistry;
  notifier: Notifier;
  io: MenuIO;
  logger: Logger;
  displayDelayMs: number;
};

/**
 * Show the registry after `delayMs`. The menu awaits this before the next prompt,
 * so it never overlaps a mutation.
 */
export async function displayLater(registry: AnimalRegistry, io: MenuIO, delayMs: number): Promise<void> {
  if (delayMs > 0) await sleep(delayMs);
  io.print("Current animals:");
  for (const line of registry.displayAll()) io.print(`  ${line}`);
}

/** Run the registry menu until Exit or end of input. Resolves with the exit code. */
export async function runRegistryMenu({ registry, notifier, io, logger, displayDelayMs }: RegistryMenuDeps): Promise<number> {
  const ask = (query: string) => askIO(io, query);

  for (;;) {
    for (const line of REGISTRY_MENU) io.print(line);
    try {
      const choice = (await ask("Choose an option: ")).trim();
      switch (choice) {
        case "1": {
          const type = (await ask("Enter animal type (Dog/Cat): ")).trim();
          const name = await ask("Enter animal name: ");
          const animal = AnimalFactory.createAnimal(type, name);
          registry.add(animal);
          metrics.inc(ANIMALS_ADDED, 1, "Animals added to a registry");
          notifier.notify(animal);
          break;
        }
        case "2":
          for (const line of registry.displayAll()) io.print(line);
          break;
        case "3": {
          const type = (await ask("Enter type: ")).trim();
          const removed = registry.removeByType(type);
          logger.debug(`removed ${removed} of type ${type}`);
          io.print(`Removed ${removed} animal(s).`);
          break;
        }
        case "4": {
          const type = (await ask("Enter type: ")).trim();
          for (const line of registry.displayInfoByType(type)) io.print(line);
          break;
        }
        case "5":
          registry.sortByType();
          io.print("Sorted by type.");
          break;
        case "6":
          io.print(`Live registries: ${AnimalRegistry.instanceCount()}`);
          break;
        case "7":
          return 0;
        default:
          io.print("Invalid option, please try again.");
      }
    } catch (err) {
      if (err instanceof EndOfInput) {
        logger.debug("input closed");
        return 0;
      }
      if (!(err instanceof DemoError)) throw err;
      logger.debug(`${err.name}: ${err.message}`);
      io.print(`Error: ${err.message}`);
    }
    await displayLater(registry, io, displayDelayMs);
  }
}
