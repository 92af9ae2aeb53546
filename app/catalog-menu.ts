import { createItem, DemoError, member } from "@pattern-demos/core";
import type { Catalog } from "@pattern-demos/core";
import type { Logger } from "./logger";
import { ask as askIO, EndOfInput } from "./terminal";
import type { MenuIO } from "./terminal";
import { metrics, ITEMS_ADDED, MEMBERS_ADDED } from "../host/metrics";

export const CATALOG_MENU = [
  "1. Add Book",
  "2. Add Magazine",
  "3. Add Member",
  "4. Display Items",
  "5. Display Members",
  "6. Exit",
] as const;

export type CatalogMenuDeps = { catalog: Catalog; io: MenuIO; logger: Logger };

/** Run the catalog menu until Exit or end of input. Resolves with the exit code. */
export async function runCatalogMenu({ catalog, io, logger }: CatalogMenuDeps): Promise<number> {
  const ask = (query: string) => askIO(io, query);

  for (;;) {
    for (const line of CATALOG_MENU) io.print(line);
    try {
      const choice = (await ask("Choose an option: ")).trim();
      switch (choice) {
        case "1": {
          const title = await ask("Enter book title: ");
          const author = await ask("Enter book author: ");
          catalog.addItem(createItem("book", title, author));
          metrics.inc(ITEMS_ADDED, 1, "Catalog items added");
          break;
        }
        case "2": {
          const title = await ask("Enter magazine title: ");
          const issue = await ask("Enter magazine issue number: ");
          catalog.addItem(createItem("magazine", title, issue));
          metrics.inc(ITEMS_ADDED, 1, "Catalog items added");
          break;
        }
        case "3": {
          const name = await ask("Enter member name: ");
          catalog.addMember(member(name));
          metrics.inc(MEMBERS_ADDED, 1, "Catalog members added");
          break;
        }
        case "4":
          for (const line of catalog.displayItems()) io.print(line);
          break;
        case "5":
          for (const line of catalog.displayMembers()) io.print(line);
          break;
        case "6":
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
  }
}
