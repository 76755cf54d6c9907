import { Command } from "@commander-js/extra-typings";
import { parseSelector, TodoError } from "./types.ts";
import {
  formatAdd,
  formatError,
  formatRemove,
  formatShow,
  formatUpdate,
} from "./adapters/cli/formatter.ts";
import { ShowItemsUseCase } from "./domain/use-cases/show-items.ts";
import { AddItemUseCase } from "./domain/use-cases/add-item.ts";
import { RemoveItemUseCase } from "./domain/use-cases/remove-item.ts";
import { UpdateItemUseCase } from "./domain/use-cases/update-item.ts";
import { DEFAULT_FILE } from "./config.ts";
import { openItemStore } from "./mod.ts";

// ============================================================================
// Version
// ============================================================================

const VERSION = "0.1.0";

// ============================================================================
// Helpers
// ============================================================================

function handleError(e: unknown, json: boolean): void {
  if (e instanceof TodoError) {
    if (json) {
      console.error(JSON.stringify(e.toJSON()));
    } else {
      console.error(formatError(e));
    }
    process.exitCode = 1;
    return;
  }
  throw e;
}

/** Join variadic words; undefined when none were given. */
function joinWords(words: readonly string[] | undefined): string | undefined {
  if (!words || words.length === 0) return undefined;
  return words.join(" ");
}

// ============================================================================
// Commands
// ============================================================================

function showCmd() {
  return new Command("show")
    .description("List all items with their index")
    .option("--json", "Output as JSON")
    .option("-f, --file <path>", "Backing file")
    .option("--format <format>", "File format (json or csv)")
    .action(async (options) => {
      try {
        const output = await new ShowItemsUseCase(openItemStore(options))
          .execute();
        if (options.json) {
          console.log(JSON.stringify(output));
          return;
        }
        const text = formatShow(output);
        if (text) console.log(text);
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });
}

function addCmd() {
  return new Command("add")
    .description("Append an item")
    .argument("<text...>", "Item text")
    .option("--json", "Output as JSON")
    .option("-f, --file <path>", "Backing file")
    .option("--format <format>", "File format (json or csv)")
    .action(async (words, options) => {
      try {
        const output = await new AddItemUseCase(openItemStore(options))
          .execute({ text: words.join(" ") });
        console.log(options.json ? JSON.stringify(output) : formatAdd(output));
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });
}

function removeCmd() {
  return new Command("remove")
    .description("Remove an item by index or text")
    .argument("<selector...>", "Item index or text")
    .option("--json", "Output as JSON")
    .option("-f, --file <path>", "Backing file")
    .option("--format <format>", "File format (json or csv)")
    .action(async (words, options) => {
      try {
        const output = await new RemoveItemUseCase(openItemStore(options))
          .execute({ selector: parseSelector(words.join(" ")) });
        console.log(
          options.json ? JSON.stringify(output) : formatRemove(output),
        );
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });
}

function updateCmd() {
  return new Command("update")
    .description(
      "Replace an item's text, or toggle it done when no new text is given",
    )
    .argument("<selector>", "Item index or text")
    .argument("[text...]", "New item text")
    .option("--json", "Output as JSON")
    .option("-f, --file <path>", "Backing file")
    .option("--format <format>", "File format (json or csv)")
    .action(async (selector, words, options) => {
      try {
        const output = await new UpdateItemUseCase(openItemStore(options))
          .execute({ selector: parseSelector(selector), text: joinWords(words) });
        console.log(
          options.json ? JSON.stringify(output) : formatUpdate(output),
        );
      } catch (e) {
        handleError(e, options.json ?? false);
      }
    });
}

// ============================================================================
// Main CLI
// ============================================================================

function buildCli() {
  return new Command()
    .name("todo")
    .version(VERSION)
    .description(
      "Todo - Keep a to-do list in a CSV or JSON file\n\n" +
        "Examples:\n" +
        '  todo add "buy milk"          # Append an item\n' +
        "  todo show                    # List items with their index\n" +
        "  todo update 0 buy oat milk   # Replace the text of item 0\n" +
        "  todo update 0                # Toggle item 0 done\n" +
        '  todo remove "buy oat milk"   # Remove by index or text\n\n' +
        `Items are stored in ./${DEFAULT_FILE} unless --file or TODO_FILE ` +
        "says otherwise; a .csv extension selects CSV.",
    )
    .addCommand(showCmd())
    .addCommand(addCmd())
    .addCommand(removeCmd())
    .addCommand(updateCmd());
}

export async function main(args: string[]): Promise<void> {
  const cli = buildCli();
  // Show help when no arguments provided
  if (args.length === 0) {
    console.log(cli.helpInformation());
    return;
  }
  await cli.parseAsync(args, { from: "user" });
}
