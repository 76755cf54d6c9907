/**
 * CLI output formatters for todo commands.
 *
 * All formatX() functions transform command output objects into human-readable strings.
 * These are pure functions with no side effects.
 */

import type {
  AddOutput,
  Item,
  RemoveOutput,
  ShowOutput,
  TodoError,
  UpdateOutput,
} from "../../types.ts";

function formatItem(item: Item): string {
  return `${item.index}: [${item.done ? "x" : " "}] ${item.text}`;
}

/** One line per item; empty string for an empty store. */
export function formatShow(output: ShowOutput): string {
  return output.items.map(formatItem).join("\n");
}

export function formatAdd(output: AddOutput): string {
  return `Added ${output.item.index}: ${output.item.text}`;
}

export function formatRemove(output: RemoveOutput): string {
  return `Removed ${output.removed.index}: ${output.removed.text}`;
}

export function formatUpdate(output: UpdateOutput): string {
  const { before, after } = output;
  if (output.change === "text") {
    return `Updated ${after.index}: ${before.text} -> ${after.text}`;
  }
  const state = after.done ? "done" : "not done";
  return `Marked ${after.index} as ${state}: ${after.text}`;
}

export function formatError(error: TodoError): string {
  return `error: ${error.code}\n${error.message}`;
}
