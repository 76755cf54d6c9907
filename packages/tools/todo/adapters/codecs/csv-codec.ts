/**
 * Adapter: CsvItemCodec
 *
 * One row per item under an `Index,Text,Done` header.
 * Quoting follows RFC 4180: fields holding a comma, a quote or a line
 * break are wrapped in double quotes, inner quotes doubled.
 *
 * Decoding is lenient about the header (optional, `Id,Description,Done`
 * from older files is accepted), CRLF line endings, blank lines and a
 * missing Done column.
 */

import type { Item } from "../../domain/entities/item.ts";
import { TodoError } from "../../domain/entities/errors.ts";
import type { ItemCodec } from "../../domain/ports/item-codec.ts";

export const CSV_HEADER = "Index,Text,Done";

type CsvRow = {
  readonly line: number; // 1-based line where the row starts
  readonly fields: string[];
};

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replaceAll('"', '""')}"`;
  }
  return value;
}

function isHeader(fields: readonly string[]): boolean {
  const first = fields[0]?.trim().toLowerCase();
  return first === "index" || first === "id";
}

function parseDone(
  raw: string | undefined,
  source: string,
  line: number,
): boolean {
  const value = (raw ?? "").trim().toLowerCase();
  if (value === "" || value === "false") return false;
  if (value === "true") return true;
  throw new TodoError(
    "invalid_file",
    `Invalid Done value '${raw}' in ${source} line ${line}`,
  );
}

/**
 * Split CSV content into rows of fields.
 * Line breaks inside quoted fields belong to the field.
 */
function parseRows(content: string, source: string): CsvRow[] {
  const rows: CsvRow[] = [];
  let fields: string[] = [];
  let field = "";
  let inQuotes = false;
  let line = 1;
  let rowLine = 1;

  const endRow = () => {
    fields.push(field);
    // A lone empty field is a blank line
    if (fields.length > 1 || fields[0] !== "") {
      rows.push({ line: rowLine, fields });
    }
    fields = [];
    field = "";
  };

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];

    if (inQuotes) {
      if (ch === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === "\n") line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"' && field === "") {
      inQuotes = true;
    } else if (ch === ",") {
      fields.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && content[i + 1] === "\n") i++;
      endRow();
      line++;
      rowLine = line;
    } else {
      field += ch;
    }
  }

  if (inQuotes) {
    throw new TodoError(
      "invalid_file",
      `Unterminated quoted field in ${source} line ${rowLine}`,
    );
  }
  if (field !== "" || fields.length > 0) {
    endRow();
  }

  return rows;
}

export class CsvItemCodec implements ItemCodec {
  readonly format = "csv";

  encode(items: readonly Item[]): string {
    const lines = [CSV_HEADER];
    for (const [index, item] of items.entries()) {
      lines.push(`${index},${escapeField(item.text)},${item.done}`);
    }
    return lines.join("\n") + "\n";
  }

  decode(content: string, source: string): Item[] {
    const rows = parseRows(content, source);
    if (rows.length > 0 && isHeader(rows[0].fields)) {
      rows.shift();
    }

    return rows.map(({ line, fields }, index) => {
      if (fields.length < 2) {
        throw new TodoError(
          "invalid_file",
          `Expected Index,Text,Done in ${source} line ${line}`,
        );
      }
      return {
        index,
        text: fields[1],
        done: parseDone(fields[2], source, line),
      };
    });
  }
}
