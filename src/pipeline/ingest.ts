import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { convert } from "html-to-text";
import XLSX from "xlsx";
import type { Product } from "../types.js";
import { makeSlug, normalizeText, trimToEmpty } from "../utils/text.js";

type ProductField = "handle" | "title" | "body" | "vendor" | "existingType" | "existingTags";

const COLUMN_ALIASES: Record<ProductField, string[]> = {
  handle: ["handle", "product_handle", "slug", "url_handle"],
  title: ["title", "product_title", "name", "product_name"],
  body: ["body_html", "body", "description", "body_text", "product_description"],
  vendor: ["vendor", "brand", "manufacturer"],
  existingType: ["type", "product_type", "category"],
  existingTags: ["tags", "product_tags", "existing_tags"],
};

const PRODUCT_FIELDS: readonly ProductField[] = [
  "handle",
  "title",
  "body",
  "vendor",
  "existingType",
  "existingTags",
];

export interface CatalogInput {
  products: Product[];
  /** Original header order, reproduced by the bucket exports. */
  columns: string[];
}

type RawRow = Record<string, string>;

function normalizeHeader(header: string): string {
  return normalizeText(header).replace(/\s+/g, "_");
}

function pickColumn(columns: readonly string[], aliases: string[]): string | undefined {
  const normalizedMap = new Map<string, string>();
  for (const key of columns) {
    normalizedMap.set(normalizeHeader(key), key);
  }

  for (const alias of aliases) {
    const realKey = normalizedMap.get(alias);
    if (realKey) {
      return realKey;
    }
  }

  return undefined;
}

export function htmlToPlainText(html: string): string {
  if (!html) {
    return "";
  }
  return convert(html, {
    wordwrap: false,
    selectors: [
      { selector: "a", options: { ignoreHref: true } },
      { selector: "img", format: "skip" },
    ],
  })
    .replace(/\s+/g, " ")
    .trim();
}

function toRawRow(row: Record<string, unknown>): RawRow {
  const output: RawRow = {};
  for (const [key, value] of Object.entries(row)) {
    output[key] = trimToEmpty(value === null || value === undefined ? "" : String(value));
  }
  return output;
}

/**
 * Folds Shopify variant rows into one product per handle. The first row with
 * a title is the primary row; other rows only fill its empty cells.
 */
export function mapRowsToProducts(rows: Record<string, unknown>[], columns: readonly string[]): Product[] {
  if (rows.length === 0) {
    return [];
  }

  const keyMap: Partial<Record<ProductField, string>> = {};
  for (const field of PRODUCT_FIELDS) {
    keyMap[field] = pickColumn(columns, COLUMN_ALIASES[field]);
  }

  if (!keyMap.handle && !keyMap.title) {
    throw new Error("Input file must include a Handle or a Title column (or an alias).");
  }

  const groups = new Map<string, RawRow[]>();
  for (const rawRow of rows) {
    const row = toRawRow(rawRow);
    const title = keyMap.title ? row[keyMap.title] ?? "" : "";
    const explicitHandle = keyMap.handle ? row[keyMap.handle] ?? "" : "";
    if (!explicitHandle && !title) {
      continue;
    }

    const handle = explicitHandle || makeSlug(title);
    const group = groups.get(handle);
    if (group) {
      group.push(row);
    } else {
      groups.set(handle, [row]);
    }
  }

  const products: Product[] = [];
  for (const [handle, group] of groups) {
    const primaryIndex = keyMap.title
      ? Math.max(0, group.findIndex((row) => Boolean(keyMap.title && row[keyMap.title])))
      : 0;
    const merged: RawRow = { ...group[primaryIndex] };
    for (const row of group) {
      for (const column of columns) {
        if (!merged[column] && row[column]) {
          merged[column] = row[column];
        }
      }
    }

    const read = (field: ProductField): string => {
      const column = keyMap[field];
      return column ? merged[column] ?? "" : "";
    };

    products.push({
      handle,
      title: read("title"),
      body: htmlToPlainText(read("body")),
      vendor: read("vendor"),
      existingType: read("existingType"),
      existingTags: read("existingTags"),
      source: merged,
    });
  }

  return products;
}

export async function readCatalogFile(filePath: string): Promise<CatalogInput> {
  const extension = path.extname(filePath).toLowerCase();

  if (extension === ".csv") {
    const content = await readFile(filePath, "utf8");
    let columns: string[] = [];
    const rows: Record<string, unknown>[] = parse(content, {
      columns: (header: unknown[]) => {
        columns = header.map((cell) => String(cell));
        return columns;
      },
      skip_empty_lines: true,
      bom: true,
      trim: true,
    });
    return { products: mapRowsToProducts(rows, columns), columns };
  }

  if (extension === ".xlsx" || extension === ".xls") {
    const workbook = XLSX.readFile(filePath);
    const firstSheetName = workbook.SheetNames[0];
    if (!firstSheetName) {
      return { products: [], columns: [] };
    }

    const worksheet = workbook.Sheets[firstSheetName];
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(worksheet, {
      defval: "",
    });
    const columns = rows.length > 0 ? Object.keys(rows[0]) : [];
    return { products: mapRowsToProducts(rows, columns), columns };
  }

  throw new Error(`Unsupported input format: ${extension}. Use .csv or .xlsx.`);
}
