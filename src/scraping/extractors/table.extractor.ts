/**
 * Table Extractor
 *
 * Schema-driven extraction of records from the portal's positional markup.
 * The portal has no ids or semantic markup on its tables; a value's
 * meaning comes from its position (listings) or from the caption cell
 * before it (detail pages). A RecordSchema states that mapping once so
 * extraction is table-driven instead of index switches.
 *
 * Two modes:
 * - row: listing pages. Cells are walked in document order, optionally
 *   filtered by an exact class, and cell i goes to field i mod width.
 *   Listings repeat their header row as the first group of data cells,
 *   so that group is dropped when the schema says so.
 * - titleValue: detail pages. Alternating (caption, value) cells from
 *   nested tables; the caption picks the field, unknown captions are skipped.
 *
 * Results are lazy and restartable: each iteration walks the page again.
 */
import * as cheerio from "cheerio";
import type { UsageRatio } from "../../shared/types/portal.types";
import { StructuralError } from "../../shared/errors/portal.errors";

export type DecodingRule = "text" | "textWithLink" | "ratio";

export interface FieldSpec<K extends string> {
  readonly field: K;
  readonly rule: DecodingRule;
}

export interface CellValue {
  text: string;
  /** href of the first anchor in the cell ("" when the cell has none) */
  link?: string;
  ratio?: UsageRatio;
}

export type ExtractedRecord<K extends string> = Partial<Record<K, CellValue>>;

export interface RowSchema<K extends string> {
  readonly mode: "row";
  /** Ordered columns; the length is the record width */
  readonly fields: readonly FieldSpec<K>[];
  /** Only cells whose class attribute equals this value */
  readonly cellClass?: string;
  /**
   * sequence: column = running cell count mod width (default)
   * sibling: column = the cell's position within its row
   */
  readonly columnIndex?: "sequence" | "sibling";
  /** Drop the first completed group (the repeated header) */
  readonly dropHeaderRecord: boolean;
}

export interface TitleValueSchema<K extends string> {
  readonly mode: "titleValue";
  /** Selects caption and value cells, e.g. "table table table td" */
  readonly cellSelector: string;
  /** Portal caption -> destination field. Later captions win on collisions. */
  readonly labels: Readonly<Record<string, FieldSpec<K>>>;
}

export type RecordSchema<K extends string> = RowSchema<K> | TitleValueSchema<K>;

/**
 * Extract records from a parsed page.
 *
 * @throws StructuralError (during iteration) if a ratio cell holds no ratio
 */
export function extractRecords<K extends string>(
  $: cheerio.CheerioAPI,
  schema: RecordSchema<K>
): Iterable<ExtractedRecord<K>> {
  return {
    [Symbol.iterator]: () =>
      schema.mode === "row" ? walkRows($, schema) : walkTitleValues($, schema),
  };
}

/**
 * Parse "used/total" plus "pct%" from a cell, in either order,
 * e.g. "62.50%(160/256)" or "160/256 (62.50%)".
 *
 * @throws StructuralError if either part is missing
 */
export function parseUsageRatio(text: string): UsageRatio {
  const counts = /([\d,]+)\s*\/\s*([\d,]+)/.exec(text);
  const percent = /(\d+(?:\.\d+)?)\s*%/.exec(text);
  if (!counts || !percent) {
    throw new StructuralError(`No usage ratio in cell "${text}"`, { text });
  }
  return {
    used: Number(counts[1].replace(/,/g, "")),
    total: Number(counts[2].replace(/,/g, "")),
    percent: Number(percent[1]),
  };
}

export function decodeCell(text: string, href: string | undefined, rule: DecodingRule): CellValue {
  switch (rule) {
    case "text":
      return { text };
    case "textWithLink":
      return { text, link: href ?? "" };
    case "ratio":
      return { text, ratio: parseUsageRatio(text) };
  }
}

function* walkRows<K extends string>(
  $: cheerio.CheerioAPI,
  schema: RowSchema<K>
): Generator<ExtractedRecord<K>> {
  const width = schema.fields.length;
  let record: ExtractedRecord<K> = {};
  let sequence = 0;
  let completed = 0;

  for (const element of $("table td").toArray()) {
    const cell = $(element);
    if (schema.cellClass !== undefined && cell.attr("class") !== schema.cellClass) {
      continue;
    }

    const column = schema.columnIndex === "sibling" ? cell.index() : sequence++ % width;
    if (column < 0 || column >= width) {
      continue;
    }

    const mapping = schema.fields[column];
    record[mapping.field] = decodeCell(cell.text().trim(), cell.find("a").attr("href"), mapping.rule);

    if (column === width - 1) {
      completed++;
      if (!(schema.dropHeaderRecord && completed === 1)) {
        yield record;
      }
      record = {};
    }
  }
}

function* walkTitleValues<K extends string>(
  $: cheerio.CheerioAPI,
  schema: TitleValueSchema<K>
): Generator<ExtractedRecord<K>> {
  const record: ExtractedRecord<K> = {};
  const cells = $(schema.cellSelector).toArray();

  for (let i = 0; i + 1 < cells.length; i += 2) {
    const title = $(cells[i]).text().trim();
    if (!Object.hasOwn(schema.labels, title)) {
      continue;
    }
    const mapping = schema.labels[title];
    const value = $(cells[i + 1]);
    record[mapping.field] = decodeCell(value.text().trim(), value.find("a").attr("href"), mapping.rule);
  }

  yield record;
}
