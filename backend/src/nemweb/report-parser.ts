import {
  EnergyPrice,
  ParseError,
  createForecastSeries,
  describeError,
  parseMarketTimestamp,
} from "@nemcast/domain";
import type { ForecastSeries, ParseWarning, PricePoint, RegionCode } from "@nemcast/domain";
import { CID_FIELD_OFFSET, readCidTables, unzipCsvEntries } from "./cid-csv";
import type { CidTable, CsvEntry } from "./cid-csv";
import type { ReportBundle } from "./report-fetcher";
import { TABLE_SCHEMAS } from "./report-sources";
import type { TableSchema } from "./report-sources";

const PRICE_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

export interface DecodeOptions {
  maxPeriods: number | null;
}

export interface DecodeResult {
  series: ForecastSeries;
  warnings: ParseWarning[];
  table: string;
}

interface ColumnIndex {
  time: number;
  region: number;
  price: number;
  intervention: number | null;
}

interface LocatedTable {
  schema: TableSchema;
  table: CidTable;
  file: string;
}

export function parsePriceField(value: string): number | null {
  const trimmed = value.trim();
  if (!PRICE_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function schemaLabel(schema: TableSchema): string {
  return `${schema.report}.${schema.subReport ?? "*"}`;
}

function matchesSchema(schema: TableSchema, report: string, subReport: string): boolean {
  return report === schema.report && (schema.subReport === null || subReport === schema.subReport);
}

function readEntries(bundle: ReportBundle): CsvEntry[] {
  let entries: CsvEntry[];
  try {
    entries = unzipCsvEntries(bundle.bytes);
  } catch (error) {
    throw new ParseError("schema_mismatch", `${bundle.fileName} is not a readable ZIP archive: ${describeError(error)}`, {
      cause: error,
    });
  }
  if (!entries.length) {
    throw new ParseError("schema_mismatch", `${bundle.fileName} contains no CSV reports`);
  }
  return entries;
}

function locateTable(bundle: ReportBundle, entries: CsvEntry[]): LocatedTable {
  const schemas = TABLE_SCHEMAS[bundle.product];
  for (const entry of entries) {
    const tables = readCidTables(entry.text, (report, subReport) =>
      schemas.some((schema) => matchesSchema(schema, report, subReport)),
    );
    for (const schema of schemas) {
      for (const table of tables.values()) {
        if (matchesSchema(schema, table.report, table.subReport)) {
          return {schema, table, file: entry.name};
        }
      }
    }
  }
  const expected = schemas.map(schemaLabel).join(" or ");
  throw new ParseError("schema_mismatch", `${bundle.fileName} has no ${expected} table`);
}

function indexColumns(located: LocatedTable): ColumnIndex {
  const {schema, table} = located;
  const find = (name: string) => table.columns.indexOf(name);
  const required = {time: schema.timeColumn, region: schema.regionColumn, price: schema.priceColumn};
  const missing = Object.values(required).filter((column) => find(column) < 0);
  if (missing.length) {
    throw new ParseError(
      "schema_mismatch",
      `${table.report}.${table.subReport} header in ${located.file} is missing ${missing.join(", ")}`,
    );
  }
  const intervention = schema.interventionColumn ? find(schema.interventionColumn) : -1;
  return {
    time: find(required.time),
    region: find(required.region),
    price: find(required.price),
    intervention: intervention >= 0 ? intervention : null,
  };
}

/**
 * Decodes a NEMWEB bundle into the price series of one region. Rows with an
 * unreadable timestamp or price are skipped and reported as warnings; a missing
 * table or column fails the whole decode.
 */
export function decodeBundle(bundle: ReportBundle, region: RegionCode, options: DecodeOptions): DecodeResult {
  const located = locateTable(bundle, readEntries(bundle));
  const columns = indexColumns(located);
  const width = CID_FIELD_OFFSET + Math.max(columns.time, columns.region, columns.price, columns.intervention ?? 0) + 1;

  const points: PricePoint[] = [];
  const warnings: ParseWarning[] = [];
  const warn = (line: number, reason: string) =>
    warnings.push({kind: "malformed_row", file: located.file, line, reason});

  for (const row of located.table.rows) {
    const {fields} = row;
    if (fields.length < width) {
      warn(row.line, `expected at least ${width} fields, got ${fields.length}`);
      continue;
    }
    if (fields[CID_FIELD_OFFSET + columns.region] !== region) {
      continue;
    }
    if (columns.intervention !== null) {
      const intervention = fields[CID_FIELD_OFFSET + columns.intervention];
      if (intervention !== "" && Number(intervention) !== 0) {
        continue;
      }
    }
    const rawTime = fields[CID_FIELD_OFFSET + columns.time];
    const timestampMs = parseMarketTimestamp(rawTime);
    if (timestampMs === null) {
      warn(row.line, `unparseable timestamp '${rawTime}'`);
      continue;
    }
    const rawPrice = fields[CID_FIELD_OFFSET + columns.price];
    const price = parsePriceField(rawPrice);
    if (price === null) {
      warn(row.line, `unparseable price '${rawPrice}'`);
      continue;
    }
    points.push({timestampMs, price: EnergyPrice.fromDollarsPerMwh(price)});
  }

  if (!points.length) {
    throw new ParseError("no_data", `${bundle.fileName} has no usable ${region} rows`);
  }

  const series = createForecastSeries({
    region,
    product: bundle.product,
    points,
    generatedAt: bundle.publishedAt,
    sourceFile: bundle.fileName,
    maxPoints: options.maxPeriods,
  });
  return {series, warnings, table: `${located.table.report}.${located.table.subReport}`};
}
