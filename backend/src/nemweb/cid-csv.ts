import { strFromU8, unzipSync } from "fflate";

// AEMO publishes reports in the "CID" CSV layout: `C` rows are comments,
// `I` rows declare a table header (`I,<report>,<sub-report>,<version>,<cols>`)
// and `D` rows carry data for the most recent header of the same table.

export const CID_FIELD_OFFSET = 4;

export interface CidRow {
  line: number;
  fields: string[];
}

export interface CidTable {
  report: string;
  subReport: string;
  version: string;
  columns: string[];
  rows: CidRow[];
}

export interface CsvEntry {
  name: string;
  text: string;
}

export function unzipCsvEntries(bytes: Uint8Array): CsvEntry[] {
  const files = unzipSync(bytes, {
    filter: (file) => file.name.toUpperCase().endsWith(".CSV"),
  });
  return Object.entries(files).map(([name, data]) => ({name, text: strFromU8(data)}));
}

export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quoted) {
      if (char === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      fields.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  fields.push(current);
  return fields.map((field) => field.trim());
}

export function tableKey(report: string, subReport: string): string {
  return `${report.toUpperCase()}.${subReport.toUpperCase()}`;
}

/**
 * Reads the CID tables of one CSV file. `wanted` filters by report name so large
 * bundles only materialise the rows that will be decoded.
 */
export function readCidTables(text: string, wanted?: (report: string, subReport: string) => boolean): Map<string, CidTable> {
  const tables = new Map<string, CidTable>();
  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const raw = lines[index];
    if (!raw || raw.length < 2) {
      continue;
    }
    const recordType = raw[0];
    if (recordType !== "I" && recordType !== "D") {
      continue;
    }
    const fields = splitCsvLine(raw);
    const report = (fields[1] ?? "").toUpperCase();
    const subReport = (fields[2] ?? "").toUpperCase();
    if (wanted && !wanted(report, subReport)) {
      continue;
    }
    const key = tableKey(report, subReport);
    if (recordType === "I") {
      tables.set(key, {
        report,
        subReport,
        version: fields[3] ?? "",
        columns: fields.slice(CID_FIELD_OFFSET).map((column) => column.toUpperCase()),
        rows: [],
      });
      continue;
    }
    tables.get(key)?.rows.push({line: index + 1, fields});
  }
  return tables;
}
