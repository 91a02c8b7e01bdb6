import { parseFileTimestamp } from "@nemcast/domain";

export interface ListedReport {
  fileName: string;
  publishedAt: number;
  sequence: string;
}

/**
 * Pulls every report file name matching `pattern` out of a NEMWEB directory
 * listing. Each file appears twice in the HTML (href and link text); duplicates
 * are collapsed.
 */
export function extractReportFiles(html: string, pattern: RegExp): ListedReport[] {
  const matcher = new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`);
  const seen = new Map<string, ListedReport>();
  for (const match of html.matchAll(matcher)) {
    const [fileName, timestampToken, sequence] = match;
    if (!timestampToken || seen.has(fileName.toUpperCase())) {
      continue;
    }
    const publishedAt = parseFileTimestamp(timestampToken);
    if (publishedAt === null) {
      continue;
    }
    seen.set(fileName.toUpperCase(), {fileName, publishedAt, sequence: sequence ?? ""});
  }
  return [...seen.values()];
}

function compareSequence(a: string, b: string): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function selectLatestReport(files: readonly ListedReport[]): ListedReport | null {
  let latest: ListedReport | null = null;
  for (const file of files) {
    if (
      !latest ||
      file.publishedAt > latest.publishedAt ||
      (file.publishedAt === latest.publishedAt && compareSequence(file.sequence, latest.sequence) > 0)
    ) {
      latest = file;
    }
  }
  return latest;
}
