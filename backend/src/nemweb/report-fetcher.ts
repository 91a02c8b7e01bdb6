import { Logger } from "@nestjs/common";

import { FetchError } from "@nemcast/domain";
import type { ProductKind, RegionCode } from "@nemcast/domain";
import { extractReportFiles, selectLatestReport } from "./listing";
import type { NemwebClient } from "./nemweb-client";
import { REPORT_SOURCES } from "./report-sources";

export interface ReportBundle {
  product: ProductKind;
  fileName: string;
  publishedAt: number;
  url: string;
  bytes: Uint8Array;
}

export type FetchOutcome =
  | { status: "fetched"; bundle: ReportBundle }
  | { status: "unchanged"; fileName: string };

/**
 * Resolves and downloads the newest bundle per product. Change detection is
 * keyed on the file name, which only advances once the pipeline acknowledges a
 * committed series, so a bundle that failed to parse is fetched again.
 */
export class ReportFetcher {
  private readonly logger: Logger;
  private readonly acknowledged = new Map<ProductKind, string>();

  constructor(
    private readonly region: RegionCode,
    private readonly client: NemwebClient,
  ) {
    this.logger = new Logger(`${ReportFetcher.name}:${region}`);
  }

  async fetch(product: ProductKind, signal: AbortSignal): Promise<FetchOutcome> {
    const source = REPORT_SOURCES[product];
    const html = await this.client.getText(source.directory, signal);
    const latest = selectLatestReport(extractReportFiles(html, source.filePattern));
    if (!latest) {
      throw new FetchError("not_found", `No ${source.label} files listed under ${source.directory}`);
    }

    if (this.acknowledged.get(product) === latest.fileName) {
      this.logger.verbose(`${source.label} unchanged (${latest.fileName}); skipping download`);
      return {status: "unchanged", fileName: latest.fileName};
    }

    const path = `${source.directory}${latest.fileName}`;
    this.logger.log(`Downloading new ${source.label} file ${latest.fileName} for ${this.region}`);
    const bytes = await this.client.getBytes(path, signal);
    return {
      status: "fetched",
      bundle: {
        product,
        fileName: latest.fileName,
        publishedAt: latest.publishedAt,
        url: this.client.urlFor(path),
        bytes,
      },
    };
  }

  acknowledge(product: ProductKind, fileName: string): void {
    this.acknowledged.set(product, fileName);
  }

  lastAcknowledged(product: ProductKind): string | null {
    return this.acknowledged.get(product) ?? null;
  }
}
