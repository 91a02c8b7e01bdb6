import { constants as fsConstants } from "node:fs";
import { access, readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Injectable, Logger } from "@nestjs/common";
import YAML from "yaml";

import { describeError } from "@nemcast/domain";
import type { ConfigDocument } from "./schemas";
import { parseConfigDocument } from "./schemas";

const DEFAULT_CONFIG_FILE = "../config.local.yaml";

@Injectable()
export class ConfigFileService {
  private readonly logger = new Logger(ConfigFileService.name);

  resolvePath(): string {
    const override = process.env.NEMCAST_CONFIG;
    if (override && override.trim().length > 0) {
      return resolve(process.cwd(), override.trim());
    }
    return resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  }

  async loadDocument(path: string): Promise<ConfigDocument> {
    try {
      await access(path, fsConstants.R_OK);
    } catch (error) {
      throw new Error(`Config file not accessible at ${path}: ${describeError(error)}`);
    }

    const rawContent = await readFile(path, "utf-8");
    this.logger.verbose(`Read ${rawContent.length} bytes of configuration from ${path}`);
    return this.parseDocument(rawContent);
  }

  parseDocument(rawContent: string): ConfigDocument {
    const parsed: unknown = YAML.parse(rawContent);
    if (!parsed || typeof parsed !== "object") {
      throw new Error("Config file is empty or invalid");
    }
    return parseConfigDocument(parsed);
  }
}
