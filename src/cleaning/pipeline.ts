import { basename, extname } from "node:path";
import type { CleaningConfig } from "../config/types.js";
import type { TextGenerator } from "../inference/types.js";
import type { Logger } from "../logging/logger.js";
import { profile } from "../profiler/profiler.js";
import type { TableProfile } from "../profiler/types.js";
import { writeCsv } from "../table/csv.js";
import { readTable } from "../table/read.js";
import { ADVISORY_FALLBACK, composeAdvisory } from "./advisory.js";
import { clean } from "./engine.js";
import { formatCleaningReport } from "./report.js";
import { applyCleaningRules, type CleaningRule } from "./rules.js";
import type { CleaningResult } from "./types.js";

export interface DatasetInput {
  readonly filename: string;
  readonly data: Uint8Array;
  /** Applied before the automatic cleaning pass. */
  readonly rules?: readonly CleaningRule[];
}

export interface DatasetOutput {
  /** `cleaned_<name>.csv` */
  readonly filename: string;
  readonly csv: Buffer;
  readonly report: string;
  readonly profile: TableProfile;
  readonly result: CleaningResult;
}

export interface DatasetPipelineDeps {
  config: CleaningConfig;
  logger: Logger;
  /** Without a generator the advisory is always the fallback text. */
  generator?: TextGenerator;
  maxBytes?: number;
}

export function cleanedFilename(filename: string): string {
  const name = basename(filename, extname(filename)) || "data";
  return `cleaned_${name}.csv`;
}

/** Read, profile, advise, clean and serialise one uploaded dataset. */
export class DatasetPipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: DatasetPipelineDeps) {
    this.logger = deps.logger.child({ component: "pipeline" });
  }

  async process(input: DatasetInput): Promise<DatasetOutput> {
    const log = this.logger.child({ filename: input.filename });
    const { config } = this.deps;

    let table = readTable(input.data, input.filename, { maxBytes: this.deps.maxBytes });
    if (input.rules && input.rules.length > 0) {
      const outcome = applyCleaningRules(table, input.rules, { logger: log });
      log.info(
        { applied: outcome.applied.length, skipped: outcome.skipped.length },
        "Applied cleaning rules",
      );
      table = outcome.table;
    }

    const summary = profile(table, { maxRows: config.maxRows, maxColumns: config.maxColumns });
    log.info(
      { rows: summary.rowCount, columns: summary.columnCount, duplicates: summary.duplicateRowCount },
      "Profiled dataset",
    );

    const advisory = this.deps.generator
      ? await composeAdvisory(table, this.deps.generator, {
          model: config.model,
          sampleRows: config.sampleRows,
          logger: log,
        })
      : ADVISORY_FALLBACK;

    const result = clean(table, { logger: log });
    const csv = Buffer.from(writeCsv(result.table), "utf8");
    log.info({ before: result.before, after: result.after, steps: result.steps.length }, "Cleaned dataset");

    return {
      filename: cleanedFilename(input.filename),
      csv,
      report: formatCleaningReport(advisory, result),
      profile: summary,
      result,
    };
  }
}
