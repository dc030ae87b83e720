import { toPipelineError } from "../errors.js";
import { pipelineLogger } from "../logger.js";
import { CPI_FILES, createFetcher } from "../scraper/client.js";
import { checkReferences } from "./consistency.js";
import {
  loadDimension,
  loadObservations,
  type DimensionSource,
  type ObservationSource,
} from "./loader.js";
import { rebuildView } from "./view.js";

import type { AppConfig } from "../config.js";
import type { Database } from "../db/schema.js";
import type {
  OrphanReport,
  RunSummary,
  StepName,
  StepOutcome,
  TextFetcher,
} from "../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface UpdateSources {
  dimensions: DimensionSource[];
  observations: ObservationSource;
}

export interface UpdateProgress {
  step: StepName;
  current: number;
  total: number;
}

export type ProgressCallback = (progress: UpdateProgress) => void;

/**
 * The fixed set of CPI-U files, resolved against the configured base URL.
 * Dimensions load in the order areas, periods, items.
 */
export function buildSources(baseUrl: string): UpdateSources {
  const url = (file: string): string => new URL(file, baseUrl).toString();

  return {
    dimensions: [
      { url: url(CPI_FILES.areas), table: "areas" },
      { url: url(CPI_FILES.periods), table: "periods" },
      { url: url(CPI_FILES.items), table: "items" },
    ],
    observations: { url: url(CPI_FILES.data), table: "data" },
  };
}

// ============================================================================
// Update Orchestrator
// ============================================================================

/**
 * Runs one update cycle: dimensions, then observations, then the view.
 *
 * Steps never throw. A failed step is recorded in the summary and the
 * next one still runs; nothing is rolled back across steps.
 */
export class UpdateOrchestrator {
  private onProgress?: ProgressCallback;

  constructor(
    private db: Kysely<Database>,
    private fetcher: TextFetcher,
    private sources: UpdateSources
  ) {}

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  async run(): Promise<RunSummary> {
    const startedAt = new Date();
    const steps: StepOutcome[] = [];
    const total = this.sources.dimensions.length + 2;

    pipelineLogger.info("Starting CPI-U update");

    for (const source of this.sources.dimensions) {
      this.report(source.table, steps.length + 1, total);
      steps.push(await loadDimension(this.db, source, this.fetcher));
    }

    this.report("data", steps.length + 1, total);
    steps.push(
      await loadObservations(this.db, this.sources.observations, this.fetcher)
    );

    this.report("view", steps.length + 1, total);
    const view = await rebuildView(this.db);
    steps.push(
      view.ok
        ? { step: "view", ok: true, rows: view.value }
        : { step: "view", ok: false, error: view.error }
    );

    const orphans = await this.checkOrphans();
    const failed = steps.filter((step) => !step.ok).length;
    const durationMs = Date.now() - startedAt.getTime();

    if (failed > 0) {
      pipelineLogger.warn(
        {
          failed,
          steps: steps
            .filter((step) => !step.ok)
            .map((step) => step.step),
          durationMs,
        },
        "CPI-U update finished with failures"
      );
    } else {
      pipelineLogger.info({ durationMs }, "CPI-U update finished");
    }

    return { startedAt, durationMs, steps, failed, orphans };
  }

  private async checkOrphans(): Promise<OrphanReport | null> {
    try {
      return await checkReferences(this.db);
    } catch (error) {
      const mapped = toPipelineError(error, "data");
      pipelineLogger.error(
        { error: mapped.message },
        "Reference check could not run"
      );
      return null;
    }
  }

  private report(step: StepName, current: number, total: number): void {
    this.onProgress?.({ step, current, total });
  }
}

/**
 * Run a full update against an open database.
 */
export async function runUpdate(
  db: Kysely<Database>,
  config: AppConfig,
  fetcher: TextFetcher = createFetcher({
    timeoutMs: config.fetchTimeoutMs,
    userAgent: config.userAgent,
  }),
  onProgress?: ProgressCallback
): Promise<RunSummary> {
  const orchestrator = new UpdateOrchestrator(
    db,
    fetcher,
    buildSources(config.sourceBaseUrl)
  );
  if (onProgress !== undefined) {
    orchestrator.setProgressCallback(onProgress);
  }
  return orchestrator.run();
}
