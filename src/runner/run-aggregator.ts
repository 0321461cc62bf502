import type { ModuleOutcome, RunSummary } from '../types.js';

export interface ModuleRunnerLike {
  run(moduleId: string): Promise<ModuleOutcome>;
}

export interface RunHooks {
  onModuleStart?: (moduleId: string, index: number, total: number) => void;
  onModuleComplete?: (
    outcome: ModuleOutcome,
    index: number,
    total: number,
  ) => void | Promise<void>;
}

export interface ExecuteOptions extends RunHooks {
  logDir: string;
  /** Upper bound on module processes alive at once. */
  maxConcurrent?: number;
}

/**
 * Run every module of the catalogue and aggregate the outcomes. A failing
 * module never stops the run; an error thrown by the runner does, and no
 * further modules are started after it.
 */
export async function executeCatalogue(
  catalogue: readonly string[],
  runner: ModuleRunnerLike,
  options: ExecuteOptions,
): Promise<RunSummary> {
  const startTime = Date.now();
  const total = catalogue.length;
  const outcomes: Array<ModuleOutcome | undefined> = new Array(total);
  const limit = Math.max(1, Math.min(options.maxConcurrent ?? 1, total));

  let passed = 0;
  let failed = 0;
  let next = 0;
  let aborted = false;

  const worker = async (): Promise<void> => {
    while (!aborted && next < total) {
      const index = next++;
      const moduleId = catalogue[index];

      options.onModuleStart?.(moduleId, index, total);

      let outcome: ModuleOutcome;
      try {
        outcome = await runner.run(moduleId);
      } catch (error) {
        aborted = true;
        throw error;
      }

      outcomes[index] = outcome;
      if (outcome.status === 'passed') {
        passed++;
      } else {
        failed++;
      }

      await options.onModuleComplete?.(outcome, index, total);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < limit && i < total; i++) {
    workers.push(worker());
  }

  const settled = await Promise.allSettled(workers);
  for (const result of settled) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
  }

  const ordered = outcomes.filter(
    (outcome): outcome is ModuleOutcome => outcome !== undefined,
  );

  return {
    total,
    passed,
    failed,
    failedModules: ordered
      .filter((outcome) => outcome.status === 'failed')
      .map((outcome) => outcome.moduleId),
    outcomes: ordered,
    durationMs: Date.now() - startTime,
    logDir: options.logDir,
  };
}
