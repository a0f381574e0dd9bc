// pattern: Imperative Shell
import cron from "node-cron";
import { getScheduledSources } from "./config/select";
import { runSourceBuild } from "./pipeline/build";
import type { PipelineDeps } from "./pipeline/build";

export type BuildScheduler = {
  readonly sourceId: string;
  readonly schedule: string;
  readonly stop: () => void;
};

/**
 * The subset of `cron.schedule` the schedulers rely on.
 */
export type ScheduleFn = (
  expression: string,
  task: () => Promise<void>,
) => { stop: () => void };

/**
 * Starts one cron task per enabled scheduled source. A tick that fires while
 * the previous build of the same source is still running is skipped.
 *
 * @param deps - Pipeline dependencies shared by every build
 * @param schedule - Cron registration, `cron.schedule` unless overridden
 * @returns One scheduler per registered source, each with its own stop()
 */
export function createBuildSchedulers(
  deps: PipelineDeps,
  schedule: ScheduleFn = cron.schedule,
): ReadonlyArray<BuildScheduler> {
  const running = new Set<string>();
  const schedulers: Array<BuildScheduler> = [];

  for (const { id, source } of getScheduledSources(deps.config)) {
    if (!source.schedule) {
      deps.logger.warn({ sourceId: id }, "scheduled source has no cron expression");
      continue;
    }

    const task = schedule(source.schedule, async () => {
      if (running.has(id)) {
        deps.logger.warn({ sourceId: id }, "previous build still running, tick skipped");
        return;
      }
      running.add(id);
      deps.logger.info({ sourceId: id }, "scheduled build starting");
      try {
        const build = await runSourceBuild(deps, id);
        deps.logger.info(
          { sourceId: id, status: build.status },
          "scheduled build finished",
        );
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ sourceId: id, error: message }, "scheduled build failed unexpectedly");
      } finally {
        running.delete(id);
      }
    });

    deps.logger.info({ sourceId: id, schedule: source.schedule }, "build scheduler started");
    schedulers.push({
      sourceId: id,
      schedule: source.schedule,
      stop: () => {
        task.stop();
      },
    });
  }

  return schedulers;
}
