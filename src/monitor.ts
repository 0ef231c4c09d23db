import type { AppConfig } from "./config.js";
import { diffSnapshots } from "./diff.js";
import { ParsingFailure, PersistError } from "./errors.js";
import { moduleLogger } from "./logger.js";
import { formatChangeLogLine, renderStateMessage, type RenderOptions } from "./render.js";
import { countSections, hasAnySections, mergeWithPrevious } from "./snapshot.js";
import type { NotificationKind, Notifier, RunResult, Snapshot, SnapshotSource, SnapshotStore } from "./types.js";
import { formatUtcTime } from "./utils.js";

const log = moduleLogger("monitor");

export type MonitorConfig = Pick<
  AppConfig,
  "SEND_DISCORD_NOTIFICATION" | "SEND_NO_UPDATES_MESSAGE" | "STARRED_COURSES" | "HIGHLIGHT_PREFIX"
>;

export interface MonitorDeps {
  config: MonitorConfig;
  source: SnapshotSource;
  store: SnapshotStore;
  notifier: Notifier;
  now?: () => Date;
}

function result(statusCode: number, body: string): RunResult {
  return { statusCode, body };
}

/** Runs one fetch, diff, notify and persist pass. Callers must not overlap runs. */
export async function runMonitorOnce(deps: MonitorDeps): Promise<RunResult> {
  const { config, source, store, notifier } = deps;
  const now = deps.now ?? (() => new Date());
  const started = now();
  const renderOptions: RenderOptions = {
    starredCourses: config.STARRED_COURSES,
    highlightPrefix: config.HIGHLIGHT_PREFIX,
  };

  const send = async (lines: string[], kind: NotificationKind): Promise<void> => {
    if (!config.SEND_DISCORD_NOTIFICATION) return;
    const sent = await notifier.notify(lines, kind);
    if (!sent) log.warn({ kind }, "Notification not delivered");
  };

  const persist = async (snapshot: Snapshot): Promise<boolean> => {
    try {
      await store.save(snapshot);
      return true;
    } catch (err) {
      if (!(err instanceof PersistError)) throw err;
      log.error({ err }, "State save failed");
      return false;
    }
  };

  log.info("Run started");
  const previous = await store.load();
  const fetched = await source.fetchSnapshot();
  const { snapshot: current, staleCourses } = mergeWithPrevious(previous, fetched);
  const isFirstRun = Object.keys(previous).length === 0;

  log.info(
    { courses: Object.keys(current).length, sections: countSections(current), stale: staleCourses },
    "Final state summary"
  );

  const listedCourses = Object.keys(fetched).length;
  if (listedCourses > 0 && !hasAnySections(current)) {
    const failure = new ParsingFailure(`No sections parsed for any of ${listedCourses} listed courses`);
    if (!isFirstRun) {
      log.warn({ err: failure }, "Parsing failed; skipping update");
      await send(["Error Alert ⚠️: Failed parsing sections. Check logs."], "error");
      return result(200, "Parsing failed, skipped update.");
    }
    log.error({ err: failure }, "Parsing failed on first run");
    await send(["Error Alert ⚠️: Failed parsing sections on initial run."], "error");
    return result(500, "Failed parsing on initial run.");
  }

  const stale = staleCourses.join(", ");
  let saved = true;

  if (isFirstRun) {
    log.info("First run; initializing state");
    await send(renderStateMessage([], current, renderOptions), "initial");
    if (staleCourses.length > 0) await send([`⚠️ Initial fetch failed/stale for: ${stale}.`], "error");
    saved = await persist(current);
  } else {
    const changes = diffSnapshots(previous, current, { highlightPrefix: config.HIGHLIGHT_PREFIX });
    if (changes.length > 0) {
      log.info({ count: changes.length }, "Changes detected");
      for (const change of changes) log.info({ kind: change.kind }, formatChangeLogLine(change, renderOptions));
      await send(renderStateMessage(changes, current, renderOptions), "update");
      if (staleCourses.length > 0) {
        await send([`⚠️ Some course data may be stale due to fetch errors: ${stale}.`], "error");
      }
      saved = await persist(current);
    } else {
      log.info("No significant changes detected");
      if (config.SEND_NO_UPDATES_MESSAGE) {
        await send([`✅ No course section updates found at ${formatUtcTime(now())} UTC.`], "no-updates");
      }
      if (staleCourses.length > 0) {
        await send([`⚠️ No changes, but fetch failed/stale for: ${stale}.`], "error");
        saved = await persist(current);
      }
    }
  }

  const duration = ((now().getTime() - started.getTime()) / 1000).toFixed(2);
  log.info({ duration, saved }, "Run finished");
  return result(saved ? 200 : 500, `Scraper run complete. Duration: ${duration}s`);
}
