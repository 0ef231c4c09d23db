import cron from "node-cron";
import { loadConfig } from "./config.js";
import { DiscordNotifier } from "./discord.js";
import { moduleLogger } from "./logger.js";
import { runMonitorOnce, type MonitorDeps } from "./monitor.js";
import { SocScraper } from "./scraper.js";
import { createSnapshotStore } from "./store.js";
import { exclusive } from "./utils.js";

const log = moduleLogger("bot");

async function main(): Promise<void> {
  const config = loadConfig();

  if (!config.DISCORD_WEBHOOK_URL && config.SEND_DISCORD_NOTIFICATION) {
    log.error("DISCORD_WEBHOOK_URL not set; notifications will be skipped");
  }
  if (config.SEND_DISCORD_NOTIFICATION && !config.DISCORD_USER_ID_TO_PING) {
    log.warn("DISCORD_USER_ID_TO_PING not set. Update notifications will not ping.");
  }

  const deps: MonitorDeps = {
    config,
    source: new SocScraper(config),
    store: createSnapshotStore(config),
    notifier: new DiscordNotifier(config),
  };

  const run = exclusive(
    () => runMonitorOnce(deps),
    () => log.warn("Previous run still in progress; skipping this tick")
  );

  if (config.RUN_ONCE) {
    const res = await run();
    log.info({ statusCode: res?.statusCode, body: res?.body }, "Single run finished");
    process.exitCode = res && res.statusCode === 200 ? 0 : 1;
    return;
  }

  log.info({ schedule: config.CRON_SCHEDULE }, "Seat monitor starting");

  // Run immediately at startup
  try {
    const res = await run();
    log.info({ statusCode: res?.statusCode }, "Initial run completed");
  } catch (err) {
    log.error({ err }, "Initial run error");
  }

  cron.schedule(config.CRON_SCHEDULE, async () => {
    log.info("Scheduled run started");
    try {
      const res = await run();
      if (res) log.info({ statusCode: res.statusCode, body: res.body }, "Scheduled run completed");
    } catch (err) {
      log.error({ err }, "Scheduled run error");
    }
  });
}

main().catch((err) => {
  log.fatal({ err }, "Fatal");
  process.exit(1);
});
