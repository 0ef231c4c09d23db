import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";
import { PersistError } from "../src/errors.js";
import { runMonitorOnce, type MonitorConfig } from "../src/monitor.js";
import { renderStateMessage } from "../src/render.js";
import type { NotificationKind, Notifier, Snapshot, SnapshotSource, SnapshotStore } from "../src/types.js";
import { course, section } from "./helpers.js";

const config = loadConfig({ STARRED_COURSES: "CMSC436" });
const renderOptions = { starredCourses: config.STARRED_COURSES, highlightPrefix: "CMSC4" };
const now = () => new Date("2026-10-19T12:34:56Z");
const DONE = "Scraper run complete. Duration: 0.00s";

class MemoryStore implements SnapshotStore {
  saves: Snapshot[] = [];
  constructor(
    private state: Snapshot = {},
    private readonly failSave = false
  ) {}

  async load(): Promise<Snapshot> {
    return this.state;
  }

  async save(snapshot: Snapshot): Promise<void> {
    if (this.failSave) throw new PersistError("disk full");
    this.saves.push(snapshot);
    this.state = snapshot;
  }
}

class FixedSource implements SnapshotSource {
  constructor(private readonly snapshot: Snapshot) {}

  async fetchSnapshot(): Promise<Snapshot> {
    return this.snapshot;
  }
}

class RecordingNotifier implements Notifier {
  messages: { kind: NotificationKind; lines: readonly string[] }[] = [];

  async notify(lines: readonly string[], kind: NotificationKind): Promise<boolean> {
    this.messages.push({ kind, lines });
    return true;
  }
}

function setup(previous: Snapshot, fetched: Snapshot, options: { config?: MonitorConfig; failSave?: boolean } = {}) {
  const store = new MemoryStore(previous, options.failSave);
  const notifier = new RecordingNotifier();
  const run = () =>
    runMonitorOnce({
      config: options.config ?? config,
      source: new FixedSource(fetched),
      store,
      notifier,
      now,
    });
  return { store, notifier, run };
}

const handheld = (open: number) =>
  course("Programming Handheld Systems", { "0101": section(open, 5, 0, "Alice Smith") });

describe("runMonitorOnce", () => {
  it("announces and saves the initial state", async () => {
    const fetched: Snapshot = { CMSC436: handheld(0) };
    const { store, notifier, run } = setup({}, fetched);

    await expect(run()).resolves.toEqual({ statusCode: 200, body: DONE });
    expect(notifier.messages).toEqual([{ kind: "initial", lines: renderStateMessage([], fetched, renderOptions) }]);
    expect(store.saves).toEqual([fetched]);
  });

  it("warns once about stale courses on the first run", async () => {
    const fetched: Snapshot = { CMSC436: handheld(0), CMSC451: course("Algorithms", {}, true) };
    const { notifier, run } = setup({}, fetched);

    await run();
    expect(notifier.messages.map((m) => m.kind)).toEqual(["initial", "error"]);
    expect(notifier.messages[1].lines).toEqual(["⚠️ Initial fetch failed/stale for: CMSC451."]);
  });

  it("sends an update when seats open", async () => {
    const { store, notifier, run } = setup({ CMSC436: handheld(0) }, { CMSC436: handheld(3) });

    await expect(run()).resolves.toEqual({ statusCode: 200, body: DONE });
    expect(notifier.messages).toHaveLength(1);
    expect(notifier.messages[0].kind).toBe("update");
    expect(notifier.messages[0].lines).toEqual([
      "**📊 Course Section Update:**",
      "",
      "⭐ **`CMSC436`** (Programming Handheld Systems):",
      "  • 🟢 `0101`: **Open: 3** (+3), Total: 5, Waitlist: 0, Instr: Alice Smith *(🟢 OPENED)*",
    ]);
    expect(store.saves).toEqual([{ CMSC436: handheld(3) }]);
  });

  it("reports no updates without saving", async () => {
    const { store, notifier, run } = setup({ CMSC436: handheld(2) }, { CMSC436: handheld(2) });

    await run();
    expect(notifier.messages).toEqual([
      { kind: "no-updates", lines: ["✅ No course section updates found at 12:34:56 UTC."] },
    ]);
    expect(store.saves).toEqual([]);
  });

  it("keeps prior data for errored courses and saves the merge", async () => {
    const previous: Snapshot = { CMSC436: handheld(2), CMSC320: course("Data Science", { "0101": section(1, 5) }) };
    const fetched: Snapshot = { CMSC436: course("Programming Handheld Systems", {}, true) };
    const { store, notifier, run } = setup(previous, fetched);

    await run();
    expect(notifier.messages.map((m) => m.lines)).toEqual([
      ["✅ No course section updates found at 12:34:56 UTC."],
      ["⚠️ No changes, but fetch failed/stale for: CMSC436, CMSC320 (missing from fetch)."],
    ]);
    expect(store.saves).toEqual([{ CMSC436: handheld(2), CMSC320: previous.CMSC320 }]);
  });

  it("sends the stale warning after an update", async () => {
    const previous: Snapshot = { CMSC436: handheld(0), CMSC451: course("Algorithms", { "0101": section(1, 5) }) };
    const fetched: Snapshot = { CMSC436: handheld(1), CMSC451: course("Algorithms", {}, true) };
    const { notifier, run } = setup(previous, fetched);

    await run();
    expect(notifier.messages.map((m) => m.kind)).toEqual(["update", "error"]);
    expect(notifier.messages[1].lines).toEqual(["⚠️ Some course data may be stale due to fetch errors: CMSC451."]);
  });

  it("skips the update when no sections parse on a later run", async () => {
    const { store, notifier, run } = setup({ CMSC436: handheld(2) }, { CMSC436: course("Programming Handheld Systems", {}) });

    await expect(run()).resolves.toEqual({ statusCode: 200, body: "Parsing failed, skipped update." });
    expect(notifier.messages).toEqual([
      { kind: "error", lines: ["Error Alert ⚠️: Failed parsing sections. Check logs."] },
    ]);
    expect(store.saves).toEqual([]);
  });

  it("fails the first run when no sections parse", async () => {
    const { store, notifier, run } = setup({}, { CMSC436: course("Programming Handheld Systems", {}) });

    await expect(run()).resolves.toEqual({ statusCode: 500, body: "Failed parsing on initial run." });
    expect(notifier.messages[0].lines).toEqual(["Error Alert ⚠️: Failed parsing sections on initial run."]);
    expect(store.saves).toEqual([]);
  });

  it("completes with a 500 when saving fails", async () => {
    const { notifier, run } = setup({ CMSC436: handheld(0) }, { CMSC436: handheld(4) }, { failSave: true });

    await expect(run()).resolves.toEqual({ statusCode: 500, body: DONE });
    expect(notifier.messages.map((m) => m.kind)).toEqual(["update"]);
  });

  it("retains every course when the fetch lists nothing", async () => {
    const { store, notifier, run } = setup({ CMSC436: handheld(2) }, {});

    await expect(run()).resolves.toEqual({ statusCode: 200, body: DONE });
    expect(notifier.messages[1].lines).toEqual([
      "⚠️ No changes, but fetch failed/stale for: CMSC436 (missing from fetch).",
    ]);
    expect(store.saves).toEqual([{ CMSC436: handheld(2) }]);
  });

  it("honours the notification switches", async () => {
    const quiet = { ...config, SEND_NO_UPDATES_MESSAGE: false };
    const first = setup({ CMSC436: handheld(2) }, { CMSC436: handheld(2) }, { config: quiet });
    await first.run();
    expect(first.notifier.messages).toEqual([]);

    const muted = { ...config, SEND_DISCORD_NOTIFICATION: false };
    const second = setup({ CMSC436: handheld(0) }, { CMSC436: handheld(5) }, { config: muted });
    await second.run();
    expect(second.notifier.messages).toEqual([]);
    expect(second.store.saves).toHaveLength(1);
  });
});
