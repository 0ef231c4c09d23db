import { DEFAULT_HIGHLIGHT_PREFIX } from "./diff.js";
import { isKnown, sortedKeys } from "./snapshot.js";
import type { ChangeEvent, SeatCount, SectionRecord, Snapshot } from "./types.js";

export interface RenderOptions {
  starredCourses: ReadonlySet<string>;
  highlightPrefix: string;
}

export const defaultRenderOptions: RenderOptions = {
  starredCourses: new Set(),
  highlightPrefix: DEFAULT_HIGHLIGHT_PREFIX,
};

export type ChangeLookup = ReadonlyMap<string, readonly ChangeEvent[]>;

const TITLE_WIDTH = 45;
const OPENED_TAG = "🟢 OPENED";

function lookupKey(courseId: string, sectionId: string): string {
  return `${courseId}\u0000${sectionId}`;
}

export function buildChangeLookup(changes: readonly ChangeEvent[]): ChangeLookup {
  const lookup = new Map<string, ChangeEvent[]>();
  for (const change of changes) {
    const key = lookupKey(change.courseId, change.sectionId);
    const list = lookup.get(key);
    if (list) list.push(change);
    else lookup.set(key, [change]);
  }
  return lookup;
}

export function starPrefix(courseId: string, options: RenderOptions): string {
  return options.starredCourses.has(courseId) ? "⭐ " : "";
}

export function formatCount(count: SeatCount): string {
  return isKnown(count) ? String(count) : "?";
}

function formatDelta(oldValue: number, newValue: number): string {
  const delta = newValue - oldValue;
  return ` (${delta > 0 ? "+" : ""}${delta})`;
}

export function statusGlyph(open: SeatCount, total: SeatCount): string {
  if (isKnown(open) && isKnown(total)) {
    if (open === 0) return "🔴 ";
    if (open > 0 && open < total) return "⏳ ";
    return "";
  }
  return open === 0 ? "🔴 " : "";
}

function shortenTitle(courseId: string, title: string): string {
  const max = Math.max(0, TITLE_WIDTH - courseId.length);
  const chars = [...title];
  return chars.length > max ? `${chars.slice(0, max).join("")}...` : title;
}

function sectionDetail(
  sectionId: string,
  data: SectionRecord,
  changes: readonly ChangeEvent[],
  options: RenderOptions = defaultRenderOptions
): string {
  let openStr = `Open: ${formatCount(data.open)}`;
  let totalStr = `Total: ${formatCount(data.total)}`;
  let waitStr = `Waitlist: ${formatCount(data.waitlist)}`;
  let instrStr = `Instr: ${data.instructor}`;
  const tags: string[] = [];

  for (const change of changes) {
    switch (change.kind) {
      case "seats-opened":
        openStr = `**Open: ${change.newValue}**${formatDelta(change.oldValue, change.newValue)}`;
        tags.push(OPENED_TAG);
        break;
      case "open-change":
        openStr = `**Open: ${change.newValue}**${formatDelta(change.oldValue, change.newValue)}`;
        break;
      case "total-change":
        totalStr = `**Total: ${change.newValue}**${formatDelta(change.oldValue, change.newValue)}`;
        break;
      case "waitlist-change":
        waitStr = `**Waitlist: ${change.newValue}**${formatDelta(change.oldValue, change.newValue)}`;
        break;
      case "instructor-change":
        instrStr = `**Instr: ${change.newValue}** (was ${change.oldValue})`;
        break;
      case "new-section":
        tags.push("➕ NEW");
        break;
      case "new-course-section":
        tags.push("✨ NEW CRS");
        break;
      case "new-cmsc4-course":
        tags.push(`🚨 NEW ${options.highlightPrefix}`);
        break;
      case "section-removed":
        // rendered in its own block
        break;
    }
  }

  const glyph = tags.includes(OPENED_TAG) ? "🟢 " : statusGlyph(data.open, data.total);
  const tagStr = tags.length > 0 ? ` *(${tags.join(", ")})*` : "";

  return `${glyph}\`${sectionId}\`: ${openStr}, ${totalStr}, ${waitStr}, ${instrStr}${tagStr}`;
}

export function formatSectionLine(
  sectionId: string,
  data: SectionRecord,
  changes: readonly ChangeEvent[],
  options: RenderOptions = defaultRenderOptions
): string {
  return `  • ${sectionDetail(sectionId, data, changes, options)}`;
}

export function formatRemovedLine(change: ChangeEvent, options: RenderOptions = defaultRenderOptions): string {
  const s = change.section;
  return (
    `${starPrefix(change.courseId, options)}❌ REMOVED: \`${change.courseId}\` Sec \`${change.sectionId}\` ` +
    `(was Open: ${formatCount(s.open)}, Total: ${formatCount(s.total)}, ` +
    `Waitlist: ${formatCount(s.waitlist)}, Instr: ${s.instructor})`
  );
}

/** One line per change for the run log. */
export function formatChangeLogLine(change: ChangeEvent, options: RenderOptions = defaultRenderOptions): string {
  if (change.kind === "section-removed") return formatRemovedLine(change, options);
  const prefix = `${starPrefix(change.courseId, options)}${change.courseId}`;
  return `${prefix} ${sectionDetail(change.sectionId, change.section, [change], options)}`;
}

/**
 * Renders the whole snapshot, annotating sections touched by `changes`.
 * With no changes this is the initial-state message.
 */
export function renderStateMessage(
  changes: readonly ChangeEvent[],
  snapshot: Snapshot,
  options: RenderOptions = defaultRenderOptions
): string[] {
  const courseIds = sortedKeys(snapshot);
  if (courseIds.length === 0) return ["**State Message**: No courses found/parsed."];

  const hasChanges = changes.length > 0;
  const lookup = buildChangeLookup(changes);
  const lines = [
    hasChanges ? "**📊 Course Section Update:**" : `**📊 Initial State (${courseIds.length} courses monitored):**`,
  ];

  for (const courseId of courseIds) {
    const course = snapshot[courseId];
    lines.push("");
    lines.push(`${starPrefix(courseId, options)}**\`${courseId}\`** (${shortenTitle(courseId, course.title)}):`);

    if (course.fetchError) {
      lines.push("  • ⚠️ *(Fetch Error: Data may be stale)*");
      continue;
    }

    const sectionIds = sortedKeys(course.sections);
    if (sectionIds.length === 0) {
      lines.push("  • *(No sections found/parsed.)*");
      continue;
    }

    for (const sectionId of sectionIds) {
      const sectionChanges = lookup.get(lookupKey(courseId, sectionId)) ?? [];
      lines.push(formatSectionLine(sectionId, course.sections[sectionId], sectionChanges, options));
    }
  }

  const removed = changes.filter((c) => c.kind === "section-removed");
  if (hasChanges && removed.length > 0) {
    lines.push("", "**Removed Sections:**", "```");
    for (const change of removed) lines.push(formatRemovedLine(change, options));
    lines.push("```");
  }

  return lines;
}
