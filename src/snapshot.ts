import { z } from "zod";
import { PersistError } from "./errors.js";
import type { CourseId, CourseRecord, SeatCount, SectionRecord, Snapshot } from "./types.js";

/** Instructor recorded when none was ever stored; never reported as a change. */
export const UNKNOWN_INSTRUCTOR = "Unknown";
export const TBA_INSTRUCTOR = "Instructor: TBA";
export const UNKNOWN_TITLE = "Unknown Title";

export function isKnown(count: SeatCount): count is number {
  return count !== null;
}

export function sortedKeys(record: Readonly<Record<string, unknown>>): string[] {
  return Object.keys(record).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function getCourse(snapshot: Snapshot, courseId: CourseId): CourseRecord | undefined {
  return Object.hasOwn(snapshot, courseId) ? snapshot[courseId] : undefined;
}

export function hasSection(course: CourseRecord, sectionId: string): boolean {
  return Object.hasOwn(course.sections, sectionId);
}

export function countSections(snapshot: Snapshot): number {
  return Object.values(snapshot).reduce((sum, course) => sum + Object.keys(course.sections).length, 0);
}

export function hasAnySections(snapshot: Snapshot): boolean {
  return Object.values(snapshot).some((course) => Object.keys(course.sections).length > 0);
}

const seatCountSchema = z.number().int().nullable().default(null);

const sectionSchema = z.object({
  open: seatCountSchema,
  total: seatCountSchema,
  waitlist: seatCountSchema,
  instructor: z.string().default(UNKNOWN_INSTRUCTOR),
});

export const courseSchema = z.object({
  title: z.string().default(UNKNOWN_TITLE),
  sections: z.record(sectionSchema).default({}),
  fetchError: z.boolean().default(false),
});

const snapshotSchema = z.record(courseSchema);

function describeIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`).join(", ");
}

export function parseCourseRecord(courseId: CourseId, value: unknown): CourseRecord {
  const parsed = courseSchema.safeParse(value);
  if (!parsed.success) {
    throw new PersistError(`Invalid stored course ${courseId}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Parses the persisted JSON document. Keys outside the schema are dropped. */
export function parseSnapshot(text: string): Snapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new PersistError("Stored snapshot is not valid JSON", { cause: err });
  }
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PersistError(`Invalid stored snapshot: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export type StoredSection = {
  open: SeatCount;
  total: SeatCount;
  waitlist: SeatCount;
  instructor: string;
};

export type StoredCourse = {
  title: string;
  sections: Record<string, StoredSection>;
  fetchError?: true;
};

/** Plain object form of a course with stable key order; `fetchError` only when set. */
export function toStoredCourse(course: CourseRecord): StoredCourse {
  const sections: Record<string, StoredSection> = {};
  for (const sectionId of sortedKeys(course.sections)) {
    const s: SectionRecord = course.sections[sectionId];
    sections[sectionId] = { open: s.open, total: s.total, waitlist: s.waitlist, instructor: s.instructor };
  }
  const stored: StoredCourse = { title: course.title, sections };
  if (course.fetchError) stored.fetchError = true;
  return stored;
}

export function serializeSnapshot(snapshot: Snapshot): string {
  const out: Record<string, StoredCourse> = {};
  for (const courseId of sortedKeys(snapshot)) {
    out[courseId] = toStoredCourse(snapshot[courseId]);
  }
  return `${JSON.stringify(out, null, 2)}\n`;
}

export interface MergeResult {
  snapshot: Snapshot;
  /** Course ids whose data in `snapshot` was not refreshed by this run. */
  staleCourses: string[];
}

/**
 * Applies the fallback policy between a fresh fetch and the prior run: errored
 * courses reuse their previous record, and courses the fetch no longer lists
 * are retained as they were.
 */
export function mergeWithPrevious(previous: Snapshot, fetched: Snapshot): MergeResult {
  const merged: Record<CourseId, CourseRecord> = {};
  const errored: string[] = [];
  const missing: string[] = [];

  for (const courseId of sortedKeys(fetched)) {
    const course = fetched[courseId];
    if (!course.fetchError) {
      merged[courseId] = course;
      continue;
    }
    errored.push(courseId);
    merged[courseId] = getCourse(previous, courseId) ?? course;
  }

  for (const courseId of sortedKeys(previous)) {
    if (getCourse(fetched, courseId)) continue;
    merged[courseId] = previous[courseId];
    missing.push(`${courseId} (missing from fetch)`);
  }

  return { snapshot: merged, staleCourses: [...errored, ...missing] };
}
