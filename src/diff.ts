import { UNKNOWN_INSTRUCTOR, getCourse, hasSection, isKnown, sortedKeys } from "./snapshot.js";
import type {
  ChangeEvent,
  CourseId,
  CourseRecord,
  SeatChangeKind,
  SeatField,
  SectionId,
  SectionRecord,
  Snapshot,
} from "./types.js";

export interface DiffOptions {
  /** Literal course id prefix whose first appearance gets its own event kind. */
  highlightPrefix: string;
}

export const DEFAULT_HIGHLIGHT_PREFIX = "CMSC4";

function compareSections(
  courseId: CourseId,
  title: string,
  sectionId: SectionId,
  prev: SectionRecord,
  curr: SectionRecord,
  changes: ChangeEvent[]
): void {
  const base = { courseId, title, sectionId, section: curr };

  const seat = (kind: SeatChangeKind, field: SeatField, oldValue: number, newValue: number) =>
    changes.push({ ...base, kind, field, oldValue, newValue });

  if (prev.open === 0 && isKnown(curr.open) && curr.open > 0) {
    seat("seats-opened", "open", prev.open, curr.open);
  } else if (isKnown(prev.open) && isKnown(curr.open) && prev.open !== curr.open) {
    seat("open-change", "open", prev.open, curr.open);
  }

  if (isKnown(prev.total) && isKnown(curr.total) && prev.total !== curr.total) {
    seat("total-change", "total", prev.total, curr.total);
  }

  if (isKnown(prev.waitlist) && isKnown(curr.waitlist) && prev.waitlist !== curr.waitlist) {
    seat("waitlist-change", "waitlist", prev.waitlist, curr.waitlist);
  }

  if (prev.instructor !== curr.instructor && prev.instructor !== UNKNOWN_INSTRUCTOR) {
    changes.push({
      ...base,
      kind: "instructor-change",
      field: "instructor",
      oldValue: prev.instructor,
      newValue: curr.instructor,
    });
  }
}

function diffCourse(courseId: CourseId, prev: CourseRecord, curr: CourseRecord, changes: ChangeEvent[]): void {
  for (const sectionId of sortedKeys(curr.sections)) {
    const section = curr.sections[sectionId];
    if (!hasSection(prev, sectionId)) {
      changes.push({ kind: "new-section", courseId, title: curr.title, sectionId, section });
      continue;
    }
    compareSections(courseId, curr.title, sectionId, prev.sections[sectionId], section, changes);
  }
}

/**
 * Lists the changes between two merged snapshots. Additions and field changes
 * come first in course id order, followed by every removed section.
 */
export function diffSnapshots(
  prev: Snapshot,
  curr: Snapshot,
  options: DiffOptions = { highlightPrefix: DEFAULT_HIGHLIGHT_PREFIX }
): ChangeEvent[] {
  const changes: ChangeEvent[] = [];

  for (const courseId of sortedKeys(curr)) {
    const course = curr[courseId];
    if (course.fetchError) continue;

    const prevCourse = getCourse(prev, courseId);
    if (!prevCourse) {
      const kind = courseId.startsWith(options.highlightPrefix) ? "new-cmsc4-course" : "new-course-section";
      for (const sectionId of sortedKeys(course.sections)) {
        changes.push({ kind, courseId, title: course.title, sectionId, section: course.sections[sectionId] });
      }
      continue;
    }

    diffCourse(courseId, prevCourse, course, changes);
  }

  // Removed sections
  for (const courseId of sortedKeys(prev)) {
    const course = getCourse(curr, courseId);
    if (!course || course.fetchError) continue;
    const prevCourse = prev[courseId];
    for (const sectionId of sortedKeys(prevCourse.sections)) {
      if (hasSection(course, sectionId)) continue;
      changes.push({
        kind: "section-removed",
        courseId,
        title: prevCourse.title,
        sectionId,
        section: prevCourse.sections[sectionId],
      });
    }
  }

  return changes;
}
