import { JSDOM } from "jsdom";
import { TBA_INSTRUCTOR, UNKNOWN_TITLE } from "./snapshot.js";
import type { SectionRecord } from "./types.js";
import { normalizeText, parseSeatCount } from "./utils.js";

export interface ListedCourse {
  courseId: string;
  title: string;
}

export interface ParsedSections {
  sections: Record<string, SectionRecord>;
  /** Section blocks that carried no section id. */
  skipped: number;
}

function parseDocument(html: string): Document {
  return new JSDOM(html).window.document;
}

/** Course blocks of a search results page, in page order. */
export function parseCourseList(html: string): ListedCourse[] {
  const doc = parseDocument(html);
  const courses: ListedCourse[] = [];

  doc.querySelectorAll("div.course").forEach((el) => {
    const input = el.querySelector<HTMLInputElement>('input[name="courseId"]');
    const courseId = normalizeText(input?.value) || normalizeText(el.getAttribute("id"));
    if (!courseId) return;
    const title = normalizeText(el.querySelector("span.course-title")?.textContent) || UNKNOWN_TITLE;
    courses.push({ courseId, title });
  });

  return courses;
}

function instructorOf(section: Element): string {
  const span = section.querySelector("span.section-instructor");
  if (!span) return TBA_INSTRUCTOR;
  const link = span.querySelector("a");
  const raw = normalizeText((link ?? span).textContent);
  if (!raw || raw.includes(TBA_INSTRUCTOR)) return TBA_INSTRUCTOR;
  return raw;
}

function countOf(section: Element, selector: string): number | null {
  const span = section.querySelector(selector);
  return parseSeatCount(span ? span.textContent : null);
}

/** Sections of a course's sections snippet keyed by section id. */
export function parseSections(html: string): ParsedSections {
  const doc = parseDocument(html);
  const container = doc.querySelector("div.sections-container");
  const blocks = (container ?? doc).querySelectorAll("div.section");

  const sections: Record<string, SectionRecord> = {};
  let skipped = 0;

  blocks.forEach((block) => {
    const sectionId = normalizeText(block.querySelector("span.section-id")?.textContent);
    if (!sectionId) {
      skipped++;
      return;
    }
    sections[sectionId] = {
      open: countOf(block, "span.open-seats-count"),
      total: countOf(block, "span.total-seats-count"),
      waitlist: countOf(block, "span.waitlist-count"),
      instructor: instructorOf(block),
    };
  });

  return { sections, skipped };
}
