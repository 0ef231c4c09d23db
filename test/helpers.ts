import fs from "node:fs";
import type { CourseRecord, SeatCount, SectionRecord } from "../src/types.js";

export function section(
  open: SeatCount,
  total: SeatCount,
  waitlist: SeatCount = 0,
  instructor = "Jane Doe"
): SectionRecord {
  return { open, total, waitlist, instructor };
}

export function course(
  title: string,
  sections: Record<string, SectionRecord>,
  fetchError = false
): CourseRecord {
  return { title, sections, fetchError };
}

export function fixture(name: string): string {
  return fs.readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8");
}
