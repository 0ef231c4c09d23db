import axios, { type AxiosInstance } from "axios";
import pLimit from "p-limit";
import type { AppConfig } from "./config.js";
import { FetchError, errorMessage } from "./errors.js";
import { moduleLogger } from "./logger.js";
import { parseCourseList, parseSections } from "./parser.js";
import type { CourseRecord, Snapshot, SnapshotSource } from "./types.js";
import { sleep } from "./utils.js";

const log = moduleLogger("scraper");

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

export type ScraperConfig = Pick<
  AppConfig,
  | "SOC_BASE_URL"
  | "TERM_ID"
  | "COURSE_PREFIXES"
  | "FULL_PREFIXES"
  | "SPECIFIC_COURSES"
  | "COURSES_TO_EXCLUDE"
  | "SECTION_FETCH_DELAY_MS"
  | "SCRAPE_CONCURRENCY"
  | "HTTP_TIMEOUT_MS"
>;

export function searchUrl(config: ScraperConfig, prefix: string): string {
  const params = new URLSearchParams({
    courseId: prefix,
    sectionId: "",
    termId: config.TERM_ID,
    creditCompare: "",
    credits: "",
    courseLevelFilter: "ALL",
    instructor: "",
    _facetoface: "on",
    _blended: "on",
    _online: "on",
    courseStartCompare: "",
    courseStartHour: "",
    courseStartMin: "",
    courseStartAM: "",
    courseEndHour: "",
    courseEndMin: "",
    courseEndAM: "",
    teachingCenter: "ALL",
    _classDay1: "on",
    _classDay2: "on",
    _classDay3: "on",
    _classDay4: "on",
    _classDay5: "on",
  });
  return `${config.SOC_BASE_URL}/search?${params.toString()}`;
}

export function sectionsUrl(config: ScraperConfig, courseId: string): string {
  return `${config.SOC_BASE_URL}/${config.TERM_ID}/sections?courseIds=${encodeURIComponent(courseId)}`;
}

export function isRelevantCourse(config: ScraperConfig, prefix: string, courseId: string): boolean {
  if (config.COURSES_TO_EXCLUDE.includes(courseId)) return false;
  return config.FULL_PREFIXES.includes(prefix) || config.SPECIFIC_COURSES.includes(courseId);
}

export class SocScraper implements SnapshotSource {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: ScraperConfig,
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        timeout: config.HTTP_TIMEOUT_MS,
        headers: { "User-Agent": USER_AGENT },
        responseType: "text",
      });
  }

  private async getHtml(url: string, headers?: Record<string, string>): Promise<string> {
    const { data } = await this.http.get<unknown>(url, { headers, responseType: "text" });
    if (typeof data !== "string") throw new Error(`Expected HTML from ${url}`);
    return data;
  }

  /** Relevant course ids and titles across all prefixes, first listing wins. */
  async listCourses(): Promise<Map<string, string>> {
    const courses = new Map<string, string>();
    for (const prefix of this.config.COURSE_PREFIXES) {
      const url = searchUrl(this.config, prefix);
      let html: string;
      try {
        log.info({ prefix, url }, "Fetching course list page");
        html = await this.getHtml(url);
      } catch (err) {
        log.error({ prefix, err: errorMessage(err) }, "Course list fetch failed");
        continue;
      }
      const listed = parseCourseList(html);
      log.info({ prefix, count: listed.length }, "Parsed course list");
      for (const { courseId, title } of listed) {
        if (courses.has(courseId) || !isRelevantCourse(this.config, prefix, courseId)) continue;
        courses.set(courseId, title);
      }
    }
    return courses;
  }

  async fetchCourse(courseId: string, title: string): Promise<CourseRecord> {
    let html: string;
    try {
      html = await this.getHtml(sectionsUrl(this.config, courseId), {
        Referer: `${this.config.SOC_BASE_URL}/search`,
        "X-Requested-With": "XMLHttpRequest",
      });
    } catch (err) {
      const failure = new FetchError(courseId, `Sections fetch failed: ${errorMessage(err)}`, { cause: err });
      log.error({ err: failure }, "Marking course as fetch error");
      return { title, sections: {}, fetchError: true };
    }

    const { sections, skipped } = parseSections(html);
    if (skipped > 0) log.warn({ courseId, skipped }, "Section blocks without a section id");
    if (Object.keys(sections).length === 0) log.warn({ courseId }, "No section blocks found");
    return { title, sections, fetchError: false };
  }

  async fetchSnapshot(): Promise<Snapshot> {
    const courses = await this.listCourses();
    if (courses.size === 0) return {};

    log.info({ count: courses.size, courses: [...courses.keys()] }, "Collected relevant courses");
    const limit = pLimit(this.config.SCRAPE_CONCURRENCY);
    const entries = await Promise.all(
      [...courses].map(([courseId, title]) =>
        limit(async () => {
          const record = await this.fetchCourse(courseId, title);
          await sleep(this.config.SECTION_FETCH_DELAY_MS);
          return [courseId, record] as const;
        })
      )
    );
    return Object.fromEntries(entries);
  }
}
