export type CourseId = string; // e.g. "CMSC436"
export type SectionId = string; // e.g. "0101"

/** Seat count as scraped; `null` when the page did not give a parseable number. */
export type SeatCount = number | null;

export interface SectionRecord {
  readonly open: SeatCount;
  readonly total: SeatCount;
  readonly waitlist: SeatCount;
  readonly instructor: string;
}

export interface CourseRecord {
  readonly title: string;
  readonly sections: Readonly<Record<SectionId, SectionRecord>>;
  readonly fetchError: boolean;
}

export type Snapshot = Readonly<Record<CourseId, CourseRecord>>;

export type StructuralChangeKind =
  | "new-cmsc4-course"
  | "new-course-section"
  | "new-section"
  | "section-removed";

export type SeatChangeKind = "seats-opened" | "open-change" | "total-change" | "waitlist-change";

export type SeatField = "open" | "total" | "waitlist";

interface ChangeEventBase {
  courseId: CourseId;
  title: string;
  sectionId: SectionId;
  /** Current section data; the last known data for a removed section. */
  section: SectionRecord;
}

export interface StructuralChange extends ChangeEventBase {
  kind: StructuralChangeKind;
}

export interface SeatChange extends ChangeEventBase {
  kind: SeatChangeKind;
  field: SeatField;
  oldValue: number;
  newValue: number;
}

export interface InstructorChange extends ChangeEventBase {
  kind: "instructor-change";
  field: "instructor";
  oldValue: string;
  newValue: string;
}

export type ChangeEvent = StructuralChange | SeatChange | InstructorChange;

export type NotificationKind = "update" | "initial" | "no-updates" | "error";

export interface SnapshotSource {
  fetchSnapshot(): Promise<Snapshot>;
}

export interface SnapshotStore {
  load(): Promise<Snapshot>;
  save(snapshot: Snapshot): Promise<void>;
}

export interface Notifier {
  notify(lines: readonly string[], kind: NotificationKind): Promise<boolean>;
}

export interface RunResult {
  statusCode: number;
  body: string;
}
