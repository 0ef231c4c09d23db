import type { DocumentReference } from "firebase-admin/firestore";
import fs from "node:fs/promises";
import path from "node:path";
import type { AppConfig } from "./config.js";
import { PersistError, errorMessage } from "./errors.js";
import { initializeFirestore } from "./firebase.js";
import { moduleLogger } from "./logger.js";
import {
  parseCourseRecord,
  parseSnapshot,
  serializeSnapshot,
  sortedKeys,
  toStoredCourse,
  type StoredCourse,
} from "./snapshot.js";
import type { CourseRecord, Snapshot, SnapshotStore } from "./types.js";

const log = moduleLogger("store");

// Firestore rejects batches above this many writes.
const MAX_BATCH_WRITES = 500;

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileSnapshotStore implements SnapshotStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<Snapshot> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        log.info({ path: this.filePath }, "No stored state yet");
        return {};
      }
      throw new PersistError(`Could not read ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
    const snapshot = parseSnapshot(raw);
    log.info({ path: this.filePath, courses: Object.keys(snapshot).length }, "State loaded");
    return snapshot;
  }

  async save(snapshot: Snapshot): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      // rename replaces the target in one step; an interrupted write only leaves the temp file
      const tmpPath = `${this.filePath}.tmp`;
      await fs.writeFile(tmpPath, serializeSnapshot(snapshot), "utf8");
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      throw new PersistError(`Could not write ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
    log.info({ path: this.filePath }, "State saved");
  }
}

export interface CourseDocs {
  docs: readonly { id: string; data(): unknown }[];
  size: number;
}

/** The part of the Firestore client the store uses; `Ref` is its document reference type. */
export interface CourseDatabase<Ref> {
  collection(path: string): {
    doc(id: string): Ref;
    get(): Promise<CourseDocs>;
  };
  batch(): {
    set(ref: Ref, data: StoredCourse): unknown;
    commit(): Promise<unknown>;
  };
}

/** One document per course, keyed by course id. */
export class FirestoreSnapshotStore<Ref> implements SnapshotStore {
  constructor(
    private readonly firestore: CourseDatabase<Ref>,
    readonly collectionName: string
  ) {}

  private collection() {
    return this.firestore.collection(this.collectionName);
  }

  async load(): Promise<Snapshot> {
    let result: CourseDocs;
    try {
      result = await this.collection().get();
    } catch (err) {
      throw new PersistError(`Could not read collection ${this.collectionName}: ${errorMessage(err)}`, { cause: err });
    }
    const snapshot: Record<string, CourseRecord> = {};
    for (const doc of result.docs) {
      snapshot[doc.id] = parseCourseRecord(doc.id, doc.data());
    }
    log.info({ collection: this.collectionName, courses: result.size }, "State loaded");
    return snapshot;
  }

  async save(snapshot: Snapshot): Promise<void> {
    const ids = sortedKeys(snapshot);
    try {
      for (let i = 0; i < ids.length; i += MAX_BATCH_WRITES) {
        const batch = this.firestore.batch();
        for (const courseId of ids.slice(i, i + MAX_BATCH_WRITES)) {
          batch.set(this.collection().doc(courseId), toStoredCourse(snapshot[courseId]));
        }
        await batch.commit();
      }
    } catch (err) {
      throw new PersistError(`Could not write collection ${this.collectionName}: ${errorMessage(err)}`, { cause: err });
    }
    log.info({ collection: this.collectionName, courses: ids.length }, "State saved");
  }
}

export function createSnapshotStore(
  config: Pick<
    AppConfig,
    "STATE_FILE_PATH" | "FIRESTORE_COLLECTION" | "FIREBASE_SERVICE_ACCOUNT_JSON" | "GOOGLE_APPLICATION_CREDENTIALS"
  >
): SnapshotStore {
  const firestore = initializeFirestore(config);
  if (firestore) {
    log.info({ collection: config.FIRESTORE_COLLECTION }, "Using Firestore for state");
    return new FirestoreSnapshotStore<DocumentReference>(firestore, config.FIRESTORE_COLLECTION);
  }
  log.warn({ path: config.STATE_FILE_PATH }, "No Firebase credentials; using local state file");
  return new FileSnapshotStore(path.resolve(config.STATE_FILE_PATH));
}
