import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

loadDotenv();

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) =>
      v
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    );

const flag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.toLowerCase() === "true");

const intAtLeast = (min: number, fallback: number) =>
  z
    .string()
    .default(String(fallback))
    .transform((v) => {
      const n = parseInt(v, 10);
      return Number.isNaN(n) ? fallback : Math.max(min, n);
    });

const schema = z.object({
  SOC_BASE_URL: z.string().url().default("https://app.testudo.umd.edu/soc"),
  TERM_ID: z.string().regex(/^\d{6}$/, "expected a six digit term id").default("202601"),
  COURSE_PREFIXES: csv("cmsc3,cmsc4"),
  FULL_PREFIXES: csv("cmsc4"),
  SPECIFIC_COURSES: csv("CMSC320,CMSC335"),
  COURSES_TO_EXCLUDE: csv("CMSC498A,CMSC499A"),
  STARRED_COURSES: csv(
    "CMSC320,CMSC335,CMSC414,CMSC417,CMSC421,CMSC424,CMSC430,CMSC433,CMSC434,CMSC435,CMSC436"
  ).transform((ids): ReadonlySet<string> => new Set(ids)),
  HIGHLIGHT_PREFIX: z.string().min(1).default("CMSC4"),
  SECTION_FETCH_DELAY_MS: intAtLeast(0, 500),
  SCRAPE_CONCURRENCY: intAtLeast(1, 1),
  HTTP_TIMEOUT_MS: intAtLeast(1000, 25000),
  DISCORD_WEBHOOK_URL: z.string().url().optional(),
  DISCORD_USER_ID_TO_PING: z.string().regex(/^\d+$/, "expected a numeric user id").optional(),
  DISCORD_MAX_MESSAGE_LENGTH: intAtLeast(100, 1950),
  DISCORD_PART_DELAY_MS: intAtLeast(0, 1200),
  DISCORD_MAX_RETRIES: intAtLeast(0, 2),
  SEND_DISCORD_NOTIFICATION: flag("true"),
  SEND_NO_UPDATES_MESSAGE: flag("true"),
  STATE_FILE_PATH: z.string().default("./data/course_state.json"),
  FIRESTORE_COLLECTION: z.string().default("course_state"),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
  CRON_SCHEDULE: z.string().default("*/15 * * * *"),
  RUN_ONCE: flag("false"),
});

export type AppConfig = Readonly<z.infer<typeof schema>>;

/** Validates the environment; empty strings count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = schema.safeParse(present);
  if (!parsed.success) {
    // Show concise errors without secrets
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigError(`Invalid configuration: ${errs}`);
  }
  return Object.freeze(parsed.data);
}
