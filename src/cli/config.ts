import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { z } from "zod";

// YAML reads unquoted digits as numbers.
const text = z.union([z.string(), z.number()]).transform(String);
const timestamp = text.pipe(
  z.string().regex(/^\d{14}$/, "expected YYYYMMDDHHMMSS"),
);
const minutes = z.number().int().positive();

const radikoLinkJob = z
  .object({
    service: z.literal("radiko"),
    link: z.string().url(),
    minutes: minutes.optional(),
  })
  .transform((job) => ({
    kind: "radiko-link" as const,
    link: job.link,
    minutes: job.minutes,
  }));

const radikoLiveJob = z
  .object({
    service: z.literal("radiko"),
    station: z.string().min(1),
    live: z.literal(true),
    minutes,
  })
  .transform((job) => ({
    kind: "radiko-live" as const,
    station: job.station,
    minutes: job.minutes,
  }));

const radikoTimefreeJob = z
  .object({
    service: z.literal("radiko"),
    station: z.string().min(1),
    ft: timestamp,
    to: timestamp,
  })
  .transform((job) => ({
    kind: "radiko-timefree" as const,
    station: job.station,
    ft: job.ft,
    to: job.to,
  }));

const nhkLiveJob = z
  .object({
    service: z.literal("nhk"),
    channel: z.enum(["NHK1", "NHK2", "FM"]),
    minutes,
  })
  .transform((job) => ({
    kind: "nhk-live" as const,
    channel: job.channel,
    minutes: job.minutes,
  }));

const nhkSeriesJob = z
  .object({
    service: z.literal("nhk"),
    series: text.pipe(z.string().min(1)),
    corner: text.pipe(z.string().min(1)),
  })
  .transform((job) => ({
    kind: "nhk-series" as const,
    series: job.series,
    corner: job.corner,
  }));

export const jobSchema = z.union([
  radikoLinkJob,
  radikoLiveJob,
  radikoTimefreeJob,
  nhkLiveJob,
  nhkSeriesJob,
]);

export type Job = z.infer<typeof jobSchema>;

export const configSchema = z.object({
  outputDir: z.string().min(1).default("recordings"),
  nhkArea: z.string().min(1).default("tokyo"),
  ffmpegPath: z.string().min(1).optional(),
  logLevel: z.string().min(1).default("warning"),
  timeoutMs: z.number().int().positive().optional(),
  retry: z
    .object({
      retries: z.number().int().min(0),
      delayMs: z.number().int().min(0).optional(),
    })
    .optional(),
  jobs: z.array(jobSchema).min(1, "at least one job is required"),
});

export type RecorderConfig = z.infer<typeof configSchema>;

export function parseConfig(source: string, filePath = "config"): RecorderConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(source);
  } catch (error) {
    throw new Error(`${filePath} is not valid YAML`, { cause: error });
  }
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid config ${filePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadConfig(filePath: string): Promise<RecorderConfig> {
  const source = await readFile(filePath, "utf-8");
  return parseConfig(source, filePath);
}

/** Short human label for log lines. */
export function describeJob(job: Job): string {
  switch (job.kind) {
    case "radiko-link":
      return job.link;
    case "radiko-live":
      return `radiko live ${job.station} ${job.minutes}min`;
    case "radiko-timefree":
      return `radiko ${job.station} ${job.ft}-${job.to}`;
    case "nhk-live":
      return `nhk live ${job.channel} ${job.minutes}min`;
    case "nhk-series":
      return `nhk series ${job.series}-${job.corner}`;
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
