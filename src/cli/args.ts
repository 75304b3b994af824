import { DEFAULT_AREA_ID } from "../core/program.js";
import type { FindQuery } from "./find.js";

export const USAGE = `Usage:
  onair-rec [-c jobs.yaml]
  onair-rec find --service radiko|nhk [--area JP13] [--station TBS] [--keyword <regex>]`;

export type CliCommand =
  | { command: "record"; configPath: string }
  | { command: "find"; query: FindQuery }
  | { command: "help" };

export function parseCliArgs(argv: string[]): CliCommand {
  if (argv.includes("-h") || argv.includes("--help")) {
    return { command: "help" };
  }
  if (argv[0] === "find") {
    return { command: "find", query: parseFindArgs(argv.slice(1)) };
  }
  return {
    command: "record",
    configPath: readFlag(argv, ["-c", "--config"]) ?? "jobs.yaml",
  };
}

function parseFindArgs(argv: string[]): FindQuery {
  const service = readFlag(argv, ["--service"]);
  if (service !== "radiko" && service !== "nhk") {
    throw new Error(`--service must be radiko or nhk\n${USAGE}`);
  }
  return {
    service,
    area: readFlag(argv, ["--area"]) ?? DEFAULT_AREA_ID,
    station: readFlag(argv, ["--station"]),
    keyword: readFlag(argv, ["--keyword"]),
  };
}

function readFlag(argv: string[], names: string[]): string | undefined {
  const index = argv.findIndex((arg) => names.includes(arg));
  const value = index >= 0 ? argv[index + 1] : undefined;
  return value && !value.startsWith("-") ? value : undefined;
}
