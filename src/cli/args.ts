import { parseArgs } from "node:util";
import type { ConfigFlags } from "../core/config.js";

export type CliCommand =
  | { kind: "help" }
  | { kind: "test-date"; input: string; flags: ConfigFlags }
  | { kind: "run"; flags: ConfigFlags };

export const USAGE = `Usage: pdf-refile [-s scan_dir] [-d dest_dir] [-l log_level] [-t test_date] [-n]
Organizes scanned PDF files into a searchable datetree folder structure.
Processed files are placed into a datetree folder structure under dest_dir.
The date to be used is read from the processed PDF file.
If a date cannot be read from the file, user is asked to provide one.

Options:
  -s, --scan-dir <dir>     Directory to scan for PDF files (default: current directory)
  -d, --dest-dir <dir>     Destination directory for organized PDF files (default: scan_dir)
  -l, --log-level <level>  info | warning | error | debug (default: info)
  -n, --dry-run            Do not move files, just print datestamp
  -t, --test-date <str>    Don't run, just try parsing the string into a datestamp
      --max-age-days <n>   Ask for confirmation when a text date is further than n days from today (default: 365)
      --year-pivot <n>     Two-digit years above n are 19xx, the rest 20xx (default: 50)
  -h, --help               Display this help message and exit
`;

/** Throws on unknown options or a missing option value. */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      "scan-dir": { type: "string", short: "s" },
      "dest-dir": { type: "string", short: "d" },
      "log-level": { type: "string", short: "l" },
      "dry-run": { type: "boolean", short: "n" },
      "test-date": { type: "string", short: "t" },
      "max-age-days": { type: "string" },
      "year-pivot": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) return { kind: "help" };

  const flags: ConfigFlags = {
    scanDir: values["scan-dir"],
    destDir: values["dest-dir"],
    logLevel: values["log-level"],
    dryRun: values["dry-run"],
    maxAgeDays: values["max-age-days"],
    yearPivot: values["year-pivot"],
  };

  const input = values["test-date"];
  if (input !== undefined) return { kind: "test-date", input, flags };

  return { kind: "run", flags };
}
