export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type OutputFormat = "human" | "jsonl";

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "human" || value === "jsonl";
}

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

export type ReporterStreams = {
  stdout: Pick<NodeJS.WritableStream, "write">;
  stderr: Pick<NodeJS.WritableStream, "write">;
};

export type Reporter = {
  readonly format: OutputFormat;
  /** Errors and warnings go to stderr in human format; everything is one stdout line in jsonl. */
  report(d: Diagnostic): void;
  /** Command payload: pretty JSON for humans, one line for jsonl. */
  data(value: unknown): void;
};

export function createReporter(
  format: OutputFormat,
  streams: ReporterStreams = { stdout: process.stdout, stderr: process.stderr },
): Reporter {
  return {
    format,
    report(d) {
      if (format === "jsonl") {
        streams.stdout.write(`${JSON.stringify(d)}\n`);
      } else if (d.level === "info") {
        streams.stdout.write(`${d.message}\n`);
      } else {
        streams.stderr.write(`${d.level}: ${d.message}\n`);
      }
    },
    data(value) {
      streams.stdout.write(format === "jsonl" ? `${JSON.stringify(value)}\n` : `${JSON.stringify(value, null, 2)}\n`);
    },
  };
}
