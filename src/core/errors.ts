export type ErrorCode =
  | "CONFIG"
  | "MISSING_DEPENDENCY"
  | "MISSING_DIRECTORY"
  | "OCR_FAILED"
  | "REFILE_FAILED"
  | "INTERRUPTED";

export class RefileToolError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends RefileToolError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class MissingDependencyError extends RefileToolError {
  constructor(readonly tool: string) {
    super(
      "MISSING_DEPENDENCY",
      `The ${tool} utility is required but it's not installed. Aborting.`,
    );
  }
}

export class MissingDirectoryError extends RefileToolError {
  constructor(readonly dir: string) {
    super("MISSING_DIRECTORY", `Directory ${dir} does not exist.`);
  }
}

export class OcrError extends RefileToolError {
  constructor(readonly file: string, cause: unknown) {
    super("OCR_FAILED", `OCR processing failed for ${file}`, { cause });
  }
}

export type RefileStage = "mkdir" | "move";

export class RefileError extends RefileToolError {
  constructor(
    readonly stage: RefileStage,
    message: string,
    cause: unknown,
  ) {
    super("REFILE_FAILED", message, { cause });
  }
}

export type InterruptReason = "SIGINT" | "input-closed";

/** The operator left while a question was open. */
export class InterruptedError extends RefileToolError {
  constructor(readonly reason: InterruptReason) {
    super(
      "INTERRUPTED",
      reason === "SIGINT" ? "Interrupted." : "Input closed before a date was entered.",
    );
  }
}
