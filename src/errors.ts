export class GitError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    command: string,
    details: { exitCode?: number | null; stderr?: string } = {},
  ) {
    const stderr = (details.stderr || "").trim();
    super(stderr ? `${command} failed: ${stderr}` : `${command} failed`);
    this.name = "GitError";
    this.command = command;
    this.exitCode = details.exitCode ?? null;
    this.stderr = stderr;
  }
}

export class InvalidParameterError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join("; ") || "invalid parameter");
    this.name = "InvalidParameterError";
    this.issues = issues;
  }
}

export class NotLoginError extends Error {
  constructor(message = "Must login to push, please login first.") {
    super(message);
    this.name = "NotLoginError";
  }
}
