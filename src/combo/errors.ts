export class ComboConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid combo config: ${issues.join("; ")}`);
    this.name = "ComboConfigError";
    this.issues = issues;
  }
}

export class SessionClosedError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: combo session has been disposed`);
    this.name = "SessionClosedError";
  }
}
