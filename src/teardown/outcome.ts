export type StepName = "permissions" | "api-gateway" | "lambda" | "log-group" | "iam-role";

export type StepStatus = "success" | "not-found" | "failed";

export type StepOutcome = {
  step: StepName;
  status: StepStatus;
  /** A failed critical step makes the whole run fail. */
  critical: boolean;
  detail: string;
};

export type OverallStatus = "success" | "partial" | "failed";

export const STEP_LABELS: Record<StepName, string> = {
  "permissions": "Lambda permissions",
  "api-gateway": "API Gateway",
  "lambda": "Lambda function",
  "log-group": "CloudWatch logs",
  "iam-role": "IAM role",
};

export const succeeded = (step: StepName, detail: string): StepOutcome =>
  ({ step, status: "success", critical: false, detail });

export const notFound = (step: StepName, detail: string): StepOutcome =>
  ({ step, status: "not-found", critical: false, detail });

export const failed = (step: StepName, detail: string, critical = false): StepOutcome =>
  ({ step, status: "failed", critical, detail });

export const overallStatus = (outcomes: ReadonlyArray<StepOutcome>): OverallStatus => {
  if (outcomes.some(o => o.status === "failed" && o.critical)) return "failed";
  if (outcomes.some(o => o.status === "failed")) return "partial";
  return "success";
};

const SUMMARY_MARKS: Record<StepStatus, string> = {
  "success": "✓",
  "not-found": "-",
  "failed": "✗",
};

export const summaryLine = (outcome: StepOutcome): string =>
  `  ${SUMMARY_MARKS[outcome.status]} ${STEP_LABELS[outcome.step]}: ${outcome.detail}`;
