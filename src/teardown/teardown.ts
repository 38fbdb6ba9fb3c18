import { Effect } from "effect";
import type { TeardownTarget } from "~/config";
import { logSuccess } from "~/logging";
import { checkIdentity } from "~/aws";
import { confirmTeardown } from "./confirm";
import { cleanupLocalFiles } from "./local-files";
import { overallStatus, summaryLine, type OverallStatus, type StepOutcome } from "./outcome";
import {
  deleteApiGateway,
  deleteExecutionRole,
  deleteFunction,
  deleteFunctionLogs,
  removeApiGatewayPermissions,
} from "./steps";

export type TeardownOptions = {
  /** Directory local artifacts are resolved against. */
  cwd: string;
  /** Skip the local workspace cleanup. */
  keepLocalFiles?: boolean;
};

export type TeardownReport =
  | {
    status: "cancelled";
    accountId: string;
  }
  | {
    status: OverallStatus;
    accountId: string;
    outcomes: StepOutcome[];
    removedFiles: string[];
  };

/**
 * Delete the resources of one Lambda service, dependents first.
 * Steps never abort the run; each reports its own outcome.
 */
export const runTeardownSteps = (target: TeardownTarget) =>
  Effect.gen(function* () {
    const outcomes: StepOutcome[] = [];

    outcomes.push(yield* removeApiGatewayPermissions(target));
    outcomes.push(yield* deleteApiGateway(target));
    outcomes.push(yield* deleteFunction(target));
    outcomes.push(yield* deleteFunctionLogs(target));
    outcomes.push(yield* deleteExecutionRole(target));

    return outcomes;
  });

export const teardown = (target: TeardownTarget, options: TeardownOptions) =>
  Effect.gen(function* () {
    const identity = yield* checkIdentity();

    const confirmed = yield* confirmTeardown(target);
    if (!confirmed) {
      yield* Effect.logInfo("Deletion cancelled by user");
      return { status: "cancelled", accountId: identity.accountId } satisfies TeardownReport;
    }

    yield* Effect.logInfo(`Starting resource destruction in ${target.region}...`);

    const outcomes = yield* runTeardownSteps(target);

    const removedFiles = options.keepLocalFiles
      ? []
      : yield* cleanupLocalFiles(target.localFiles, options.cwd);

    yield* logSuccess("Resource destruction completed!");
    yield* Effect.logInfo("Summary:");
    for (const outcome of outcomes) {
      yield* Effect.logInfo(summaryLine(outcome));
    }

    const status = overallStatus(outcomes);
    switch (status) {
      case "success":
        yield* logSuccess("All AWS resources have been successfully removed.");
        break;
      case "partial": {
        const count = outcomes.filter(o => o.status === "failed").length;
        yield* Effect.logWarning(`${count} step(s) failed; check the messages above and finish cleanup manually.`);
        break;
      }
      case "failed":
        yield* Effect.logError(`Lambda function ${target.functionName} could not be deleted.`);
        break;
    }

    const report: TeardownReport = { status, accountId: identity.accountId, outcomes, removedFiles };
    return report;
  });
