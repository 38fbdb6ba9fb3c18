import { Effect } from "effect";
import { cloudwatch_logs } from "./clients";

/**
 * Lambda writes to a log group named after the function.
 */
export const logGroupNameFor = (functionName: string): string => `/aws/lambda/${functionName}`;

export const logGroupExists = (logGroupName: string) =>
  cloudwatch_logs.make("describe_log_groups", { logGroupNamePrefix: logGroupName }).pipe(
    Effect.map(r => (r.logGroups ?? []).some(g => g.logGroupName === logGroupName))
  );

export const deleteLogGroup = (logGroupName: string) =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Deleting log group: ${logGroupName}`);
    yield* cloudwatch_logs.make("delete_log_group", { logGroupName });
  });
