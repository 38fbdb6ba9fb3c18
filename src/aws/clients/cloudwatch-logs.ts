import { Context, Effect, Layer } from "effect";
import {
  CloudWatchLogs,
  type CloudWatchLogsClientConfig,
  type DeleteLogGroupCommandInput,
  type DeleteLogGroupCommandOutput,
  type DescribeLogGroupsCommandInput,
  type DescribeLogGroupsCommandOutput,
} from "@aws-sdk/client-cloudwatch-logs";
import { AwsServiceError, describeFailure, type ClientApi } from "./shared";

export type CloudWatchLogsOperations = {
  describe_log_groups: { input: DescribeLogGroupsCommandInput; output: DescribeLogGroupsCommandOutput };
  delete_log_group: { input: DeleteLogGroupCommandInput; output: DeleteLogGroupCommandOutput };
};

export type CloudWatchLogsApi = ClientApi<CloudWatchLogsOperations>;

export class CloudWatchLogsError extends AwsServiceError("CloudWatchLogsError") {}

export class CloudWatchLogsClient extends Context.Tag("CloudWatchLogsClient")<CloudWatchLogsClient, CloudWatchLogsApi>() {
  static Default = (config: CloudWatchLogsClientConfig = {}) =>
    Layer.sync(CloudWatchLogsClient, () => {
      const client = new CloudWatchLogs(config);
      return {
        describe_log_groups: input => client.describeLogGroups(input),
        delete_log_group: input => client.deleteLogGroup(input),
      } satisfies CloudWatchLogsApi;
    });
}

export const make = <K extends keyof CloudWatchLogsOperations>(
  operation: K,
  input: CloudWatchLogsOperations[K]["input"]
) =>
  Effect.flatMap(CloudWatchLogsClient, api =>
    Effect.tryPromise({
      try: () => api[operation](input),
      catch: cause => new CloudWatchLogsError({ operation, message: describeFailure(operation, cause), cause }),
    })
  );
