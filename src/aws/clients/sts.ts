import { Context, Effect, Layer } from "effect";
import {
  STS,
  type STSClientConfig,
  type GetCallerIdentityCommandInput,
  type GetCallerIdentityCommandOutput,
} from "@aws-sdk/client-sts";
import { AwsServiceError, describeFailure, type ClientApi } from "./shared";

export type STSOperations = {
  get_caller_identity: { input: GetCallerIdentityCommandInput; output: GetCallerIdentityCommandOutput };
};

export type STSApi = ClientApi<STSOperations>;

export class STSError extends AwsServiceError("STSError") {}

export class STSClient extends Context.Tag("STSClient")<STSClient, STSApi>() {
  static Default = (config: STSClientConfig = {}) =>
    Layer.sync(STSClient, () => {
      const client = new STS(config);
      return {
        get_caller_identity: input => client.getCallerIdentity(input),
      } satisfies STSApi;
    });
}

export const make = <K extends keyof STSOperations>(
  operation: K,
  input: STSOperations[K]["input"]
) =>
  Effect.flatMap(STSClient, api =>
    Effect.tryPromise({
      try: () => api[operation](input),
      catch: cause => new STSError({ operation, message: describeFailure(operation, cause), cause }),
    })
  );
