import { Context, Effect, Layer } from "effect";
import {
  IAM,
  type IAMClientConfig,
  type DeleteRoleCommandInput,
  type DeleteRoleCommandOutput,
  type DetachRolePolicyCommandInput,
  type DetachRolePolicyCommandOutput,
  type GetRoleCommandInput,
  type GetRoleCommandOutput,
} from "@aws-sdk/client-iam";
import { AwsServiceError, describeFailure, type ClientApi } from "./shared";

export type IAMOperations = {
  get_role: { input: GetRoleCommandInput; output: GetRoleCommandOutput };
  detach_role_policy: { input: DetachRolePolicyCommandInput; output: DetachRolePolicyCommandOutput };
  delete_role: { input: DeleteRoleCommandInput; output: DeleteRoleCommandOutput };
};

export type IAMApi = ClientApi<IAMOperations>;

export class IAMError extends AwsServiceError("IAMError") {}

export class IAMClient extends Context.Tag("IAMClient")<IAMClient, IAMApi>() {
  static Default = (config: IAMClientConfig = {}) =>
    Layer.sync(IAMClient, () => {
      const client = new IAM(config);
      return {
        get_role: input => client.getRole(input),
        detach_role_policy: input => client.detachRolePolicy(input),
        delete_role: input => client.deleteRole(input),
      } satisfies IAMApi;
    });
}

export const make = <K extends keyof IAMOperations>(
  operation: K,
  input: IAMOperations[K]["input"]
) =>
  Effect.flatMap(IAMClient, api =>
    Effect.tryPromise({
      try: () => api[operation](input),
      catch: cause => new IAMError({ operation, message: describeFailure(operation, cause), cause }),
    })
  );
