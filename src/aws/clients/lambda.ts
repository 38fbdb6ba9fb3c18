import { Context, Effect, Layer } from "effect";
import {
  Lambda,
  type LambdaClientConfig,
  type DeleteFunctionCommandInput,
  type DeleteFunctionCommandOutput,
  type GetFunctionCommandInput,
  type GetFunctionCommandOutput,
  type GetPolicyCommandInput,
  type GetPolicyCommandOutput,
  type RemovePermissionCommandInput,
  type RemovePermissionCommandOutput,
  type UpdateFunctionCodeCommandInput,
  type UpdateFunctionCodeCommandOutput,
  type UpdateFunctionConfigurationCommandInput,
  type UpdateFunctionConfigurationCommandOutput,
} from "@aws-sdk/client-lambda";
import { AwsServiceError, describeFailure, type ClientApi } from "./shared";

export type LambdaOperations = {
  get_function: { input: GetFunctionCommandInput; output: GetFunctionCommandOutput };
  delete_function: { input: DeleteFunctionCommandInput; output: DeleteFunctionCommandOutput };
  get_policy: { input: GetPolicyCommandInput; output: GetPolicyCommandOutput };
  remove_permission: { input: RemovePermissionCommandInput; output: RemovePermissionCommandOutput };
  update_function_code: { input: UpdateFunctionCodeCommandInput; output: UpdateFunctionCodeCommandOutput };
  update_function_configuration: { input: UpdateFunctionConfigurationCommandInput; output: UpdateFunctionConfigurationCommandOutput };
};

export type LambdaApi = ClientApi<LambdaOperations>;

export class LambdaError extends AwsServiceError("LambdaError") {}

export class LambdaClient extends Context.Tag("LambdaClient")<LambdaClient, LambdaApi>() {
  static Default = (config: LambdaClientConfig = {}) =>
    Layer.sync(LambdaClient, () => {
      const client = new Lambda(config);
      return {
        get_function: input => client.getFunction(input),
        delete_function: input => client.deleteFunction(input),
        get_policy: input => client.getPolicy(input),
        remove_permission: input => client.removePermission(input),
        update_function_code: input => client.updateFunctionCode(input),
        update_function_configuration: input => client.updateFunctionConfiguration(input),
      } satisfies LambdaApi;
    });
}

export const make = <K extends keyof LambdaOperations>(
  operation: K,
  input: LambdaOperations[K]["input"]
) =>
  Effect.flatMap(LambdaClient, api =>
    Effect.tryPromise({
      try: () => api[operation](input),
      catch: cause => new LambdaError({ operation, message: describeFailure(operation, cause), cause }),
    })
  );
