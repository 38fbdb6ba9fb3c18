import { Context, Effect, Layer } from "effect";
import {
  APIGateway,
  type APIGatewayClientConfig,
  type DeleteRestApiCommandInput,
  type DeleteRestApiCommandOutput,
  type GetRestApisCommandInput,
  type GetRestApisCommandOutput,
} from "@aws-sdk/client-api-gateway";
import { AwsServiceError, describeFailure, type ClientApi } from "./shared";

// REST APIs (API Gateway v1)
export type ApiGatewayOperations = {
  get_rest_apis: { input: GetRestApisCommandInput; output: GetRestApisCommandOutput };
  delete_rest_api: { input: DeleteRestApiCommandInput; output: DeleteRestApiCommandOutput };
};

export type ApiGatewayApi = ClientApi<ApiGatewayOperations>;

export class ApiGatewayError extends AwsServiceError("ApiGatewayError") {}

export class ApiGatewayClient extends Context.Tag("ApiGatewayClient")<ApiGatewayClient, ApiGatewayApi>() {
  static Default = (config: APIGatewayClientConfig = {}) =>
    Layer.sync(ApiGatewayClient, () => {
      const client = new APIGateway(config);
      return {
        get_rest_apis: input => client.getRestApis(input),
        delete_rest_api: input => client.deleteRestApi(input),
      } satisfies ApiGatewayApi;
    });
}

export const make = <K extends keyof ApiGatewayOperations>(
  operation: K,
  input: ApiGatewayOperations[K]["input"]
) =>
  Effect.flatMap(ApiGatewayClient, api =>
    Effect.tryPromise({
      try: () => api[operation](input),
      catch: cause => new ApiGatewayError({ operation, message: describeFailure(operation, cause), cause }),
    })
  );
