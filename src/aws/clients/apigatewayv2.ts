import { Context, Effect, Layer } from "effect";
import {
  ApiGatewayV2,
  type ApiGatewayV2ClientConfig,
  type DeleteApiCommandInput,
  type DeleteApiCommandOutput,
  type GetApisCommandInput,
  type GetApisCommandOutput,
} from "@aws-sdk/client-apigatewayv2";
import { AwsServiceError, describeFailure, type ClientApi } from "./shared";

// HTTP APIs (API Gateway v2)
export type ApiGatewayV2Operations = {
  get_apis: { input: GetApisCommandInput; output: GetApisCommandOutput };
  delete_api: { input: DeleteApiCommandInput; output: DeleteApiCommandOutput };
};

export type ApiGatewayV2Api = ClientApi<ApiGatewayV2Operations>;

export class ApiGatewayV2Error extends AwsServiceError("ApiGatewayV2Error") {}

export class ApiGatewayV2Client extends Context.Tag("ApiGatewayV2Client")<ApiGatewayV2Client, ApiGatewayV2Api>() {
  static Default = (config: ApiGatewayV2ClientConfig = {}) =>
    Layer.sync(ApiGatewayV2Client, () => {
      const client = new ApiGatewayV2(config);
      return {
        get_apis: input => client.getApis(input),
        delete_api: input => client.deleteApi(input),
      } satisfies ApiGatewayV2Api;
    });
}

export const make = <K extends keyof ApiGatewayV2Operations>(
  operation: K,
  input: ApiGatewayV2Operations[K]["input"]
) =>
  Effect.flatMap(ApiGatewayV2Client, api =>
    Effect.tryPromise({
      try: () => api[operation](input),
      catch: cause => new ApiGatewayV2Error({ operation, message: describeFailure(operation, cause), cause }),
    })
  );
