import { Effect } from "effect";
import type { ApiType } from "~/config";
import { apigateway, apigatewayv2 } from "./clients";
import type { ApiGatewayClient, ApiGatewayError } from "./clients/apigateway";
import type { ApiGatewayV2Client, ApiGatewayV2Error } from "./clients/apigatewayv2";

export type GatewaySummary = {
  id: string;
  name: string;
};

const listRestApis = () =>
  Effect.gen(function* () {
    const all: GatewaySummary[] = [];
    let position: string | undefined;

    do {
      const result = yield* apigateway.make("get_rest_apis", {
        limit: 500,
        ...(position ? { position } : {}),
      });
      for (const api of result.items ?? []) {
        if (api.id && api.name) all.push({ id: api.id, name: api.name });
      }
      position = result.position;
    } while (position);

    return all;
  });

const listHttpApis = () =>
  Effect.gen(function* () {
    const all: GatewaySummary[] = [];
    let token: string | undefined;

    do {
      const result = yield* apigatewayv2.make("get_apis", {
        ...(token ? { NextToken: token } : {}),
      });
      for (const api of result.Items ?? []) {
        if (api.ApiId && api.Name) all.push({ id: api.ApiId, name: api.Name });
      }
      token = result.NextToken;
    } while (token);

    return all;
  });

/**
 * API Gateway names are not unique, so every API with a matching name is returned.
 */
export const findApisByName = (name: string, type: ApiType) =>
  Effect.map<
    GatewaySummary[],
    ApiGatewayError | ApiGatewayV2Error,
    ApiGatewayClient | ApiGatewayV2Client,
    GatewaySummary[]
  >(type === "rest" ? listRestApis() : listHttpApis(), apis =>
    apis.filter(api => api.name === name)
  );

export const deleteApi = (apiId: string, type: ApiType) =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Deleting API Gateway: ${apiId}`);

    if (type === "rest") {
      yield* apigateway.make("delete_rest_api", { restApiId: apiId });
    } else {
      yield* apigatewayv2.make("delete_api", { ApiId: apiId });
    }
  });
