import { Layer } from "effect";
import { LambdaClient } from "./lambda";
import { IAMClient } from "./iam";
import { ApiGatewayClient } from "./apigateway";
import { ApiGatewayV2Client } from "./apigatewayv2";
import { CloudWatchLogsClient } from "./cloudwatch-logs";
import { STSClient } from "./sts";
import { S3Client } from "./s3";

export * as lambda from "./lambda";
export * as iam from "./iam";
export * as apigateway from "./apigateway";
export * as apigatewayv2 from "./apigatewayv2";
export * as cloudwatch_logs from "./cloudwatch-logs";
export * as sts from "./sts";
export * as s3 from "./s3";
export { awsErrorCode } from "./shared";
export type { ClientApi, Operation } from "./shared";

export type ClientsConfig = {
  region: string;
  profile?: string;
};

/**
 * One layer with every AWS client lambda-ops talks to, all bound to the
 * same region and credentials profile.
 */
export const makeClients = (config: ClientsConfig) => {
  const clientConfig = config.profile
    ? { region: config.region, profile: config.profile }
    : { region: config.region };

  return Layer.mergeAll(
    LambdaClient.Default(clientConfig),
    IAMClient.Default(clientConfig),
    ApiGatewayClient.Default(clientConfig),
    ApiGatewayV2Client.Default(clientConfig),
    CloudWatchLogsClient.Default(clientConfig),
    STSClient.Default(clientConfig),
    S3Client.Default(clientConfig)
  );
};

export type AwsClients =
  | LambdaClient
  | IAMClient
  | ApiGatewayClient
  | ApiGatewayV2Client
  | CloudWatchLogsClient
  | STSClient
  | S3Client;
