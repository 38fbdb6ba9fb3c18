// Lambda
export { getFunction, getPolicyStatements, removePermission, deleteLambda, waitForFunctionDeleted, isGrantedTo, API_GATEWAY_PRINCIPAL } from "./lambda";
export { updateFunctionCode, updateFunctionConfiguration, waitForFunctionUpdated, hasSettings, isRuntime, FunctionUpdateError } from "./lambda";
export type { PolicyStatement, FunctionCode } from "./lambda";

// S3
export { bucketExists, ensureBucket, uploadObject } from "./s3";

// IAM
export { getRole, detachManagedPolicies, deleteRole } from "./iam";

// API Gateway
export { findApisByName, deleteApi } from "./apigateway";
export type { GatewaySummary } from "./apigateway";

// CloudWatch Logs
export { logGroupNameFor, logGroupExists, deleteLogGroup } from "./logs";

// STS
export { checkIdentity, PreflightError } from "./identity";
export type { CallerIdentity } from "./identity";

// Clients
export * as Aws from "./clients/index";
export { makeClients } from "./clients/index";
export type { AwsClients, ClientsConfig } from "./clients/index";
