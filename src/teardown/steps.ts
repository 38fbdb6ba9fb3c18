import { Effect } from "effect";
import type { TeardownTarget } from "~/config";
import { logSuccess } from "~/logging";
import {
  API_GATEWAY_PRINCIPAL,
  deleteApi,
  deleteLambda,
  deleteLogGroup,
  deleteRole,
  detachManagedPolicies,
  findApisByName,
  getFunction,
  getPolicyStatements,
  getRole,
  isGrantedTo,
  logGroupExists,
  logGroupNameFor,
  removePermission,
  waitForFunctionDeleted,
} from "~/aws";
import { failed, notFound, succeeded } from "./outcome";

/**
 * Remove every resource-policy statement that lets API Gateway invoke the function.
 */
export const removeApiGatewayPermissions = (target: TeardownTarget) =>
  Effect.gen(function* () {
    yield* Effect.logInfo("Removing Lambda permissions for API Gateway...");

    const statements = yield* getPolicyStatements(target.functionName);
    if (!statements || statements.length === 0) {
      yield* Effect.logInfo("No Lambda permissions found to remove");
      return notFound("permissions", "no resource policy");
    }

    const statementIds = statements
      .filter(s => isGrantedTo(s, API_GATEWAY_PRINCIPAL))
      .flatMap(s => (s.Sid ? [s.Sid] : []));

    if (statementIds.length === 0) {
      yield* Effect.logInfo("No API Gateway permissions found to remove");
      return notFound("permissions", "no API Gateway statements");
    }

    const rejected: string[] = [];
    for (const statementId of statementIds) {
      yield* Effect.logInfo(`Removing permission: ${statementId}`);
      yield* removePermission(target.functionName, statementId).pipe(
        Effect.catchAll(error =>
          Effect.logWarning(`Could not remove permission: ${statementId}`).pipe(
            Effect.zipRight(Effect.logDebug(error.message)),
            Effect.zipRight(Effect.sync(() => rejected.push(statementId)))
          )
        )
      );
    }

    if (rejected.length > 0) {
      return failed("permissions", `could not remove ${rejected.join(", ")}`);
    }

    yield* logSuccess(`Removed ${statementIds.length} API Gateway permission(s)`);
    return succeeded("permissions", `removed ${statementIds.join(", ")}`);
  }).pipe(
    Effect.catchAll(error =>
      Effect.logWarning(`Could not read Lambda permissions: ${error.message}`).pipe(
        Effect.as(failed("permissions", error.message))
      )
    )
  );

export const deleteApiGateway = (target: TeardownTarget) =>
  Effect.gen(function* () {
    yield* Effect.logInfo("Deleting API Gateway...");

    const apis = yield* findApisByName(target.apiName, target.apiType);
    if (apis.length === 0) {
      yield* Effect.logInfo(`No API Gateway found with name: ${target.apiName}`);
      return notFound("api-gateway", target.apiName);
    }

    const rejected: string[] = [];
    for (const api of apis) {
      yield* Effect.logInfo(`Found API Gateway with ID: ${api.id}`);
      yield* deleteApi(api.id, target.apiType).pipe(
        Effect.catchAll(error =>
          Effect.logWarning(`Could not delete API Gateway ${api.id}, it may already be deleted or in use`).pipe(
            Effect.zipRight(Effect.logDebug(error.message)),
            Effect.zipRight(Effect.sync(() => rejected.push(api.id)))
          )
        )
      );
    }

    if (rejected.length > 0) {
      return failed("api-gateway", `${target.apiName} (${rejected.join(", ")})`);
    }

    yield* logSuccess("API Gateway deleted");
    return succeeded("api-gateway", target.apiName);
  }).pipe(
    Effect.catchAll(error =>
      Effect.logWarning(`Could not look up API Gateway ${target.apiName}: ${error.message}`).pipe(
        Effect.as(failed("api-gateway", target.apiName))
      )
    )
  );

/**
 * The only critical step: a function that survives keeps serving traffic.
 */
export const deleteFunction = (target: TeardownTarget) =>
  Effect.gen(function* () {
    yield* Effect.logInfo("Deleting Lambda function...");

    const existing = yield* getFunction(target.functionName);
    if (!existing) {
      yield* Effect.logInfo(`No Lambda function found with name: ${target.functionName}`);
      return notFound("lambda", target.functionName);
    }

    yield* Effect.logInfo(`Found Lambda function: ${target.functionName}`);
    yield* deleteLambda(target.functionName);

    if (target.waitForDeletion) {
      yield* waitForFunctionDeleted(target.functionName).pipe(
        Effect.catchAll(error =>
          Effect.logWarning(`Lambda function deletion accepted but not yet visible: ${error.message}`)
        )
      );
    }

    yield* logSuccess("Lambda function deleted");
    return succeeded("lambda", target.functionName);
  }).pipe(
    Effect.catchAll(error =>
      Effect.logError(`Could not delete Lambda function: ${target.functionName}`).pipe(
        Effect.zipRight(Effect.logDebug(error.message)),
        Effect.as(failed("lambda", target.functionName, true))
      )
    )
  );

export const deleteFunctionLogs = (target: TeardownTarget) =>
  Effect.gen(function* () {
    yield* Effect.logInfo("Deleting CloudWatch logs...");

    const logGroupName = logGroupNameFor(target.functionName);

    const exists = yield* logGroupExists(logGroupName);
    if (!exists) {
      yield* Effect.logInfo(`No CloudWatch log group found: ${logGroupName}`);
      return notFound("log-group", logGroupName);
    }

    yield* Effect.logInfo(`Found CloudWatch log group: ${logGroupName}`);
    yield* deleteLogGroup(logGroupName);

    yield* logSuccess("CloudWatch logs deleted");
    return succeeded("log-group", logGroupName);
  }).pipe(
    Effect.catchAll(error =>
      Effect.logWarning(`Could not delete CloudWatch log group: ${logGroupNameFor(target.functionName)}`).pipe(
        Effect.zipRight(Effect.logDebug(error.message)),
        Effect.as(failed("log-group", logGroupNameFor(target.functionName)))
      )
    )
  );

export const deleteExecutionRole = (target: TeardownTarget) =>
  Effect.gen(function* () {
    yield* Effect.logInfo("Deleting IAM role...");

    const role = yield* getRole(target.roleName);
    if (!role) {
      yield* Effect.logInfo(`No IAM role found with name: ${target.roleName}`);
      return notFound("iam-role", target.roleName);
    }

    yield* Effect.logInfo(`Found IAM role: ${target.roleName}`);
    yield* Effect.logInfo("Detaching policies from role...");
    yield* detachManagedPolicies(target.roleName, target.managedPolicyArns);

    yield* deleteRole(target.roleName);

    yield* logSuccess("IAM role deleted");
    return succeeded("iam-role", target.roleName);
  }).pipe(
    Effect.catchAll(error =>
      Effect.logError(`Could not delete IAM role: ${target.roleName}`).pipe(
        Effect.zipRight(Effect.logWarning("You may need to manually delete this role from the AWS Console")),
        Effect.zipRight(Effect.logDebug(error.message)),
        Effect.as(failed("iam-role", target.roleName))
      )
    )
  );
