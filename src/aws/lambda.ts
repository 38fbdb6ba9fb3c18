import { Effect, Schedule } from "effect";
import * as Data from "effect/Data";
import * as S from "effect/Schema";
import { Runtime, type FunctionConfiguration } from "@aws-sdk/client-lambda";
import type { FunctionSettings } from "~/config";
import { lambda } from "./clients";

export const API_GATEWAY_PRINCIPAL = "apigateway.amazonaws.com";

const Principal = S.Union(
  S.String,
  S.Struct({
    Service: S.optional(S.Union(S.String, S.Array(S.String))),
  })
);

const PolicyStatement = S.Struct({
  Sid: S.optional(S.String),
  Principal: S.optional(Principal),
});

const PolicyDocument = S.Struct({
  Statement: S.optional(S.Array(PolicyStatement)),
});

export type PolicyStatement = typeof PolicyStatement.Type;

const decodePolicy = S.decodeUnknown(S.parseJson(PolicyDocument));

/**
 * True when the statement grants invoke rights to the given service principal.
 */
export const isGrantedTo = (statement: PolicyStatement, service: string): boolean => {
  const principal = statement.Principal;
  if (principal === undefined || typeof principal === "string") return false;
  const granted = principal.Service;
  if (granted === undefined) return false;
  return typeof granted === "string" ? granted === service : granted.includes(service);
};

export const getFunction = (functionName: string) =>
  lambda.make("get_function", { FunctionName: functionName }).pipe(
    Effect.map((r): FunctionConfiguration | undefined => r.Configuration ?? {}),
    Effect.catchIf(
      e => e.is("ResourceNotFoundException"),
      () => Effect.succeed(undefined)
    )
  );

/**
 * Statements of the function's resource policy.
 * `undefined` when the function or its policy does not exist.
 */
export const getPolicyStatements = (functionName: string) =>
  Effect.gen(function* () {
    const result = yield* lambda.make("get_policy", { FunctionName: functionName }).pipe(
      Effect.catchIf(
        e => e.is("ResourceNotFoundException"),
        () => Effect.succeed(undefined)
      )
    );

    if (!result?.Policy) return undefined;

    const document = yield* decodePolicy(result.Policy).pipe(
      Effect.mapError(e => new Error(`Malformed resource policy on ${functionName}: ${e.message}`))
    );

    return document.Statement;
  });

export const removePermission = (functionName: string, statementId: string) =>
  lambda.make("remove_permission", {
    FunctionName: functionName,
    StatementId: statementId,
  });

export const deleteLambda = (functionName: string) =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Deleting Lambda function: ${functionName}`);
    yield* lambda.make("delete_function", { FunctionName: functionName });
  });

/**
 * Poll until GetFunction reports the function as gone.
 */
export const waitForFunctionDeleted = (functionName: string) =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Waiting for function ${functionName} to be deleted`);

    yield* Effect.retry(
      getFunction(functionName).pipe(
        Effect.flatMap(existing =>
          existing
            ? Effect.fail(new Error(`Function ${functionName} is still present (state: ${existing.State ?? "unknown"})`))
            : Effect.void
        )
      ),
      {
        times: 30,
        schedule: Schedule.spaced("2 seconds")
      }
    );

    yield* Effect.logDebug(`Function ${functionName} is gone`);
  });

export type FunctionCode =
  | { ZipFile: Uint8Array }
  | { S3Bucket: string; S3Key: string };

export const updateFunctionCode = (functionName: string, code: FunctionCode) =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Updating code of ${functionName}`);
    return yield* lambda.make("update_function_code", { FunctionName: functionName, ...code });
  });

export const isRuntime = (value: string): value is Runtime =>
  Object.values<string>(Runtime).includes(value);

export const hasSettings = (settings: FunctionSettings): boolean =>
  Object.values(settings).some(value => value !== undefined);

export const updateFunctionConfiguration = (functionName: string, settings: FunctionSettings) =>
  lambda.make("update_function_configuration", {
    FunctionName: functionName,
    Handler: settings.handler,
    Runtime: settings.runtime,
    Timeout: settings.timeout,
    MemorySize: settings.memorySize,
    Environment: settings.environment ? { Variables: { ...settings.environment } } : undefined,
  });

export class FunctionUpdateError extends Data.TaggedError("FunctionUpdateError")<{
  message: string;
  retryable: boolean;
}> {}

/**
 * Poll until the last code or configuration update has been applied.
 * A failed update stops the polling.
 */
export const waitForFunctionUpdated = (functionName: string) =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Waiting for function ${functionName} to be active`);

    yield* Effect.retry(
      lambda.make("get_function", { FunctionName: functionName }).pipe(
        Effect.flatMap(r => {
          const state = r.Configuration?.State;
          const updateStatus = r.Configuration?.LastUpdateStatus;
          if (updateStatus === "Failed") {
            return Effect.fail(new FunctionUpdateError({
              message: `Update of ${functionName} failed: ${r.Configuration?.LastUpdateStatusReason ?? "no reason given"}`,
              retryable: false
            }));
          }
          if (state === "Active" && (!updateStatus || updateStatus === "Successful")) {
            return Effect.succeed(r);
          }
          return Effect.fail(new FunctionUpdateError({
            message: `Function state: ${state}, update status: ${updateStatus}`,
            retryable: true
          }));
        })
      ),
      {
        times: 30,
        schedule: Schedule.spaced("2 seconds"),
        while: e => e._tag !== "FunctionUpdateError" || e.retryable
      }
    );

    yield* Effect.logDebug(`Function ${functionName} is active`);
  });
