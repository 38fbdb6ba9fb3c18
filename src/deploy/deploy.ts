import { Effect } from "effect";
import * as fs from "fs/promises";
import * as path from "path";
import type { DeployTarget } from "~/config";
import { logSuccess } from "~/logging";
import {
  checkIdentity,
  getFunction,
  hasSettings,
  updateFunctionCode,
  updateFunctionConfiguration,
  waitForFunctionUpdated,
  ensureBucket,
  uploadObject,
  type FunctionCode,
} from "~/aws";
import { DeployError } from "./errors";

export type DeployOptions = {
  /** Directory the archive path is resolved against. */
  cwd: string;
};

export type DeployReport = {
  functionName: string;
  functionArn: string | undefined;
  upload: "direct" | "s3";
  /** Archive path for a direct upload, `s3://bucket/key` otherwise. */
  location: string;
  configured: boolean;
};

const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const readArchive = (archivePath: string, archive: string) =>
  Effect.tryPromise({
    try: () => fs.readFile(archivePath),
    catch: error => new DeployError({
      stage: "archive",
      message: isMissingFile(error)
        ? `Deployment package not found: ${archive}. Run 'lambda-ops package' first.`
        : `Cannot read ${archive}: ${error}`
    })
  });

/**
 * Stage the archive in S3 and return the code location for UpdateFunctionCode.
 */
const stageInS3 = (target: DeployTarget, body: Uint8Array) =>
  Effect.gen(function* () {
    yield* ensureBucket(target.bucket, target.region);

    const location = `s3://${target.bucket}/${target.s3Key}`;
    yield* Effect.logInfo(`Uploading to S3: ${location}`);
    yield* uploadObject(target.bucket, target.s3Key, body);
    yield* logSuccess("File uploaded to S3 successfully");

    return { S3Bucket: target.bucket, S3Key: target.s3Key } satisfies FunctionCode;
  }).pipe(
    Effect.mapError(error => new DeployError({ stage: "upload", message: `S3 upload failed: ${error.message}` }))
  );

/**
 * Push a packaged archive to an existing Lambda function, then apply the
 * configured handler, runtime, timeout, memory and environment.
 */
export const deploy = (target: DeployTarget, options: DeployOptions) =>
  Effect.gen(function* () {
    yield* checkIdentity();

    const body = yield* readArchive(path.resolve(options.cwd, target.archive), target.archive);
    yield* Effect.logInfo(`Deployment package: ${target.archive} (${body.byteLength} bytes)`);

    const existing = yield* getFunction(target.functionName).pipe(
      Effect.mapError(error => new DeployError({ stage: "function", message: error.message }))
    );
    if (!existing) {
      return yield* Effect.fail(new DeployError({
        stage: "function",
        message: `Lambda function ${target.functionName} does not exist in ${target.region}; create it before deploying`
      }));
    }

    const direct = body.byteLength <= target.directUploadLimit;
    const code: FunctionCode = direct
      ? { ZipFile: body }
      : yield* stageInS3(target, body);

    const updated = yield* updateFunctionCode(target.functionName, code).pipe(
      Effect.zipLeft(waitForFunctionUpdated(target.functionName)),
      Effect.mapError(error => new DeployError({ stage: "code", message: error.message }))
    );
    yield* logSuccess(`Successfully deployed to Lambda function: ${target.functionName}`);
    yield* Effect.logInfo(`Function ARN: ${updated.FunctionArn ?? "unknown"}`);

    const configured = hasSettings(target.settings);
    if (configured) {
      yield* Effect.logInfo("Updating function configuration...");
      yield* updateFunctionConfiguration(target.functionName, target.settings).pipe(
        Effect.zipRight(waitForFunctionUpdated(target.functionName)),
        Effect.mapError(error => new DeployError({ stage: "configure", message: error.message }))
      );
      yield* logSuccess("Function configuration updated successfully");
    }

    yield* logSuccess("Deployment completed successfully!");

    return {
      functionName: target.functionName,
      functionArn: updated.FunctionArn,
      upload: direct ? "direct" : "s3",
      location: direct ? target.archive : `s3://${target.bucket}/${target.s3Key}`,
      configured,
    } satisfies DeployReport;
  });
