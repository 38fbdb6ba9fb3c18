import { Effect } from "effect";
import { BucketLocationConstraint } from "@aws-sdk/client-s3";
import { s3 } from "./clients";

const isLocationConstraint = (region: string): region is BucketLocationConstraint =>
  Object.values<string>(BucketLocationConstraint).includes(region);

export const bucketExists = (bucket: string) =>
  s3.make("head_bucket", { Bucket: bucket }).pipe(
    Effect.map(() => true),
    Effect.catchIf(
      e => e.is("NotFound") || e.is("NoSuchBucket"),
      () => Effect.succeed(false)
    )
  );

/**
 * Create the bucket unless it exists. us-east-1 takes no location constraint.
 */
export const ensureBucket = (bucket: string, region: string) =>
  Effect.gen(function* () {
    if (yield* bucketExists(bucket)) {
      yield* Effect.logDebug(`S3 bucket ${bucket} already exists`);
      return;
    }

    yield* Effect.logInfo(`Creating S3 bucket: ${bucket}`);
    yield* s3.make("create_bucket", {
      Bucket: bucket,
      ...(region !== "us-east-1" && isLocationConstraint(region)
        ? { CreateBucketConfiguration: { LocationConstraint: region } }
        : {}),
    });
  });

export const uploadObject = (bucket: string, key: string, body: Uint8Array) =>
  s3.make("put_object", { Bucket: bucket, Key: key, Body: body, ContentType: "application/zip" });
