import { Context, Effect, Layer } from "effect";
import {
  S3,
  type S3ClientConfig,
  type CreateBucketCommandInput,
  type CreateBucketCommandOutput,
  type HeadBucketCommandInput,
  type HeadBucketCommandOutput,
  type PutObjectCommandInput,
  type PutObjectCommandOutput,
} from "@aws-sdk/client-s3";
import { AwsServiceError, describeFailure, type ClientApi } from "./shared";

export type S3Operations = {
  head_bucket: { input: HeadBucketCommandInput; output: HeadBucketCommandOutput };
  create_bucket: { input: CreateBucketCommandInput; output: CreateBucketCommandOutput };
  put_object: { input: PutObjectCommandInput; output: PutObjectCommandOutput };
};

export type S3Api = ClientApi<S3Operations>;

export class S3Error extends AwsServiceError("S3Error") {}

export class S3Client extends Context.Tag("S3Client")<S3Client, S3Api>() {
  static Default = (config: S3ClientConfig = {}) =>
    Layer.sync(S3Client, () => {
      const client = new S3(config);
      return {
        head_bucket: input => client.headBucket(input),
        create_bucket: input => client.createBucket(input),
        put_object: input => client.putObject(input),
      } satisfies S3Api;
    });
}

export const make = <K extends keyof S3Operations>(
  operation: K,
  input: S3Operations[K]["input"]
) =>
  Effect.flatMap(S3Client, api =>
    Effect.tryPromise({
      try: () => api[operation](input),
      catch: cause => new S3Error({ operation, message: describeFailure(operation, cause), cause }),
    })
  );
