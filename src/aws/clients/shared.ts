import * as Data from "effect/Data";

/**
 * Input/output pair of a single AWS API operation.
 */
export type Operation<I, O> = {
  input: I;
  output: O;
};

/**
 * The slice of an AWS service client that lambda-ops calls, keyed by
 * snake_case operation name.
 */
export type ClientApi<Ops extends Record<string, Operation<unknown, unknown>>> = {
  readonly [K in keyof Ops]: (input: Ops[K]["input"]) => Promise<Ops[K]["output"]>;
};

export type AwsErrorProps = {
  operation: string;
  message: string;
  cause: unknown;
};

/**
 * AWS error code of a failed SDK call, e.g. "ResourceNotFoundException".
 */
export const awsErrorCode = (cause: unknown): string | undefined =>
  cause instanceof Error ? cause.name : undefined;

export const describeFailure = (operation: string, cause: unknown): string => {
  if (cause instanceof Error) {
    return `${operation} failed: ${cause.name}: ${cause.message}`;
  }
  return `${operation} failed: ${String(cause)}`;
};

export const AwsServiceError = <Tag extends string>(tag: Tag) =>
  class extends Data.TaggedError(tag)<AwsErrorProps> {
    is(code: string): boolean {
      return awsErrorCode(this.cause) === code;
    }
  };
