import type { Runtime } from "@aws-sdk/client-lambda";

/**
 * Configuration for lambda-ops.
 *
 * @example
 * ```typescript
 * // lambda-ops.config.ts
 * import { defineConfig } from "lambda-ops";
 *
 * export default defineConfig({
 *   teardown: {
 *     functionName: "orders-api",
 *     roleName: "orders-api-role",
 *     apiName: "orders-api-gateway",
 *     region: "eu-west-1",
 *   },
 *   package: {
 *     sources: ["handler.mjs", "lib", "resources"],
 *     requiredArtifacts: ["node_modules/@img/sharp-linux-x64/**\/*.node"],
 *   },
 * });
 * ```
 */
export type LambdaOpsConfig = {
  teardown?: TeardownConfig;
  package?: PackageConfig;
  deploy?: DeployConfig;
};

export type ApiType = "rest" | "http";

export type TargetArch = "x64" | "arm64";

export type TeardownConfig = {
  /**
   * Name of the Lambda function.
   * @default "mcp-server"
   */
  functionName?: string;

  /**
   * Name of the function's IAM execution role.
   * @default "mcp-server-role"
   */
  roleName?: string;

  /**
   * Name of the API Gateway that invokes the function.
   * @default "mcp-server-api"
   */
  apiName?: string;

  /**
   * AWS region. Falls back to `AWS_REGION`, then "eu-central-1".
   */
  region?: string;

  /**
   * Named credentials profile from the shared AWS config files.
   */
  profile?: string;

  /**
   * "rest" for an API Gateway REST API, "http" for an HTTP API.
   * @default "rest"
   */
  apiType?: ApiType;

  /**
   * Managed policies detached from the role before it is deleted.
   * @default AWSLambdaBasicExecutionRole and AmazonS3ReadOnlyAccess
   */
  managedPolicyArns?: ReadonlyArray<string>;

  /**
   * Local files and directories removed after the AWS resources,
   * relative to the working directory.
   * @default ["deployment.zip", "test-payload.json", "response.json", "package"]
   */
  localFiles?: ReadonlyArray<string>;

  /**
   * Poll until the function is gone before deleting its log group and role.
   * @default false
   */
  waitForDeletion?: boolean;
};

export type PackageConfig = {
  /**
   * Files and directories copied into the archive root, relative to the
   * project directory.
   */
  sources?: ReadonlyArray<string>;

  /**
   * Glob patterns, relative to the scratch directory, that must match at
   * least one file once dependencies are installed.
   */
  requiredArtifacts?: ReadonlyArray<string>;

  /**
   * Transient directory the bundle is assembled in.
   * @default "package"
   */
  scratchDir?: string;

  /**
   * Archive path.
   * @default "deployment.zip"
   */
  output?: string;

  /**
   * Plain-text list of resolved production dependencies.
   * @default "dependencies.txt"
   */
  dependencyList?: string;

  /**
   * Lambda architecture the dependencies are installed for.
   * @default "x64"
   */
  arch?: TargetArch;
};

export type DeployConfig = {
  /**
   * Name of the existing Lambda function that receives the code.
   * @default "mcp-server"
   */
  functionName?: string;

  /**
   * Archive uploaded as the function code, relative to the working directory.
   * @default "deployment.zip"
   */
  archive?: string;

  /**
   * AWS region. Falls back to `AWS_REGION`, then "eu-central-1".
   */
  region?: string;

  /**
   * Named credentials profile from the shared AWS config files.
   */
  profile?: string;

  /** Handler entry point, e.g. "handler.handler". */
  handler?: string;

  /** Lambda runtime identifier, e.g. "nodejs20.x". */
  runtime?: Runtime;

  /** Timeout in seconds. */
  timeout?: number;

  /** Memory in MB. */
  memorySize?: number;

  /** Environment variables. Replaces the function's current set. */
  environment?: Readonly<Record<string, string>>;

  /**
   * Bucket used when the archive is too large for a direct upload.
   * Created when missing.
   * @default "<functionName>-deployments-<region>"
   */
  bucket?: string;

  /**
   * Object key of the staged archive.
   * @default "lambda-deployments/<functionName>.zip"
   */
  s3Key?: string;

  /**
   * Largest archive, in bytes, sent inline with UpdateFunctionCode.
   * @default 52428800
   */
  directUploadLimit?: number;
};

/**
 * Helper function for type-safe configuration.
 * Returns the config object as-is, but provides TypeScript autocompletion.
 */
export const defineConfig = (config: LambdaOpsConfig): LambdaOpsConfig => config;

export const DEFAULT_REGION = "eu-central-1";

export const DEFAULT_MANAGED_POLICY_ARNS: ReadonlyArray<string> = [
  "arn:aws:iam::aws:policy/service-role/AWSLambdaBasicExecutionRole",
  "arn:aws:iam::aws:policy/AmazonS3ReadOnlyAccess",
];

export const DEFAULT_LOCAL_FILES: ReadonlyArray<string> = [
  "deployment.zip",
  "test-payload.json",
  "response.json",
  "package",
];

/**
 * Fully resolved set of resources one teardown run acts on.
 */
export type TeardownTarget = {
  functionName: string;
  roleName: string;
  apiName: string;
  region: string;
  profile: string | undefined;
  apiType: ApiType;
  managedPolicyArns: ReadonlyArray<string>;
  localFiles: ReadonlyArray<string>;
  waitForDeletion: boolean;
};

export const resolveTeardownTarget = (
  config: TeardownConfig = {},
  fallbackRegion: string = DEFAULT_REGION
): TeardownTarget => ({
  functionName: config.functionName ?? "mcp-server",
  roleName: config.roleName ?? "mcp-server-role",
  apiName: config.apiName ?? "mcp-server-api",
  region: config.region ?? fallbackRegion,
  profile: config.profile,
  apiType: config.apiType ?? "rest",
  managedPolicyArns: config.managedPolicyArns ?? DEFAULT_MANAGED_POLICY_ARNS,
  localFiles: config.localFiles ?? DEFAULT_LOCAL_FILES,
  waitForDeletion: config.waitForDeletion ?? false,
});

export type ResolvedPackageConfig = {
  projectDir: string;
  sources: ReadonlyArray<string>;
  requiredArtifacts: ReadonlyArray<string>;
  scratchDir: string;
  output: string;
  dependencyList: string;
  arch: TargetArch;
};

export const resolvePackageConfig = (
  projectDir: string,
  config: PackageConfig = {}
): ResolvedPackageConfig => ({
  projectDir,
  sources: config.sources ?? [],
  requiredArtifacts: config.requiredArtifacts ?? [],
  scratchDir: config.scratchDir ?? "package",
  output: config.output ?? "deployment.zip",
  dependencyList: config.dependencyList ?? "dependencies.txt",
  arch: config.arch ?? "x64",
});

export const DIRECT_UPLOAD_LIMIT = 50 * 1024 * 1024;

/**
 * Settings pushed with UpdateFunctionConfiguration. Unset fields keep their
 * current value.
 */
export type FunctionSettings = Pick<DeployConfig, "handler" | "runtime" | "timeout" | "memorySize" | "environment">;

export type DeployTarget = {
  functionName: string;
  archive: string;
  region: string;
  profile: string | undefined;
  settings: FunctionSettings;
  bucket: string;
  s3Key: string;
  directUploadLimit: number;
};

export const resolveDeployTarget = (
  config: DeployConfig = {},
  fallbackRegion: string = DEFAULT_REGION
): DeployTarget => {
  const functionName = config.functionName ?? "mcp-server";
  const region = config.region ?? fallbackRegion;
  return {
    functionName,
    archive: config.archive ?? "deployment.zip",
    region,
    profile: config.profile,
    settings: {
      handler: config.handler,
      runtime: config.runtime,
      timeout: config.timeout,
      memorySize: config.memorySize,
      environment: config.environment,
    },
    bucket: config.bucket ?? `${functionName}-deployments-${region}`,
    s3Key: config.s3Key ?? `lambda-deployments/${functionName}.zip`,
    directUploadLimit: config.directUploadLimit ?? DIRECT_UPLOAD_LIMIT,
  };
};
