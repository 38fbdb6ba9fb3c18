import { Options } from "@effect/cli";
import { Effect } from "effect";
import * as Config from "effect/Config";
import * as Data from "effect/Data";
import * as S from "effect/Schema";
import * as path from "path";
import * as fs from "fs";
import { pathToFileURL } from "url";
import * as esbuild from "esbuild";
import { DEFAULT_REGION, type LambdaOpsConfig } from "~/config";
import { isRuntime } from "~/aws/lambda";

export const CONFIG_FILE = "lambda-ops.config.ts";

export class ConfigError extends Data.TaggedError("ConfigError")<{
  message: string;
}> {}

const StringList = S.Array(S.String);

const ConfigSchema = S.Struct({
  teardown: S.optional(S.Struct({
    functionName: S.optional(S.String),
    roleName: S.optional(S.String),
    apiName: S.optional(S.String),
    region: S.optional(S.String),
    profile: S.optional(S.String),
    apiType: S.optional(S.Literal("rest", "http")),
    managedPolicyArns: S.optional(StringList),
    localFiles: S.optional(StringList),
    waitForDeletion: S.optional(S.Boolean),
  })),
  package: S.optional(S.Struct({
    sources: S.optional(StringList),
    requiredArtifacts: S.optional(StringList),
    scratchDir: S.optional(S.String),
    output: S.optional(S.String),
    dependencyList: S.optional(S.String),
    arch: S.optional(S.Literal("x64", "arm64")),
  })),
  deploy: S.optional(S.Struct({
    functionName: S.optional(S.String),
    archive: S.optional(S.String),
    region: S.optional(S.String),
    profile: S.optional(S.String),
    handler: S.optional(S.String),
    runtime: S.optional(S.String.pipe(S.filter(isRuntime, { message: () => "unknown Lambda runtime" }))),
    timeout: S.optional(S.Int.pipe(S.between(1, 900))),
    memorySize: S.optional(S.Int.pipe(S.between(128, 10240))),
    environment: S.optional(S.Record({ key: S.String, value: S.String })),
    bucket: S.optional(S.String),
    s3Key: S.optional(S.String),
    directUploadLimit: S.optional(S.Int.pipe(S.positive())),
  })),
});

export const decodeConfig = (value: unknown, source: string) =>
  S.decodeUnknown(ConfigSchema)(value).pipe(
    Effect.map((config): LambdaOpsConfig => config),
    Effect.mapError(e => new ConfigError({ message: `Invalid config in ${source}: ${e.message}` }))
  );

const importConfigModule = async (configPath: string): Promise<unknown> => {
  const result = await esbuild.build({
    entryPoints: [configPath],
    bundle: true,
    write: false,
    format: "esm",
    platform: "node",
    external: ["lambda-ops"],
  });

  const output = result.outputFiles?.[0];
  if (!output) {
    return undefined;
  }
  const tempFile = path.join(path.dirname(configPath), ".lambda-ops-config.mjs");
  fs.writeFileSync(tempFile, output.text);

  try {
    const mod: { default?: unknown } = await import(pathToFileURL(tempFile).href);
    return mod.default;
  } finally {
    fs.unlinkSync(tempFile);
  }
};

/**
 * Load `lambda-ops.config.ts` (or an explicit file). A missing default
 * config is not an error; a missing explicit one is.
 */
export const loadConfig = (explicitPath?: string): Effect.Effect<LambdaOpsConfig, ConfigError> =>
  Effect.gen(function* () {
    const configPath = path.resolve(process.cwd(), explicitPath ?? CONFIG_FILE);

    if (!fs.existsSync(configPath)) {
      if (explicitPath) {
        return yield* Effect.fail(new ConfigError({ message: `Config file not found: ${explicitPath}` }));
      }
      const empty: LambdaOpsConfig = {};
      return empty;
    }

    const value = yield* Effect.tryPromise({
      try: () => importConfigModule(configPath),
      catch: error => new ConfigError({ message: `Cannot load ${configPath}: ${error}` })
    });

    if (value === undefined) {
      return yield* Effect.fail(new ConfigError({ message: `${configPath} has no default export` }));
    }

    return yield* decodeConfig(value, configPath);
  });

/**
 * Region from the environment, the way the AWS CLI picks it up.
 */
export const environmentRegion = Config.string("AWS_REGION").pipe(
  Config.orElse(() => Config.string("AWS_DEFAULT_REGION")),
  Config.withDefault(DEFAULT_REGION)
);

export const configOption = Options.text("config").pipe(
  Options.withAlias("c"),
  Options.withDescription(`Config file (default: ${CONFIG_FILE})`),
  Options.optional
);

export const regionOption = Options.text("region").pipe(
  Options.withAlias("r"),
  Options.withDescription("AWS region (or 'region' in the config file, AWS_REGION)"),
  Options.optional
);

export const profileOption = Options.text("profile").pipe(
  Options.withDescription("AWS credentials profile"),
  Options.optional
);

export const verboseOption = Options.boolean("verbose").pipe(
  Options.withAlias("v"),
  Options.withDescription("Enable verbose logging")
);
