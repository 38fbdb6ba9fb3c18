import { Command, Options } from "@effect/cli";
import { Effect, Logger, LogLevel, Option } from "effect";

import { resolveDeployTarget, type DeployConfig } from "~/config";
import { makeClients } from "~/aws";
import { deploy } from "~/deploy/deploy";
import { loadConfig, configOption, regionOption, profileOption, verboseOption, environmentRegion } from "../config";
import { CommandFailed } from "../errors";

const functionOption = Options.text("function").pipe(
  Options.withAlias("f"),
  Options.withDescription("Lambda function name"),
  Options.optional
);

const archiveOption = Options.text("archive").pipe(
  Options.withAlias("a"),
  Options.withDescription("Deployment archive (default: deployment.zip)"),
  Options.optional
);

const bucketOption = Options.text("bucket").pipe(
  Options.withDescription("S3 bucket for archives above the direct upload limit"),
  Options.optional
);

export const deployCommand = Command.make(
  "deploy",
  {
    config: configOption,
    functionName: functionOption,
    archive: archiveOption,
    bucket: bucketOption,
    region: regionOption,
    profile: profileOption,
    verbose: verboseOption,
  },
  (opts) =>
    Effect.gen(function* () {
      const config = yield* loadConfig(Option.getOrUndefined(opts.config));
      const fileConfig: DeployConfig = config.deploy ?? {};

      const overrides: DeployConfig = {
        ...fileConfig,
        functionName: Option.getOrUndefined(opts.functionName) ?? fileConfig.functionName,
        archive: Option.getOrUndefined(opts.archive) ?? fileConfig.archive,
        bucket: Option.getOrUndefined(opts.bucket) ?? fileConfig.bucket,
        region: Option.getOrUndefined(opts.region) ?? fileConfig.region,
        profile: Option.getOrUndefined(opts.profile) ?? fileConfig.profile,
      };
      const target = resolveDeployTarget(overrides, yield* Effect.orDie(environmentRegion));

      const logLevel = opts.verbose ? LogLevel.Debug : LogLevel.Info;

      yield* deploy(target, { cwd: process.cwd() }).pipe(
        Effect.provide(makeClients({ region: target.region, profile: target.profile })),
        Logger.withMinimumLogLevel(logLevel)
      );
    }).pipe(
      Effect.catchTags({
        ConfigError: error => Effect.logError(error.message).pipe(Effect.zipRight(Effect.fail(new CommandFailed({ message: error.message })))),
        PreflightError: error => Effect.logError(error.message).pipe(Effect.zipRight(Effect.fail(new CommandFailed({ message: error.message })))),
        DeployError: error => Effect.logError(error.message).pipe(Effect.zipRight(Effect.fail(new CommandFailed({ message: error.message })))),
      })
    )
).pipe(Command.withDescription("Upload the deployment archive to an existing Lambda function and apply its configuration"));
