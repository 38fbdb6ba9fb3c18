import { Command, Options } from "@effect/cli";
import { Effect, Logger, LogLevel, Option } from "effect";

import { resolvePackageConfig, type PackageConfig } from "~/config";
import { createDeploymentPackage } from "~/build/package";
import { Installer } from "~/build/installer";
import { loadConfig, configOption, verboseOption } from "../config";
import { CommandFailed } from "../errors";

const outputOption = Options.text("output").pipe(
  Options.withAlias("o"),
  Options.withDescription("Archive path (default: deployment.zip)"),
  Options.optional
);

const archOption = Options.choice("arch", ["x64", "arm64"] as const).pipe(
  Options.withDescription("Lambda architecture to install dependencies for"),
  Options.optional
);

export const packageCommand = Command.make(
  "package",
  { config: configOption, output: outputOption, arch: archOption, verbose: verboseOption },
  (opts) =>
    Effect.gen(function* () {
      const config = yield* loadConfig(Option.getOrUndefined(opts.config));
      const fileConfig: PackageConfig = config.package ?? {};

      const packageConfig = resolvePackageConfig(process.cwd(), {
        ...fileConfig,
        output: Option.getOrUndefined(opts.output) ?? fileConfig.output,
        arch: Option.getOrUndefined(opts.arch) ?? fileConfig.arch,
      });

      if (packageConfig.sources.length === 0) {
        yield* Effect.logWarning("No sources configured; the archive will only contain dependencies");
      }

      const logLevel = opts.verbose ? LogLevel.Debug : LogLevel.Info;

      yield* createDeploymentPackage(packageConfig).pipe(
        Effect.provide(Installer.Npm),
        Logger.withMinimumLogLevel(logLevel)
      );
    }).pipe(
      Effect.catchTags({
        ConfigError: error => Effect.logError(error.message).pipe(Effect.zipRight(Effect.fail(new CommandFailed({ message: error.message })))),
        PackagingError: error => Effect.logError(error.message).pipe(Effect.zipRight(Effect.fail(new CommandFailed({ message: error.message })))),
      })
    )
).pipe(Command.withDescription("Build a Lambda deployment archive with dependencies and sources at its root"));
