import { Command, Options } from "@effect/cli";
import { Effect, Layer, Logger, LogLevel, Option } from "effect";
import type * as Terminal from "@effect/platform/Terminal";

import { resolveTeardownTarget, type TeardownConfig } from "~/config";
import { makeClients } from "~/aws";
import { Confirmation } from "~/teardown/confirm";
import { teardown } from "~/teardown/teardown";
import { loadConfig, configOption, regionOption, profileOption, verboseOption, environmentRegion } from "../config";
import { CommandFailed } from "../errors";

const functionOption = Options.text("function").pipe(
  Options.withAlias("f"),
  Options.withDescription("Lambda function name"),
  Options.optional
);

const roleOption = Options.text("role").pipe(
  Options.withDescription("IAM execution role name"),
  Options.optional
);

const apiOption = Options.text("api").pipe(
  Options.withDescription("API Gateway name"),
  Options.optional
);

const apiTypeOption = Options.choice("api-type", ["rest", "http"] as const).pipe(
  Options.withDescription("API Gateway flavour: REST API or HTTP API"),
  Options.optional
);

const yesOption = Options.boolean("yes").pipe(
  Options.withAlias("y"),
  Options.withDescription("Do not ask for confirmation")
);

const waitOption = Options.boolean("wait").pipe(
  Options.withDescription("Wait until the function is gone before deleting its logs and role")
);

const keepLocalOption = Options.boolean("keep-local").pipe(
  Options.withDescription("Keep local deployment files")
);

export const destroyCommand = Command.make(
  "destroy",
  {
    config: configOption,
    functionName: functionOption,
    role: roleOption,
    api: apiOption,
    apiType: apiTypeOption,
    region: regionOption,
    profile: profileOption,
    yes: yesOption,
    wait: waitOption,
    keepLocal: keepLocalOption,
    verbose: verboseOption,
  },
  (opts) =>
    Effect.gen(function* () {
      const config = yield* loadConfig(Option.getOrUndefined(opts.config));
      const fileConfig: TeardownConfig = config.teardown ?? {};

      const overrides: TeardownConfig = {
        ...fileConfig,
        functionName: Option.getOrUndefined(opts.functionName) ?? fileConfig.functionName,
        roleName: Option.getOrUndefined(opts.role) ?? fileConfig.roleName,
        apiName: Option.getOrUndefined(opts.api) ?? fileConfig.apiName,
        apiType: Option.getOrUndefined(opts.apiType) ?? fileConfig.apiType,
        region: Option.getOrUndefined(opts.region) ?? fileConfig.region,
        profile: Option.getOrUndefined(opts.profile) ?? fileConfig.profile,
        waitForDeletion: opts.wait || fileConfig.waitForDeletion,
      };
      const target = resolveTeardownTarget(overrides, yield* Effect.orDie(environmentRegion));

      const clientsLayer = makeClients({ region: target.region, profile: target.profile });
      const confirmationLayer: Layer.Layer<Confirmation, never, Terminal.Terminal> = opts.yes ? Confirmation.AlwaysYes : Confirmation.Terminal;
      const logLevel = opts.verbose ? LogLevel.Debug : LogLevel.Info;

      const report = yield* teardown(target, { cwd: process.cwd(), keepLocalFiles: opts.keepLocal }).pipe(
        Effect.provide(clientsLayer),
        Effect.provide(confirmationLayer),
        Logger.withMinimumLogLevel(logLevel)
      );

      if (report.status === "failed") {
        return yield* Effect.fail(new CommandFailed({ message: "Teardown failed" }));
      }
    }).pipe(
      Effect.catchTags({
        ConfigError: error => Effect.logError(error.message).pipe(Effect.zipRight(Effect.fail(new CommandFailed({ message: error.message })))),
        PreflightError: error => Effect.logError(error.message).pipe(Effect.zipRight(Effect.fail(new CommandFailed({ message: error.message })))),
      })
    )
).pipe(Command.withDescription("Delete the Lambda function, API Gateway, IAM role, permissions and logs of a service"));
