#!/usr/bin/env node

import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Cause, Effect } from "effect";

import { deployCommand } from "./commands/deploy";
import { destroyCommand } from "./commands/destroy";
import { packageCommand } from "./commands/package";
import { StatusLoggerLive } from "./logger";

const mainCommand = Command.make("lambda-ops").pipe(
  Command.withSubcommands([packageCommand, deployCommand, destroyCommand]),
  Command.withDescription("Package, deploy and tear down an API Gateway backed Lambda service")
);

const cli = Command.run(mainCommand, {
  name: "lambda-ops",
  version: "0.1.0",
});

cli(process.argv).pipe(
  // Expected failures are logged where they happen
  Effect.tapDefect(cause => Effect.logError(Cause.pretty(cause))),
  Effect.provide(StatusLoggerLive),
  Effect.provide(NodeContext.layer),
  (program) => NodeRuntime.runMain(program, { disableErrorReporting: true, disablePrettyLogger: true })
);
