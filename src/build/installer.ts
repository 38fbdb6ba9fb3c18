import { Context, Effect, Layer } from "effect";
import { execFileSync } from "child_process";
import type { TargetArch } from "~/config";
import { PackagingError } from "./errors";

export type TargetPlatform = {
  os: "linux";
  cpu: TargetArch;
};

export type InstallRequest = {
  /** Directory holding the package.json to install. */
  directory: string;
  platform: TargetPlatform;
};

/**
 * Installs production dependencies into a directory for a target platform.
 */
export class Installer extends Context.Tag("Installer")<Installer, {
  readonly install: (request: InstallRequest) => Effect.Effect<void, PackagingError>;
}>() {
  static Npm = Layer.succeed(Installer, {
    install: (request: InstallRequest) =>
      Effect.gen(function* () {
        const args = npmInstallArgs(request.platform);
        yield* Effect.logDebug(`npm ${args.join(" ")}`);
        yield* Effect.try({
          try: () => execFileSync(npmCommand(), args, { cwd: request.directory, stdio: "inherit" }),
          catch: error => new PackagingError({ stage: "install", message: `npm install failed: ${error}` })
        });
      })
  });
}

const npmCommand = () => (process.platform === "win32" ? "npm.cmd" : "npm");

/**
 * Install scripts are disabled so nothing is compiled for the build host:
 * packages with native code must ship a prebuilt binary for the target.
 */
export const npmInstallArgs = (platform: TargetPlatform): string[] => [
  "install",
  "--omit=dev",
  "--ignore-scripts",
  "--no-audit",
  "--no-fund",
  `--os=${platform.os}`,
  `--cpu=${platform.cpu}`,
];
