import { Effect } from "effect";
import * as S from "effect/Schema";
import * as fs from "fs/promises";
import * as path from "path";
import { globSync } from "glob";
import type { ResolvedPackageConfig } from "~/config";
import { logSuccess } from "~/logging";
import { PackagingError, type PackagingStage } from "./errors";
import { Installer } from "./installer";
import { zipDirectory } from "./zip";

const Manifest = S.Struct({
  dependencies: S.optional(S.Record({ key: S.String, value: S.String })),
});

const Lockfile = S.Struct({
  packages: S.optional(S.Record({
    key: S.String,
    value: S.Struct({ version: S.optional(S.String) }),
  })),
});

export type ResolvedDependency = {
  name: string;
  version: string;
};

export type PackageResult = {
  archivePath: string;
  sizeBytes: number;
  dependencies: ResolvedDependency[];
};

const attempt = <A>(stage: PackagingStage, what: string, run: () => Promise<A>) =>
  Effect.tryPromise({
    try: run,
    catch: error => new PackagingError({ stage, message: `${what}: ${error instanceof Error ? error.message : String(error)}` })
  });

const pathExists = (target: string) =>
  Effect.promise(() =>
    fs.stat(target).then(
      () => true,
      () => false
    )
  );

/**
 * Read production dependencies from package.json
 */
export const readProductionDependencies = (projectDir: string) =>
  Effect.gen(function* () {
    const pkgPath = path.join(projectDir, "package.json");
    const content = yield* attempt("prepare", `Cannot read package.json at ${pkgPath}`, () => fs.readFile(pkgPath, "utf-8"));
    const manifest = yield* S.decodeUnknown(S.parseJson(Manifest))(content).pipe(
      Effect.mapError(e => new PackagingError({ stage: "prepare", message: `Invalid package.json at ${pkgPath}: ${e.message}` }))
    );
    return manifest.dependencies ?? {};
  });

/**
 * Pin each dependency to the version in package-lock.json when one exists,
 * otherwise keep the declared range.
 */
export const resolveDependencyVersions = (projectDir: string, declared: Record<string, string>) =>
  Effect.gen(function* () {
    const lockPath = path.join(projectDir, "package-lock.json");
    const locked: Record<string, string> = {};

    if (yield* pathExists(lockPath)) {
      const content = yield* attempt("prepare", `Cannot read ${lockPath}`, () => fs.readFile(lockPath, "utf-8"));
      const lockfile = yield* S.decodeUnknown(S.parseJson(Lockfile))(content).pipe(
        Effect.catchAll(e =>
          Effect.logWarning(`Ignoring unreadable package-lock.json: ${e.message}`).pipe(Effect.as({ packages: undefined }))
        )
      );
      for (const [key, entry] of Object.entries(lockfile.packages ?? {})) {
        if (key.startsWith("node_modules/") && entry.version) {
          locked[key.slice("node_modules/".length)] = entry.version;
        }
      }
    }

    return Object.keys(declared)
      .sort()
      .map((name): ResolvedDependency => ({ name, version: locked[name] ?? declared[name] ?? "*" }));
  });

export const formatDependencyList = (dependencies: ReadonlyArray<ResolvedDependency>): string =>
  dependencies.map(d => `${d.name}@${d.version}\n`).join("");

/**
 * Patterns with no match among the installed files.
 */
export const findMissingArtifacts = (directory: string, patterns: ReadonlyArray<string>): string[] =>
  patterns.filter(pattern => globSync(pattern, { cwd: directory, nodir: true, dot: true }).length === 0);

const prepareScratchDir = (config: ResolvedPackageConfig, scratchDir: string) =>
  Effect.gen(function* () {
    yield* attempt("prepare", `Cannot reset ${scratchDir}`, async () => {
      await fs.rm(scratchDir, { recursive: true, force: true });
      await fs.mkdir(scratchDir, { recursive: true });
    });

    const declared = yield* readProductionDependencies(config.projectDir);
    const dependencies = yield* resolveDependencyVersions(config.projectDir, declared);

    yield* attempt("prepare", "Cannot write install manifest", () =>
      fs.writeFile(
        path.join(scratchDir, "package.json"),
        JSON.stringify({ name: "lambda-package", private: true, dependencies: declared }, null, 2)
      )
    );

    const lockPath = path.join(config.projectDir, "package-lock.json");
    if (yield* pathExists(lockPath)) {
      yield* attempt("prepare", "Cannot copy package-lock.json", () =>
        fs.copyFile(lockPath, path.join(scratchDir, "package-lock.json"))
      );
    }

    const listPath = path.resolve(config.projectDir, config.dependencyList);
    yield* attempt("prepare", `Cannot write ${listPath}`, () =>
      fs.writeFile(listPath, formatDependencyList(dependencies))
    );
    yield* Effect.logInfo(`Wrote ${dependencies.length} dependencies to ${config.dependencyList}`);

    return dependencies;
  });

/**
 * True when `target` lies below `directory`, never `directory` itself.
 */
export const isStrictlyInside = (directory: string, target: string): boolean => {
  const relative = path.relative(directory, target);
  return relative !== "" && relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
};

const copySources = (config: ResolvedPackageConfig, scratchDir: string) =>
  Effect.gen(function* () {
    for (const source of config.sources) {
      const from = path.resolve(config.projectDir, source);
      const to = path.join(scratchDir, path.basename(from));

      if (!isStrictlyInside(scratchDir, to)) {
        return yield* Effect.fail(new PackagingError({ stage: "copy", message: `Source cannot be placed at the archive root: ${source}` }));
      }

      if (from === scratchDir || isStrictlyInside(from, scratchDir)) {
        return yield* Effect.fail(new PackagingError({ stage: "copy", message: `Source contains the scratch directory: ${source}` }));
      }

      if (!(yield* pathExists(from))) {
        return yield* Effect.fail(new PackagingError({ stage: "copy", message: `Source not found: ${source}` }));
      }

      yield* attempt("copy", `Cannot copy ${source}`, () => fs.cp(from, to, { recursive: true }));
      yield* Effect.logDebug(`Copied ${source} to ${path.basename(from)}`);
    }
  });

export const removeScratchDir = (scratchDir: string) =>
  Effect.tryPromise(() => fs.rm(scratchDir, { recursive: true, force: true })).pipe(
    Effect.catchAll(error => Effect.logWarning(`Could not remove ${scratchDir}: ${error.message}`))
  );

const assemble = (config: ResolvedPackageConfig, scratchDir: string) =>
  Effect.gen(function* () {
    const installer = yield* Installer;
    const archivePath = path.resolve(config.projectDir, config.output);

    yield* Effect.logInfo(`Creating deployment package in ${config.scratchDir}...`);

    const dependencies = yield* prepareScratchDir(config, scratchDir);

    if (dependencies.length > 0) {
      yield* Effect.logInfo(`Installing dependencies for linux/${config.arch}...`);
      yield* installer.install({ directory: scratchDir, platform: { os: "linux", cpu: config.arch } });
    } else {
      yield* Effect.logInfo("No production dependencies, skipping install");
    }

    if (config.requiredArtifacts.length > 0) {
      yield* Effect.logInfo("Checking for native libraries...");
      const missing = findMissingArtifacts(scratchDir, config.requiredArtifacts);
      if (missing.length > 0) {
        return yield* Effect.fail(new PackagingError({
          stage: "verify",
          message: `Required artifact missing after install: ${missing.join(", ")}`
        }));
      }
      yield* logSuccess("Native libraries found");
    }

    yield* Effect.logInfo("Adding source files to package directory...");
    yield* copySources(config, scratchDir);

    yield* Effect.logInfo("Creating zip file with dependencies at root...");
    const archive = yield* zipDirectory(scratchDir).pipe(
      Effect.mapError(e => new PackagingError({ stage: "archive", message: `Cannot create archive: ${e.message}` }))
    );
    yield* attempt("archive", `Cannot write ${archivePath}`, () => fs.writeFile(archivePath, archive));

    yield* logSuccess(`Deployment package created: ${config.output}`);
    yield* Effect.logInfo(`Package size: ${(archive.length / 1024 / 1024).toFixed(2)} MB`);

    return { archivePath, sizeBytes: archive.length, dependencies } satisfies PackageResult;
  });

/**
 * Assemble dependencies and sources in a scratch directory and zip it so
 * every entry sits at the archive root.
 */
export const createDeploymentPackage = (config: ResolvedPackageConfig) =>
  Effect.gen(function* () {
    const scratchDir = path.resolve(config.projectDir, config.scratchDir);

    // the scratch directory is wiped before and after the build
    if (!isStrictlyInside(config.projectDir, scratchDir)) {
      return yield* Effect.fail(new PackagingError({
        stage: "prepare",
        message: `Scratch directory must be inside the project directory: ${config.scratchDir}`
      }));
    }

    return yield* assemble(config, scratchDir).pipe(Effect.ensuring(removeScratchDir(scratchDir)));
  });
