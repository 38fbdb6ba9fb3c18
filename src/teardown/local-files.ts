import { Effect } from "effect";
import * as fs from "fs/promises";
import * as path from "path";
import { logSuccess } from "~/logging";

const exists = (target: string) =>
  Effect.promise(() =>
    fs.stat(target).then(
      () => true,
      () => false
    )
  );

/**
 * Remove generated local artifacts. Paths that do not exist are skipped.
 * Returns the paths that were removed.
 */
export const cleanupLocalFiles = (paths: ReadonlyArray<string>, cwd: string) =>
  Effect.gen(function* () {
    yield* Effect.logInfo("Cleaning up local deployment files...");

    const removed: string[] = [];

    for (const relative of paths) {
      const absolute = path.resolve(cwd, relative);
      if (!(yield* exists(absolute))) continue;

      yield* Effect.tryPromise({
        try: () => fs.rm(absolute, { recursive: true, force: true }),
        catch: error => new Error(`Cannot remove ${relative}: ${error}`)
      }).pipe(
        Effect.tap(() => logSuccess(`Removed ${relative}`)),
        Effect.tap(() => Effect.sync(() => removed.push(relative))),
        Effect.catchAll(error => Effect.logWarning(error.message))
      );
    }

    return removed;
  });
