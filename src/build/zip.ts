import { Effect } from "effect";
import archiver from "archiver";

// Fixed date for deterministic zip (same content = same hash)
const FIXED_DATE = new Date(0);

/**
 * Zip a directory with its contents at the archive root.
 */
export const zipDirectory = (directory: string) =>
  Effect.async<Buffer, Error>((resume) => {
    const chunks: Buffer[] = [];
    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("data", (chunk: Buffer) => chunks.push(chunk));
    archive.on("end", () => resume(Effect.succeed(Buffer.concat(chunks))));
    archive.on("error", (err) => resume(Effect.fail(err)));

    archive.directory(directory, false, { date: FIXED_DATE });
    void archive.finalize();
  });
