import * as Data from "effect/Data";

export type PackagingStage = "prepare" | "install" | "verify" | "copy" | "archive";

export class PackagingError extends Data.TaggedError("PackagingError")<{
  stage: PackagingStage;
  message: string;
}> {}
