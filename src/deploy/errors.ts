import * as Data from "effect/Data";

export type DeployStage = "archive" | "function" | "upload" | "code" | "configure";

export class DeployError extends Data.TaggedError("DeployError")<{
  stage: DeployStage;
  message: string;
}> {}
