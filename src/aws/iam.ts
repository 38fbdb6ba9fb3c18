import { Effect } from "effect";
import { iam } from "./clients";

export const getRole = (roleName: string) =>
  iam.make("get_role", { RoleName: roleName }).pipe(
    Effect.map(r => r.Role),
    Effect.catchIf(
      e => e.is("NoSuchEntityException"),
      () => Effect.succeed(undefined)
    )
  );

/**
 * Detach each managed policy, ignoring the ones that were never attached.
 */
export const detachManagedPolicies = (roleName: string, policyArns: ReadonlyArray<string>) =>
  Effect.gen(function* () {
    for (const policyArn of policyArns) {
      yield* iam.make("detach_role_policy", {
        RoleName: roleName,
        PolicyArn: policyArn
      }).pipe(
        Effect.tap(() => Effect.logDebug(`Detached ${policyArn}`)),
        Effect.catchAll(error =>
          Effect.logDebug(`Policy ${policyArn} not detached: ${error.message}`)
        )
      );
    }
  });

export const deleteRole = (roleName: string) =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Deleting IAM role: ${roleName}`);
    yield* iam.make("delete_role", { RoleName: roleName });
  });
