import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { Effect, Either, Layer } from "effect"
import * as fs from "fs/promises"
import * as os from "os"
import * as path from "path"

import { resolveTeardownTarget, type TeardownConfig } from "~/config"
import { teardown, type TeardownOptions } from "~/teardown/teardown"
import { Confirmation, CONFIRMATION_QUESTION } from "~/teardown/confirm"
import { FakeCloud } from "./helpers/fake-cloud"
import { captureLogs } from "./helpers/capture-logs"

const BASIC_EXECUTION = "arn:aws:iam::aws:policy/service-role/AWSLambdaBasicExecutionRole"
const S3_READ_ONLY = "arn:aws:iam::aws:policy/AmazonS3ReadOnlyAccess"

const replying = (reply: string, questions: string[] = []) =>
  Layer.succeed(Confirmation, {
    ask: (question: string) => Effect.sync(() => {
      questions.push(question)
      return reply
    })
  })

const deployFullStack = (cloud: FakeCloud) => {
  cloud.addFunction("mcp-server", [
    { Sid: "apigw-invoke", Principal: { Service: "apigateway.amazonaws.com" } },
  ])
  cloud.restApis.push({ id: "api-1", name: "mcp-server-api" })
  cloud.addRole("mcp-server-role", [BASIC_EXECUTION, S3_READ_ONLY])
}

describe("teardown", () => {
  let cloud: FakeCloud
  let logs: ReturnType<typeof captureLogs>
  let cwd: string

  beforeEach(async () => {
    cloud = new FakeCloud()
    logs = captureLogs()
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "lambda-ops-teardown-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  const run = (
    confirmation: Layer.Layer<Confirmation>,
    config: TeardownConfig = {},
    options: Partial<TeardownOptions> = {}
  ) =>
    Effect.runPromise(
      Effect.either(teardown(resolveTeardownTarget(config), { cwd, ...options })).pipe(
        Effect.provide(cloud.layer),
        Effect.provide(confirmation),
        Effect.provide(logs.layer)
      )
    )

  const runConfirmed = async (config: TeardownConfig = {}, options: Partial<TeardownOptions> = {}) => {
    const result = await run(Confirmation.AlwaysYes, config, options)
    if (Either.isLeft(result)) throw new Error(`teardown failed: ${result.left.message}`)
    return result.right
  }

  describe("a fully deployed service", () => {

    it("should delete every resource in dependency order", async () => {
      deployFullStack(cloud)

      const report = await runConfirmed()

      expect(report.status).toBe("success")
      expect(cloud.mutations()).toEqual([
        "remove_permission:apigw-invoke",
        "delete_rest_api:api-1",
        "delete_function:mcp-server",
        "delete_log_group:/aws/lambda/mcp-server",
        `detach_role_policy:${BASIC_EXECUTION}`,
        `detach_role_policy:${S3_READ_ONLY}`,
        "delete_role:mcp-server-role",
      ])
      expect(cloud.functions.size).toBe(0)
      expect(cloud.restApis).toEqual([])
      expect(cloud.logGroups.size).toBe(0)
      expect(cloud.roles.size).toBe(0)
    })

    it("should report every step as successful", async () => {
      deployFullStack(cloud)

      const report = await runConfirmed()

      expect(report.status === "cancelled" ? [] : report.outcomes.map(o => [o.step, o.status])).toEqual([
        ["permissions", "success"],
        ["api-gateway", "success"],
        ["lambda", "success"],
        ["log-group", "success"],
        ["iam-role", "success"],
      ])
      expect(logs.lines).toContain("[SUCCESS] Resource destruction completed!")
      expect(logs.lines).toContain("[SUCCESS] All AWS resources have been successfully removed.")
      expect(logs.lines).toContain("[INFO]   ✓ Lambda function: mcp-server")
    })

  })

  describe("a fresh account", () => {

    it("should find nothing and still complete", async () => {
      const report = await runConfirmed()

      expect(report.status).toBe("success")
      expect(cloud.mutations()).toEqual([])
      expect(logs.lines.filter(line => line.startsWith("[INFO] No "))).toEqual([
        "[INFO] No Lambda permissions found to remove",
        "[INFO] No API Gateway found with name: mcp-server-api",
        "[INFO] No Lambda function found with name: mcp-server",
        "[INFO] No CloudWatch log group found: /aws/lambda/mcp-server",
        "[INFO] No IAM role found with name: mcp-server-role",
      ])
      expect(logs.lines).toContain("[SUCCESS] Resource destruction completed!")
    })

  })

  describe("a role with an inline policy", () => {

    it("should report a partial result and still clean local files", async () => {
      deployFullStack(cloud)
      cloud.roles.get("mcp-server-role")?.inline.add("inline-s3-write")
      await fs.writeFile(path.join(cwd, "deployment.zip"), "zip")
      await fs.mkdir(path.join(cwd, "package"))
      await fs.writeFile(path.join(cwd, "package", "index.mjs"), "export {}")

      const report = await runConfirmed()

      expect(report.status).toBe("partial")
      expect(report.status === "cancelled" ? [] : report.removedFiles).toEqual(["deployment.zip", "package"])
      expect(cloud.roles.has("mcp-server-role")).toBe(true)
      expect(cloud.functions.size).toBe(0)

      const roleError = logs.lines.indexOf("[ERROR] Could not delete IAM role: mcp-server-role")
      const completed = logs.lines.indexOf("[SUCCESS] Resource destruction completed!")
      expect(roleError).toBeGreaterThanOrEqual(0)
      expect(completed).toBeGreaterThan(roleError)
      expect(logs.lines).toContain("[WARNING] 1 step(s) failed; check the messages above and finish cleanup manually.")
    })

  })

  describe("a function that cannot be deleted", () => {

    it("should fail the run but still attempt the remaining steps", async () => {
      deployFullStack(cloud)
      cloud.failOn("delete_function", "ServiceException")

      const report = await runConfirmed()

      expect(report.status).toBe("failed")
      expect(cloud.roles.size).toBe(0)
      expect(cloud.logGroups.size).toBe(0)
      expect(logs.lines).toContain("[ERROR] Lambda function mcp-server could not be deleted.")
    })

  })

  describe("confirmation", () => {

    it.each(["no", "", "y", "yess", "nope", "yes please"])("should cancel without deleting when the reply is %j", async reply => {
      deployFullStack(cloud)

      const result = await run(replying(reply))

      expect(Either.getOrUndefined(result)).toEqual({ status: "cancelled", accountId: "123456789012" })
      expect(cloud.calls).toEqual(["get_caller_identity"])
      expect(logs.lines).toContain("[INFO] Deletion cancelled by user")
    })

    it.each(["yes", "Yes", "YES"])("should proceed when the reply is %j", async reply => {
      deployFullStack(cloud)
      const questions: string[] = []

      const result = await run(replying(reply, questions))

      expect(Either.isRight(result)).toBe(true)
      expect(questions).toEqual([CONFIRMATION_QUESTION])
      expect(cloud.functions.size).toBe(0)
    })

    it("should list the resources before asking", async () => {
      await run(replying("no"))

      expect(logs.lines.slice(0, 9)).toEqual([
        "[SUCCESS] AWS credentials are configured and working",
        "[INFO] AWS Account ID: 123456789012",
        "[WARNING] This will destroy the following AWS resources:",
        "[WARNING]   - Lambda function: mcp-server",
        "[WARNING]   - API Gateway: mcp-server-api",
        "[WARNING]   - IAM role: mcp-server-role",
        "[WARNING]   - Lambda permissions for API Gateway",
        "[WARNING]   - CloudWatch logs: /aws/lambda/mcp-server",
        "[WARNING] This action cannot be undone!",
      ])
    })

  })

  describe("preflight", () => {

    it("should stop before asking when credentials are rejected", async () => {
      cloud.authenticated = false
      const questions: string[] = []

      const result = await run(replying("yes", questions))

      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("PreflightError")
        expect(result.left.reason).toBe("unauthenticated")
      }
      expect(questions).toEqual([])
      expect(cloud.calls).toEqual(["get_caller_identity"])
    })

    it("should stop when the account id is missing", async () => {
      cloud.accountId = undefined

      const result = await run(Confirmation.AlwaysYes)

      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left.reason).toBe("missing-account")
        expect(result.left.message).toBe("Could not get AWS account ID")
      }
      expect(cloud.mutations()).toEqual([])
    })

  })

  describe("options", () => {

    it("should keep local files when asked to", async () => {
      await fs.writeFile(path.join(cwd, "response.json"), "{}")

      const report = await runConfirmed({}, { keepLocalFiles: true })

      expect(report.status === "cancelled" ? undefined : report.removedFiles).toEqual([])
      await expect(fs.stat(path.join(cwd, "response.json"))).resolves.toBeDefined()
    })

    it("should use configured resource names", async () => {
      cloud.addFunction("orders")
      cloud.httpApis.push({ id: "h-1", name: "orders-api" })
      cloud.addRole("orders-role")

      const report = await runConfirmed({
        functionName: "orders",
        roleName: "orders-role",
        apiName: "orders-api",
        apiType: "http",
        managedPolicyArns: [],
      })

      expect(report.status).toBe("success")
      expect(cloud.mutations()).toEqual([
        "delete_api:h-1",
        "delete_function:orders",
        "delete_log_group:/aws/lambda/orders",
        "delete_role:orders-role",
      ])
    })

  })

})
