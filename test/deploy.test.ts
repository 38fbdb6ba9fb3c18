import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { Effect, Either } from "effect"
import * as fs from "fs/promises"
import * as os from "os"
import * as path from "path"

import { resolveDeployTarget, type DeployConfig } from "~/config"
import { deploy } from "~/deploy/deploy"
import { FakeCloud } from "./helpers/fake-cloud"
import { captureLogs } from "./helpers/capture-logs"
import { withTestClock } from "./helpers/test-clock"

const ARCHIVE = "zip-bytes"
const FUNCTION_ARN = "arn:aws:lambda:eu-central-1:123456789012:function:mcp-server"
const BUCKET = "mcp-server-deployments-eu-central-1"
const KEY = "lambda-deployments/mcp-server.zip"

describe("deploy", () => {
  let cloud: FakeCloud
  let logs: ReturnType<typeof captureLogs>
  let cwd: string

  beforeEach(async () => {
    cloud = new FakeCloud()
    logs = captureLogs()
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "lambda-ops-deploy-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  const run = (config: DeployConfig = {}) =>
    Effect.either(deploy(resolveDeployTarget(config), { cwd })).pipe(
      Effect.provide(cloud.layer),
      Effect.provide(logs.layer)
    )

  const deployed = async (config: DeployConfig = {}) => {
    const result = await Effect.runPromise(run(config))
    if (Either.isLeft(result)) throw new Error(`deploy failed: ${result.left.message}`)
    return result.right
  }

  const failure = async (config: DeployConfig = {}) => {
    const result = await Effect.runPromise(run(config))
    if (Either.isRight(result)) throw new Error("deploy should have failed")
    return result.left
  }

  const packaged = () => fs.writeFile(path.join(cwd, "deployment.zip"), ARCHIVE)

  describe("a small archive", () => {

    it("should upload the code inline and wait for the update", async () => {
      cloud.addFunction("mcp-server")
      await packaged()

      const report = await deployed()

      expect(report).toEqual({
        functionName: "mcp-server",
        functionArn: FUNCTION_ARN,
        upload: "direct",
        location: "deployment.zip",
        configured: false,
      })
      expect(cloud.deployments.get("mcp-server")).toEqual({ code: `zip:${ARCHIVE.length}` })
      expect(cloud.calls).toEqual([
        "get_caller_identity",
        "get_function:mcp-server",
        "update_function_code:mcp-server",
        "get_function:mcp-server",
      ])
      expect(logs.lines).toEqual([
        "[SUCCESS] AWS credentials are configured and working",
        "[INFO] AWS Account ID: 123456789012",
        "[INFO] Deployment package: deployment.zip (9 bytes)",
        "[SUCCESS] Successfully deployed to Lambda function: mcp-server",
        `[INFO] Function ARN: ${FUNCTION_ARN}`,
        "[SUCCESS] Deployment completed successfully!",
      ])
    })

    it("should read the archive path from the config", async () => {
      cloud.addFunction("orders")
      await fs.mkdir(path.join(cwd, "dist"))
      await fs.writeFile(path.join(cwd, "dist", "orders.zip"), "orders")

      const report = await deployed({ functionName: "orders", archive: "dist/orders.zip" })

      expect(report.location).toBe("dist/orders.zip")
      expect(cloud.deployments.get("orders")).toEqual({ code: "zip:6" })
    })

  })

  describe("an archive above the direct upload limit", () => {

    it("should create the bucket, stage the archive and point the function at it", async () => {
      cloud.addFunction("mcp-server")
      await packaged()

      const report = await deployed({ directUploadLimit: 4 })

      expect(report.upload).toBe("s3")
      expect(report.location).toBe(`s3://${BUCKET}/${KEY}`)
      expect(cloud.mutations()).toEqual([
        `create_bucket:${BUCKET}`,
        `put_object:${BUCKET}/${KEY}`,
        "update_function_code:mcp-server",
      ])
      expect(cloud.bucketRegions.get(BUCKET)).toBe("eu-central-1")
      expect(cloud.buckets.get(BUCKET)?.get(KEY)).toBe(ARCHIVE.length)
      expect(cloud.deployments.get("mcp-server")).toEqual({ code: `s3://${BUCKET}/${KEY}` })
      expect(logs.lines).toContain(`[INFO] Creating S3 bucket: ${BUCKET}`)
      expect(logs.lines).toContain(`[INFO] Uploading to S3: s3://${BUCKET}/${KEY}`)
      expect(logs.lines).toContain("[SUCCESS] File uploaded to S3 successfully")
    })

    it("should reuse an existing bucket", async () => {
      cloud.addFunction("mcp-server")
      cloud.buckets.set("release-artifacts", new Map())
      await packaged()

      await deployed({ directUploadLimit: 4, bucket: "release-artifacts", s3Key: "builds/mcp.zip" })

      expect(cloud.calls).toContain("head_bucket:release-artifacts")
      expect(cloud.mutations()).toEqual([
        "put_object:release-artifacts/builds/mcp.zip",
        "update_function_code:mcp-server",
      ])
    })

    it("should create a us-east-1 bucket without a location constraint", async () => {
      cloud.addFunction("mcp-server")
      await packaged()

      await deployed({ directUploadLimit: 4, region: "us-east-1" })

      expect(cloud.bucketRegions.has("mcp-server-deployments-us-east-1")).toBe(true)
      expect(cloud.bucketRegions.get("mcp-server-deployments-us-east-1")).toBeUndefined()
    })

    it("should fail at the upload stage when the object cannot be written", async () => {
      cloud.addFunction("mcp-server")
      cloud.failOn("put_object", "AccessDenied")
      await packaged()

      const error = await failure({ directUploadLimit: 4 })

      expect(error._tag).toBe("DeployError")
      if (error._tag === "DeployError") {
        expect(error.stage).toBe("upload")
        expect(error.message).toBe("S3 upload failed: put_object failed: AccessDenied: put_object rejected")
      }
      expect(cloud.deployments.has("mcp-server")).toBe(false)
    })

  })

  describe("function configuration", () => {

    it("should apply the configured settings after the code", async () => {
      cloud.addFunction("mcp-server")
      await packaged()

      const report = await deployed({
        handler: "handler.handler",
        runtime: "nodejs20.x",
        timeout: 30,
        memorySize: 512,
        environment: { STAGE: "test" },
      })

      expect(report.configured).toBe(true)
      expect(cloud.deployments.get("mcp-server")?.configuration).toEqual({
        Handler: "handler.handler",
        Runtime: "nodejs20.x",
        Timeout: 30,
        MemorySize: 512,
        Environment: { STAGE: "test" },
      })
      expect(cloud.calls.slice(2)).toEqual([
        "update_function_code:mcp-server",
        "get_function:mcp-server",
        "update_function_configuration:mcp-server",
        "get_function:mcp-server",
      ])
      expect(logs.lines).toContain("[SUCCESS] Function configuration updated successfully")
    })

    it("should report a rejected configuration after the code was deployed", async () => {
      cloud.addFunction("mcp-server")
      cloud.failOn("update_function_configuration", "InvalidParameterValueException")
      await packaged()

      const error = await failure({ timeout: 30 })

      expect(error._tag).toBe("DeployError")
      if (error._tag === "DeployError") {
        expect(error.stage).toBe("configure")
        expect(error.message).toBe(
          "update_function_configuration failed: InvalidParameterValueException: update_function_configuration rejected"
        )
      }
      expect(cloud.deployments.get("mcp-server")).toEqual({ code: `zip:${ARCHIVE.length}` })
      expect(logs.lines).toContain("[SUCCESS] Successfully deployed to Lambda function: mcp-server")
      expect(logs.lines).not.toContain("[SUCCESS] Deployment completed successfully!")
    })

  })

  describe("update status", () => {

    it("should keep polling while the update is in progress", async () => {
      cloud.addFunction("mcp-server")
      cloud.updateDelayPolls = 2
      await packaged()

      const result = await Effect.runPromise(withTestClock(run()))

      expect(Either.isRight(result)).toBe(true)
      expect(cloud.calls.slice(2)).toEqual([
        "update_function_code:mcp-server",
        "get_function:mcp-server",
        "get_function:mcp-server",
        "get_function:mcp-server",
      ])
    })

    it("should stop at the first failed update", async () => {
      cloud.addFunction("mcp-server")
      cloud.updateFailure = "Handler not found"
      await packaged()

      const error = await failure()

      expect(error._tag).toBe("DeployError")
      if (error._tag === "DeployError") {
        expect(error.stage).toBe("code")
        expect(error.message).toBe("Update of mcp-server failed: Handler not found")
      }
      expect(cloud.calls.filter(call => call === "get_function:mcp-server")).toHaveLength(2)
    })

  })

  describe("preconditions", () => {

    it("should ask for a package when the archive is missing", async () => {
      cloud.addFunction("mcp-server")

      const error = await failure()

      expect(error._tag).toBe("DeployError")
      if (error._tag === "DeployError") {
        expect(error.stage).toBe("archive")
        expect(error.message).toBe("Deployment package not found: deployment.zip. Run 'lambda-ops package' first.")
      }
      expect(cloud.calls).toEqual(["get_caller_identity"])
    })

    it("should refuse to deploy to a function that does not exist", async () => {
      await packaged()

      const error = await failure()

      expect(error._tag).toBe("DeployError")
      if (error._tag === "DeployError") {
        expect(error.stage).toBe("function")
        expect(error.message).toBe("Lambda function mcp-server does not exist in eu-central-1; create it before deploying")
      }
      expect(cloud.mutations()).toEqual([])
    })

    it("should stop before reading anything when credentials are rejected", async () => {
      cloud.authenticated = false
      cloud.addFunction("mcp-server")
      await packaged()

      const error = await failure()

      expect(error._tag).toBe("PreflightError")
      expect(cloud.calls).toEqual(["get_caller_identity"])
    })

  })

})
