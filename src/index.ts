// Config
export { defineConfig, resolveTeardownTarget, resolvePackageConfig, resolveDeployTarget } from "./config";
export type { LambdaOpsConfig, TeardownConfig, PackageConfig, DeployConfig, TeardownTarget, ResolvedPackageConfig, DeployTarget, FunctionSettings, ApiType, TargetArch } from "./config";

// AWS
export { makeClients, checkIdentity, PreflightError, Aws } from "./aws";
export type { ClientsConfig, AwsClients, CallerIdentity } from "./aws";

// Teardown
export { teardown, runTeardownSteps } from "./teardown/teardown";
export type { TeardownOptions, TeardownReport } from "./teardown/teardown";
export { removeApiGatewayPermissions, deleteApiGateway, deleteFunction, deleteFunctionLogs, deleteExecutionRole } from "./teardown/steps";
export { Confirmation, confirmTeardown, isAffirmative } from "./teardown/confirm";
export { cleanupLocalFiles } from "./teardown/local-files";
export { overallStatus } from "./teardown/outcome";
export type { StepName, StepStatus, StepOutcome, OverallStatus } from "./teardown/outcome";

// Packaging
export { createDeploymentPackage, readProductionDependencies } from "./build/package";
export type { PackageResult, ResolvedDependency } from "./build/package";
export { Installer, npmInstallArgs } from "./build/installer";
export type { InstallRequest, TargetPlatform } from "./build/installer";
export { PackagingError } from "./build/errors";
export type { PackagingStage } from "./build/errors";

// Deploy
export { deploy } from "./deploy/deploy";
export type { DeployOptions, DeployReport } from "./deploy/deploy";
export { DeployError } from "./deploy/errors";
export type { DeployStage } from "./deploy/errors";
