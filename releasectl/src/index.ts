export { ReleaseCoordinator, parseBumpRequest } from "./core/coordinator.js";
export type { ChainOutcome, CoordinatorDeps, PushOutcome, ReleaseStatus } from "./core/coordinator.js";
export { PHASES, detectStage, nextStage, pendingPhase } from "./core/stages.js";
export { GitRepository, headsRef, remoteRef, tagsRef } from "./git/repository.js";
export type { GitCommand, ReleaseRepository, StatusEntry } from "./git/repository.js";
export { actionsUrl, parseRemoteUrl } from "./git/forge.js";
export type { ToolResult, VersionManager } from "./version/manager.js";
export { UvVersionManager } from "./version/uv.js";
export { NpmVersionManager } from "./version/npm.js";
export { createVersionManager } from "./version/factory.js";
export { checkBumpOrder, toSemver } from "./version/ordering.js";
export { AutoConfirmation, ReadlineConfirmation } from "./prompt/confirm.js";
export type { ConfirmationProvider } from "./prompt/confirm.js";
export { Reporter } from "./report/reporter.js";
export { loadConfig } from "./config/loader.js";
export type { ReleaseConfig } from "./types/config.js";
export * from "./types/release.js";
