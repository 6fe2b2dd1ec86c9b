// Core module exports for claude-desktop-linux

// Pipeline
export { BuildPipeline, createPackager } from './pipeline/buildPipeline';
export type { BuildOptions, BuildPipelineDeps, BuildPipelineEvents } from './pipeline/buildPipeline';
export { finalizeBuild, cleanWorkDir } from './pipeline/cleanup';
export type { FinalizeResult } from './pipeline/cleanup';

// Build context
export {
  createBuildContext,
  validateBuildSettings,
  detectArchitecture,
  getAppStagingDir,
  isArchitecture,
  isBuildFormat,
  isCleanPolicy,
} from './context';
export type { BuildContextInput, BuildSettings } from './context';

// Stages
export { InputResolver, getInputResolver, getDownloadPath } from './resolver/inputResolver';
export { ResourceExtractor, parseNupkgVersion } from './extractor/resourceExtractor';
export { resolveIcons, largestIcon } from './extractor/iconResolver';
export { RuntimeProvisioner } from './runtime/runtimeProvisioner';
export { AsarPatcher, electronAsarTool, resolvePatchRules, DEFAULT_NATIVE_SHIMS } from './patcher/asarPatcher';
export type { AsarTool, NativeShim, PatchReport } from './patcher/asarPatcher';
export { applyPatchRule, applyRuleToText, loadPatchRules, validatePatchRules } from './patcher/patchRule';
export type { PatchRule, PatchRuleResult } from './patcher/patchRule';

// Packager
export { RpmPackager } from './packager/rpmPackager';
export { AppImagePackager } from './packager/appImagePackager';
export { locateArtifact, runPackagingTool } from './packager/packager';
export type { Packager, PackageOptions } from './packager/packager';
export { PackagerStateMachine, InvalidStateTransitionError } from './packager/packagerState';
export { stageInstallTree } from './packager/stagingTree';
export { renderDesktopEntry } from './packager/desktopEntry';
export { renderRpmSpec, renderPostInstallScript, formatChangelogDate } from './packager/rpmSpec';
export {
  renderLauncherScript,
  buildElectronArgs,
  detectDisplayBackend,
  getLauncherPaths,
  resolveElectronExecutable,
} from './packager/launcherScript';
export type { DisplayBackend, LauncherFlavour } from './packager/launcherScript';

// Errors
export * from './errors';

// Config
export { ConfigManager, getConfigManager, DEFAULT_CONFIG } from './config';
export type { BuildConfig } from './config';

// Shared utilities
export * from './shared';
