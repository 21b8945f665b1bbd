// Configuration and model profiles
export { loadConfig, parseConfig, resolveConfigPath, DEFAULT_CONFIG_FILE, CONFIG_PATH_ENV } from './config.js';
export type { AppConfig, ProfileEntry, Settings } from './config.js';
export { resolveModelProfile, listProfiles, apiKeyEnvName } from './model-profile.js';
export type { ModelProfile } from './model-profile.js';

// Completion client
export { CompletionClient, addUsage, emptyUsage, stripCodeFences, toBaseUrl } from './completion-client.js';
export type { CompletionSource, CompletionClientOptions } from './completion-client.js';

// Code generation and execution
export { executeCode, RUNTIMES, isRuntimeName } from './code-sandbox.js';
export type { CodeRuntime, ExecutionResult, ExecuteCodeOptions, RuntimeName } from './code-sandbox.js';
export { generateCode, solveProblem } from './code-generator.js';
export type { SolveOptions, SolveResult } from './code-generator.js';

// Working copies
export { Workspace, repositoryName, decodeText } from './workspace.js';
export type { CloneOptions } from './workspace.js';
export { CliGitClient } from './git-client.js';
export type { GitClient } from './git-client.js';
export { analyzeRepository } from './repository-analysis.js';
export type { RepositoryAnalysis, RepositoryFile, GitInfo } from './repository-analysis.js';
export { buildRepositoryContext, formatAnalysisHeader, PRIORITY_PATTERNS } from './repository-context.js';
export type { RepositoryContextOptions } from './repository-context.js';

// Tasks
export { summarizeRepository, suggestImprovements } from './repository-insights.js';
export type { InsightOptions } from './repository-insights.js';
export { parseChangeSet, fileWrites, renderCommitMessage } from './change-set.js';
export type { ChangeSet, Implementation, FixSet, FileWrite, TaskKind } from './change-set.js';
export { runTask, applyChangeSet, deriveBranchName } from './task-runner.js';
export type { TaskOptions, ApplyResult } from './task-runner.js';

// Errors
export {
  ConfigurationError,
  CompletionError,
  ChangeSetParseError,
  WorkspaceError,
  GitError,
} from './errors.js';
