#!/usr/bin/env node
/**
 * repo-forge command line.
 *
 * Usage:
 *   repo-forge solve "Print the first 10 primes"              # generate + run code
 *   repo-forge analyze https://github.com/owner/repo          # statistics only
 *   repo-forge summary https://github.com/owner/repo
 *   repo-forge improve https://github.com/owner/repo --focus security
 *   repo-forge feature https://github.com/owner/repo "Add dark mode" --create-pr
 *   repo-forge fix https://github.com/owner/repo "Login fails on empty password"
 *   repo-forge models
 *
 * Environment:
 *   REPO_FORGE_CONFIG   - config file path (default ./config.json)
 *   <PROFILE>_API_KEY   - credential for a profile whose api_key is empty
 */

// Load environment variables from .env file
import 'dotenv/config';

import * as fs from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import prompts from 'prompts';
import { z } from 'zod';

import { loadConfig, resolveConfigPath, type AppConfig } from './config.js';
import { apiKeyEnvName, listProfiles, resolveModelProfile } from './model-profile.js';
import { CompletionClient } from './completion-client.js';
import { RUNTIMES, isRuntimeName } from './code-sandbox.js';
import { solveProblem } from './code-generator.js';
import { Workspace } from './workspace.js';
import { analyzeRepository } from './repository-analysis.js';
import { summarizeRepository, suggestImprovements } from './repository-insights.js';
import { runTask, type ApplyResult } from './task-runner.js';
import type { TaskKind } from './change-set.js';
import { errorMessage } from './errors.js';
import { log, logBlock, logSection, logUsageReport, setQuiet } from './logger.js';

type GlobalOptions = {
  config?: string;
  model?: string;
  apiKey?: string;
  quiet?: boolean;
};

type RepoOptions = {
  branch: string;
  keep?: boolean;
};

type TaskCliOptions = RepoOptions & {
  createPr?: boolean;
  push?: boolean;
  yes?: boolean;
  output?: string;
};

type SolveCliOptions = {
  execute: boolean;
  timeout?: number;
  language: string;
  output?: string;
};

const program = new Command();

const packageSchema = z.object({ version: z.string().default('0.0.0') });

function getVersion(): string {
  try {
    const pkg = packageSchema.parse(
      JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8')),
    );
    return pkg.version;
  } catch {
    return '0.0.0';
  }
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

async function readConfig(): Promise<AppConfig> {
  return loadConfig(resolveConfigPath(globalOptions().config));
}

async function createClient(config: AppConfig): Promise<CompletionClient> {
  const { model, apiKey } = globalOptions();
  const profile = resolveModelProfile(config, model, { apiKey });
  log(`Model: ${profile.name} (${profile.modelName})`, 'bright');
  return CompletionClient.fromProfile(profile, {
    timeoutMs: config.settings.requestTimeoutSeconds * 1000,
    maxOutputTokens: config.settings.maxOutputTokens,
  });
}

/**
 * Clone, run `fn`, and remove the working copy unless --keep was given.
 */
async function withClone<T>(
  url: string,
  { branch, keep }: RepoOptions,
  fn: (workspace: Workspace) => Promise<T>,
): Promise<T> {
  logSection('Cloning Repository');
  const workspace = await Workspace.clone(url, { branch });
  try {
    return await fn(workspace);
  } finally {
    if (keep) {
      log(`  [i] Working copy kept at ${workspace.rootPath}`, 'dim');
    } else {
      await workspace.dispose();
    }
  }
}

function writeOutput(file: string | undefined, result: unknown) {
  if (!file) return;
  fs.writeFileSync(file, JSON.stringify(result, null, 2), 'utf-8');
  log(`\nResults saved to ${file}`, 'dim');
}

function renderTaskResult(kind: TaskKind, result: ApplyResult, workspace: Workspace) {
  logSection(kind === 'feature' ? 'FEATURE IMPLEMENTATION' : 'ISSUE FIXES');

  if (!result.success) {
    log(kind === 'feature' ? '[x] Feature implementation failed!' : '[x] Issue fixing failed!', 'red');
    log(`Error: ${result.error ?? 'unknown error'}`, 'red');
    if (result.touchedFiles.length > 0) {
      log(`Files written before the failure: ${result.touchedFiles.join(', ')}`, 'yellow');
    }
    if (result.rawResponse) {
      log('Raw response:', 'dim');
      logBlock(result.rawResponse);
    }
    return;
  }

  log(kind === 'feature' ? '[+] Feature implemented successfully!' : '[+] Issues fixed successfully!', 'green');
  log(`${kind === 'feature' ? 'Modified' : 'Fixed'} files: ${result.touchedFiles.join(', ')}`);
  log(`Working in: ${workspace.rootPath}`, 'dim');
  if (result.branch) {
    log(`Branch: ${result.branch}`, 'bright');
  }

  const changeSet = result.changeSet;
  if (changeSet?.kind === 'feature') {
    if (changeSet.plan) {
      log('\nImplementation plan:', 'bright');
      logBlock(changeSet.plan);
    }
    if (changeSet.dependencies.length > 0) {
      log(`\nNew dependencies: ${changeSet.dependencies.join(', ')}`, 'yellow');
    }
  } else if (changeSet?.kind === 'fix') {
    if (changeSet.analysis) {
      log('\nProblem analysis:', 'bright');
      logBlock(changeSet.analysis);
    }
    log('\nFixes applied:', 'bright');
    for (const fix of changeSet.fixes) {
      log(`- ${fix.file}: ${fix.solution}`);
    }
  }
  if (changeSet?.notes) {
    log(`\nNotes: ${changeSet.notes}`, 'dim');
  }
}

async function confirmPush(branch: string, assumeYes: boolean | undefined): Promise<boolean> {
  if (assumeYes) return true;
  const { confirmed } = await prompts(
    {
      type: 'confirm',
      name: 'confirmed',
      message: `Push ${branch} to origin?`,
      initial: false,
    },
    { onCancel: () => false },
  );
  return confirmed === true;
}

async function runTaskCommand(
  kind: TaskKind,
  url: string,
  description: string,
  options: TaskCliOptions,
) {
  if (options.push && !options.createPr) {
    throw new InvalidArgumentError('--push requires --create-pr');
  }

  const config = await readConfig();
  const client = await createClient(config);

  log(`${kind === 'feature' ? 'Feature' : 'Issues'}: ${description}`, 'bright');

  await withClone(url, options, async workspace => {
    logSection(kind === 'feature' ? 'Implementing Feature' : 'Fixing Issues');
    const result = await runTask(workspace, client, {
      kind,
      description,
      baseBranch: options.branch,
      createBranch: options.createPr ?? false,
      maxContextFiles: config.settings.maxContextFiles,
    });

    renderTaskResult(kind, result, workspace);
    logUsageReport(client.totalUsage, client.modelId);
    writeOutput(options.output, { ...result, repoPath: workspace.rootPath });

    if (!result.success) {
      process.exitCode = 1;
      return;
    }

    if (options.push && result.branch) {
      if (await confirmPush(result.branch, options.yes)) {
        await workspace.push(result.branch);
        log(`  [+] Pushed ${result.branch}, ready for a pull request`, 'green');
      } else {
        log('  [~] Push skipped', 'yellow');
      }
    } else if (options.createPr) {
      log('Ready for push and PR creation!', 'dim');
    }
  });
}

program
  .name('repo-forge')
  .description('Generate code and apply model-written changes to git repositories')
  .version(getVersion())
  .option('-c, --config <path>', 'Config file (default: $REPO_FORGE_CONFIG or ./config.json)')
  .option('-m, --model <name>', 'Model profile from the config file (default: default_model)')
  .option('--api-key <key>', "API key for the selected profile (overrides the config's key)")
  .option('-q, --quiet', 'Only print results and errors');

program.hook('preAction', () => {
  setQuiet(Boolean(globalOptions().quiet));
});

program
  .command('solve')
  .description('Generate code for a problem statement and run it')
  .argument('<problem>', 'Problem statement to solve')
  .option('--no-execute', 'Generate code without executing it')
  .option('-t, --timeout <seconds>', 'Execution timeout in seconds', parsePositiveNumber)
  .option('-l, --language <name>', `Language to generate: ${Object.keys(RUNTIMES).join('|')}`, 'python')
  .option('-o, --output <file>', 'Save results to a JSON file')
  .action(async (problem: string, options: SolveCliOptions) => {
    if (!isRuntimeName(options.language)) {
      throw new InvalidArgumentError(
        `Unknown language '${options.language}' (expected ${Object.keys(RUNTIMES).join(', ')})`,
      );
    }
    const config = await readConfig();
    const client = await createClient(config);

    const result = await solveProblem(client, problem, {
      execute: options.execute,
      timeoutSeconds: options.timeout ?? config.settings.executionTimeoutSeconds,
      runtime: RUNTIMES[options.language],
    });

    if (result.error !== undefined || result.generatedCode === null) {
      log(`Error: ${result.error ?? 'no code generated'}`, 'red');
      process.exitCode = 1;
      return;
    }

    logSection('GENERATED CODE');
    logBlock(result.generatedCode);

    if (result.execution) {
      logSection('EXECUTION RESULTS');
      if (result.execution.success) {
        log('[+] Execution successful!', 'green');
        if (result.execution.stdout) {
          log('Output:', 'bright');
          logBlock(result.execution.stdout);
        }
      } else {
        log(`[x] Execution failed! (exit code ${result.execution.exitCode})`, 'red');
        if (result.execution.stderr) {
          log('Error:', 'bright');
          logBlock(result.execution.stderr);
        }
      }
    }

    logUsageReport(client.totalUsage, client.modelId);
    writeOutput(options.output, result);
  });

program
  .command('analyze')
  .description('Clone a repository and print file statistics (no model call)')
  .argument('<repo-url>', 'Git repository URL')
  .option('-b, --branch <name>', 'Branch to analyze', 'main')
  .option('--keep', 'Keep the cloned working copy')
  .action(async (url: string, options: RepoOptions) => {
    await withClone(url, options, async workspace => {
      const analysis = await analyzeRepository(workspace);

      logSection('REPOSITORY ANALYSIS');
      log(`Path: ${analysis.rootPath}`);
      log(`Files: ${analysis.files.length}`);
      log(`Size: ${analysis.totalSizeBytes} bytes`);
      log(`Languages: ${Object.keys(analysis.languageCounts).filter(ext => ext).join(', ')}`);
      log(`Branch: ${analysis.gitInfo.currentBranch ?? 'unknown'}`);
      log(`Remote: ${analysis.gitInfo.remoteUrl ?? 'unknown'}`);

      log('\nTop file types:', 'bright');
      const top = Object.entries(analysis.languageCounts)
        .filter(([ext]) => ext)
        .sort((a, b) => b[1] - a[1])
        .slice(0, 5);
      for (const [ext, count] of top) {
        log(`  ${ext}: ${count} files`);
      }
    });
  });

program
  .command('summary')
  .description('Ask the model for a repository summary')
  .argument('<repo-url>', 'Git repository URL')
  .option('-b, --branch <name>', 'Branch to analyze', 'main')
  .option('--keep', 'Keep the cloned working copy')
  .action(async (url: string, options: RepoOptions) => {
    const config = await readConfig();
    const client = await createClient(config);
    await withClone(url, options, async workspace => {
      const summary = await summarizeRepository(workspace, client, {
        maxContextFiles: config.settings.maxContextFiles,
      });
      logSection('REPOSITORY SUMMARY');
      logBlock(summary);
      logUsageReport(client.totalUsage, client.modelId);
    });
  });

program
  .command('improve')
  .description('Ask the model for improvement suggestions')
  .argument('<repo-url>', 'Git repository URL')
  .option('-f, --focus <area>', 'Focus area (e.g. performance, security)', '')
  .option('-b, --branch <name>', 'Branch to analyze', 'main')
  .option('--keep', 'Keep the cloned working copy')
  .action(async (url: string, options: RepoOptions & { focus: string }) => {
    const config = await readConfig();
    const client = await createClient(config);
    if (options.focus) {
      log(`Focus area: ${options.focus}`, 'bright');
    }
    await withClone(url, options, async workspace => {
      const suggestions = await suggestImprovements(workspace, client, options.focus, {
        maxContextFiles: config.settings.maxContextFiles,
      });
      logSection('IMPROVEMENT SUGGESTIONS');
      logBlock(suggestions);
      logUsageReport(client.totalUsage, client.modelId);
    });
  });

for (const kind of ['feature', 'fix'] as const) {
  program
    .command(kind)
    .description(kind === 'feature' ? 'Implement a new feature' : 'Fix issues in a repository')
    .argument('<repo-url>', 'Git repository URL')
    .argument('<description>', kind === 'feature' ? 'Feature description' : 'Issue description')
    .option('-b, --branch <name>', 'Base branch', 'main')
    .option('--create-pr', 'Create a new branch and commit the changes on it')
    .option('--push', 'Push the new branch to origin (requires --create-pr)')
    .option('-y, --yes', 'Do not ask before pushing')
    .option('--keep', 'Keep the cloned working copy')
    .option('-o, --output <file>', 'Save the result to a JSON file')
    .action(async (url: string, description: string, options: TaskCliOptions) => {
      await runTaskCommand(kind, url, description, options);
    });
}

program
  .command('models')
  .description('List the model profiles in the config file')
  .action(async () => {
    const config = await readConfig();
    log(`Config: ${config.source}`, 'dim');
    log(`Default model: ${config.defaultModel}`, 'bright');
    for (const name of listProfiles(config)) {
      const entry = config.models[name];
      if (!entry) continue;
      const hasKey = Boolean(entry.apiKey.trim() || process.env[apiKeyEnvName(name)]?.trim());
      log(
        `  ${name}: ${entry.modelName} - API key ${hasKey ? 'configured' : 'not set'}`,
        hasKey ? 'green' : 'yellow',
      );
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  log(`Error: ${errorMessage(error)}`, 'red');
  process.exit(1);
});
