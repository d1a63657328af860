/**
 * rulestudio command-line program
 *
 * Root options go before the command name, so commands are free to reuse
 * names such as `--version` for their own options.
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { ImportMode, Rule, Severity, StudioYamlConfig, isRuleCategory, isSeverity } from '../types.js';
import { StudioConfig, getConfig, getViolationsPath } from '../config.js';
import { YamlConfigError } from '../errors.js';
import { YamlConfigEngine, loadYamlConfig } from '../yaml-config.js';
import { SwiftLintCLI } from '../swiftlint-cli.js';
import { RuleRegistry } from '../rule-registry.js';
import { GitService, getGitInfo } from '../git.js';
import { GitBranchDiffService } from '../branch-diff.js';
import { ConfigComparisonService } from '../comparison.js';
import { URLConfigFetcher } from '../url-fetcher.js';
import { ConfigImportService } from '../config-import.js';
import { versionHistory } from '../version-history.js';
import { VersionCompatibilityChecker } from '../compatibility.js';
import { MigrationAssistant } from '../migration.js';
import { getAllPresets } from '../presets.js';
import { ConfigurationValidator } from '../validator.js';
import { ConfigurationHealthAnalyzer } from '../health.js';
import { ViolationStorage } from '../violation-storage.js';
import { WorkspaceAnalyzer, findSwiftFiles, mergeExclusions } from '../workspace-analyzer.js';
import { WorkspaceManager, createWorkspace, workspaceId } from '../workspace.js';
import { getSandboxRestrictions, isReadOnlyFilesystem, isSandboxMode } from '../sandbox.js';
import { buildStatusSummary, wrapInEnvelope } from '../agent-output.js';
import { startUIServer } from '../ui-server.js';
import { RuleBrowserViewModel, RuleSortOption, RuleStatusFilter } from '../viewmodels/rule-browser.js';
import { ViolationInspectorViewModel, ViolationSortOption } from '../viewmodels/violation-inspector.js';
import { ConfigComparisonViewModel } from '../viewmodels/config-comparison.js';
import { GitBranchDiffViewModel } from '../viewmodels/git-branch-diff.js';
import { ConfigImportViewModel } from '../viewmodels/config-import.js';
import { ConfigVersionHistoryViewModel } from '../viewmodels/version-history.js';
import { VersionCompatibilityViewModel } from '../viewmodels/version-compatibility.js';
import { MigrationAssistantViewModel } from '../viewmodels/migration-assistant.js';
import {
  formatBackups,
  formatCompatibility,
  formatComparison,
  formatDiff,
  formatHealth,
  formatMigrationPlan,
  formatPresets,
  formatRefs,
  formatRuleDetail,
  formatRuleList,
  formatStatus,
  formatValidation,
  formatViolations,
  formatWorkspaces,
} from './format.js';

interface OutputOptions {
  json?: boolean;
  agent?: boolean;
}

// =============================================================================
// HELPERS
// =============================================================================

interface GlobalOptions {
  sandbox?: boolean;
  workspace?: string;
}

let workspaceOption: string | undefined;

function workspaceRoot(): string {
  return path.resolve(workspaceOption || process.cwd());
}

function configPath(config: StudioConfig = getConfig()): string {
  return path.join(workspaceRoot(), config.configFileName);
}

function requireWritable(): void {
  if (isReadOnlyFilesystem()) {
    throw YamlConfigError.readOnly();
  }
}

async function requireEngine(): Promise<YamlConfigEngine> {
  const file = configPath();
  if (!fs.existsSync(file)) {
    throw YamlConfigError.fileNotFound();
  }
  return loadYamlConfig(file);
}

function createCLI(): SwiftLintCLI {
  return new SwiftLintCLI({ config: getConfig() });
}

function createStorage(): ViolationStorage {
  return new ViolationStorage(getViolationsPath(getConfig(), workspaceRoot()));
}

/**
 * Rules from the installed SwiftLint; none when it cannot run
 */
async function tryLoadRules(): Promise<Rule[]> {
  try {
    return await new RuleRegistry(createCLI()).loadRules();
  } catch {
    return [];
  }
}

/**
 * View-models keep errors in state; the CLI turns them back into failures
 */
function throwIfError(error: unknown): void {
  if (error !== null && error !== undefined) {
    throw error;
  }
}

function print(command: string, data: unknown, options: OutputOptions, human: () => string): void {
  if (options.agent) {
    console.log(wrapInEnvelope(command, data));
    return;
  }
  if (options.json) {
    console.log(JSON.stringify(data, null, 2));
    return;
  }
  console.log(human());
}

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(',').map((s) => s.trim()).filter((s) => s !== '');
  return items.length > 0 ? items : undefined;
}

async function confirm(question: string): Promise<boolean> {
  if (getSandboxRestrictions().noInteractive) return false;
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await new Promise<string>((resolve) => rl.question(`${question} [y/N] `, resolve));
    return answer.trim().toLowerCase().startsWith('y');
  } finally {
    rl.close();
  }
}

// =============================================================================
// STATUS
// =============================================================================

function registerStatusCommands(program: Command): void {
  program
    .command('status')
    .description('Show configuration, health and violation summary for the workspace')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (options: OutputOptions) => {
      try {
        const config = getConfig();
        const root = workspaceRoot();
        const file = configPath(config);
        const yaml: StudioYamlConfig | null = fs.existsSync(file) ? (await loadYamlConfig(file)).getConfig() : null;

        const rules = yaml ? await tryLoadRules() : [];
        const version = yaml ? await createCLI().getVersion().catch(() => null) : null;

        const summary = buildStatusSummary({
          workspacePath: root,
          configPath: file,
          config: yaml,
          git: (await getGitInfo(root, new GitService({ timeoutMs: config.gitTimeoutMs }))) ?? undefined,
          health: yaml && rules.length > 0 ? new ConfigurationHealthAnalyzer().analyze(yaml, rules) : undefined,
          validation: yaml ? new ConfigurationValidator().validate(yaml, rules.map((r) => r.id)) : undefined,
          compatibility: yaml && version ? new VersionCompatibilityChecker().checkCompatibility(yaml, version) : undefined,
          violations: await createStorage().fetchViolations({}, workspaceId(root)),
        });

        print('status', summary, options, () => formatStatus(summary));
      } catch (error) {
        console.error('Status check failed:', error);
        process.exit(1);
      }
    });
}

// =============================================================================
// RULES
// =============================================================================

function parseStatusFilter(value: string): RuleStatusFilter {
  if (value === 'all' || value === 'enabled' || value === 'disabled' || value === 'optIn') return value;
  throw new Error(`Unknown status filter: ${value}`);
}

function parseRuleSort(value: string): RuleSortOption {
  if (value === 'name' || value === 'identifier' || value === 'category') return value;
  throw new Error(`Unknown sort option: ${value}`);
}

function registerRuleCommands(program: Command): void {
  program
    .command('rules')
    .description('List SwiftLint rules')
    .option('-s, --search <text>', 'Search identifier, name and description')
    .option('-c, --category <category>', 'style, lint, metrics, performance or idiomatic')
    .option('--status <status>', 'all, enabled, disabled or optIn', 'all')
    .option('--sort <sort>', 'name, identifier or category', 'identifier')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (options: OutputOptions & { search?: string; category?: string; status: string; sort: string }) => {
      try {
        const vm = new RuleBrowserViewModel(new RuleRegistry(createCLI()));
        await vm.loadRules();
        throwIfError(vm.state.error);

        if (options.search) vm.setSearchText(options.search);
        if (options.category) {
          if (!isRuleCategory(options.category)) throw new Error(`Unknown category: ${options.category}`);
          vm.setCategory(options.category);
        }
        vm.setStatusFilter(parseStatusFilter(options.status));
        vm.setSortOption(parseRuleSort(options.sort));

        const rules = vm.filteredRules;
        print('rules', rules, options, () => formatRuleList(rules));
      } catch (error) {
        console.error('Listing rules failed:', error);
        process.exit(1);
      }
    });

  program
    .command('rule <id>')
    .description('Show documentation and configuration for one rule')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (id: string, options: OutputOptions) => {
      try {
        const registry = new RuleRegistry(createCLI());
        await registry.loadRules();
        const summary = registry.getRule(id);
        if (!summary) {
          throw new Error(`Unknown rule: ${id}`);
        }
        const rule = await registry.fetchRuleDetails(summary);

        const file = configPath();
        const entry = fs.existsSync(file) ? (await loadYamlConfig(file)).getConfig().rules[id] : undefined;

        print('rule', { rule, configuration: entry ?? null }, options, () => formatRuleDetail(rule, entry));
      } catch (error) {
        console.error('Rule lookup failed:', error);
        process.exit(1);
      }
    });
}

// =============================================================================
// EDITING
// =============================================================================

type BulkEdit = (vm: RuleBrowserViewModel, engine: YamlConfigEngine) => Promise<void>;

async function runBulkEdit(
  command: string,
  ids: string[],
  options: OutputOptions & { dryRun?: boolean },
  edit: BulkEdit
): Promise<void> {
  if (!options.dryRun) requireWritable();

  const engine = await requireEngine();
  const vm = new RuleBrowserViewModel();
  for (const id of ids) vm.toggleRuleSelection(id);

  await edit(vm, engine);
  throwIfError(vm.state.error);

  const diff = vm.state.bulkDiff;
  if (!diff) return;

  if (!options.dryRun) {
    await vm.saveBulkChanges(engine);
    throwIfError(vm.state.error);
  }

  print(command, { diff, saved: !options.dryRun }, options, () =>
    [formatDiff(diff), '', options.dryRun ? 'Dry run: nothing written.' : `Saved ${engine.configPath}`].join('\n')
  );
}

function registerEditingCommands(program: Command): void {
  program
    .command('enable <ids...>')
    .description('Enable rules')
    .option('--dry-run', 'Show the change without writing')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (ids: string[], options: OutputOptions & { dryRun?: boolean }) => {
      try {
        await runBulkEdit('enable', ids, options, (vm, engine) => vm.enableSelectedRules(engine));
      } catch (error) {
        console.error('Enable failed:', error);
        process.exit(1);
      }
    });

  program
    .command('disable <ids...>')
    .description('Disable rules')
    .option('--dry-run', 'Show the change without writing')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (ids: string[], options: OutputOptions & { dryRun?: boolean }) => {
      try {
        await runBulkEdit('disable', ids, options, (vm, engine) => vm.disableSelectedRules(engine));
      } catch (error) {
        console.error('Disable failed:', error);
        process.exit(1);
      }
    });

  program
    .command('severity <level> <ids...>')
    .description('Set the severity (warning or error) of rules')
    .option('--dry-run', 'Show the change without writing')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (level: string, ids: string[], options: OutputOptions & { dryRun?: boolean }) => {
      try {
        if (!isSeverity(level)) {
          throw YamlConfigError.invalidSeverity(ids.join(', '), level);
        }
        const severity: Severity = level;
        await runBulkEdit('severity', ids, options, (vm, engine) => vm.setSeverityForSelected(severity, engine));
      } catch (error) {
        console.error('Severity change failed:', error);
        process.exit(1);
      }
    });

  program
    .command('presets [action] [id]')
    .description('List rule presets, or `presets apply <id>`')
    .option('--dry-run', 'Show the change without writing')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (action: string | undefined, id: string | undefined, options: OutputOptions & { dryRun?: boolean }) => {
      try {
        if (!action || action === 'list') {
          const presets = getAllPresets();
          print('presets', presets, options, () => formatPresets(presets));
          return;
        }
        if (action !== 'apply' || !id) {
          throw new Error('Usage: rulestudio presets apply <id>');
        }
        await runBulkEdit('presets', [], options, (vm, engine) => vm.applyPreset(id, engine));
      } catch (error) {
        console.error('Presets failed:', error);
        process.exit(1);
      }
    });
}

// =============================================================================
// QUALITY
// =============================================================================

function registerQualityCommands(program: Command): void {
  program
    .command('validate')
    .description('Validate the workspace configuration')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (options: OutputOptions) => {
      try {
        const engine = await requireEngine();
        const known = (await tryLoadRules()).map((rule) => rule.id);
        const result = new ConfigurationValidator().validate(engine.getConfig(), known);

        print('validate', result, options, () => formatValidation(result));
        if (!result.isValid) process.exitCode = 1;
      } catch (error) {
        console.error('Validation failed:', error);
        process.exit(1);
      }
    });

  program
    .command('health')
    .description('Score the workspace configuration')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (options: OutputOptions) => {
      try {
        const engine = await requireEngine();
        const report = new ConfigurationHealthAnalyzer().analyze(engine.getConfig(), await tryLoadRules());
        print('health', report, options, () => formatHealth(report));
      } catch (error) {
        console.error('Health check failed:', error);
        process.exit(1);
      }
    });
}

// =============================================================================
// COMPARISON
// =============================================================================

function createBranchDiffViewModel(configRelativePath?: string): GitBranchDiffViewModel {
  const config = getConfig();
  const service = new GitBranchDiffService(new GitService({ timeoutMs: config.gitTimeoutMs }));
  return new GitBranchDiffViewModel(service, workspaceRoot(), configRelativePath || config.configFileName);
}

function registerComparisonCommands(program: Command): void {
  program
    .command('compare <left> <right>')
    .description('Compare two SwiftLint config files')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (left: string, right: string, options: OutputOptions) => {
      try {
        const vm = new ConfigComparisonViewModel(new ConfigComparisonService());
        vm.selectLeft(path.resolve(left));
        vm.selectRight(path.resolve(right));
        await vm.compare();
        throwIfError(vm.state.error);

        const result = vm.state.comparisonResult;
        if (result) print('compare', result, options, () => formatComparison(result));
      } catch (error) {
        console.error('Comparison failed:', error);
        process.exit(1);
      }
    });

  program
    .command('branches')
    .description('List git branches and tags of the workspace')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (options: OutputOptions) => {
      try {
        const vm = createBranchDiffViewModel();
        await vm.loadRefs();
        if (vm.state.isNotGitRepo) {
          console.log('Workspace is not a git repository.');
          return;
        }
        throwIfError(vm.state.error);

        const refs = vm.state.availableRefs;
        if (refs) print('branches', refs, options, () => formatRefs(refs));
      } catch (error) {
        console.error('Listing branches failed:', error);
        process.exit(1);
      }
    });

  program
    .command('branch-diff <branch>')
    .description('Compare the working config with the one on a branch or tag')
    .option('--config <path>', 'Config path relative to the repository root')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (branch: string, options: OutputOptions & { config?: string }) => {
      try {
        const vm = createBranchDiffViewModel(options.config);
        vm.selectRef(branch);
        await vm.compareWithSelected();
        throwIfError(vm.state.error);

        const result = vm.state.comparisonResult;
        if (result) print('branch-diff', result, options, () => formatComparison(result));
      } catch (error) {
        console.error('Branch diff failed:', error);
        process.exit(1);
      }
    });
}

// =============================================================================
// IMPORT
// =============================================================================

function registerImportCommands(program: Command): void {
  program
    .command('import <url>')
    .description('Import a configuration from an https URL (GitHub and Gist links are resolved to raw files)')
    .option('--mode <mode>', 'merge or replace', 'merge')
    .option('-y, --yes', 'Apply without asking')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (url: string, options: OutputOptions & { mode: string; yes?: boolean }) => {
      try {
        if (options.mode !== 'merge' && options.mode !== 'replace') {
          throw new Error(`Unknown import mode: ${options.mode}`);
        }
        const mode: ImportMode = options.mode;
        const config = getConfig();
        const fetcher = new URLConfigFetcher({ timeoutMs: config.fetchTimeoutMs });
        const vm = new ConfigImportViewModel(new ConfigImportService(fetcher), configPath(config));
        vm.setUrl(url);
        vm.setImportMode(mode);

        await vm.fetchPreview();
        throwIfError(vm.state.error);
        const preview = vm.state.preview;
        if (!preview) return;

        const machine = options.json || options.agent;
        if (!machine) {
          console.log(`Fetched ${preview.sourceUrl}`);
          for (const message of preview.validationErrors) console.log(`  ! ${message}`);
          if (preview.diff) console.log(formatDiff(preview.diff));
        }

        const apply = options.yes || (!machine && (await confirm(`Apply in ${mode} mode?`)));
        if (apply) {
          requireWritable();
          await vm.applyImport();
          throwIfError(vm.state.error);
        }

        if (machine) {
          print('import', { preview, mode, applied: vm.state.importComplete }, options, () => '');
        } else {
          console.log(vm.state.importComplete ? `Imported into ${configPath(config)}` : 'Import not applied.');
        }
      } catch (error) {
        console.error('Import failed:', error);
        process.exit(1);
      }
    });
}

// =============================================================================
// HISTORY
// =============================================================================

function registerHistoryCommands(program: Command): void {
  program
    .command('history [action] [args...]')
    .description('Config backups: list, diff <a> <b>, restore <backup>, prune')
    .option('--keep <n>', 'Backups to keep when pruning')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (action: string | undefined, args: string[], options: OutputOptions & { keep?: string }) => {
      try {
        const config = getConfig();
        const vm = new ConfigVersionHistoryViewModel(versionHistory, configPath(config));
        await vm.loadBackups();
        throwIfError(vm.state.error);

        // Backups are addressed by 1-based list position or file name
        const find = (ref: string | undefined) => {
          const backups = vm.state.backups;
          const byIndex = ref !== undefined && /^\d+$/.test(ref) ? backups[Number(ref) - 1] : undefined;
          const backup = byIndex || backups.find((b) => b.id === ref);
          if (!backup) throw new Error(`Backup not found: ${ref ?? '(none given)'}`);
          return backup;
        };

        switch (action || 'list') {
          case 'list': {
            const backups = vm.state.backups;
            print('history', backups, options, () => formatBackups(backups));
            return;
          }
          case 'diff': {
            await vm.selectForComparison(find(args[0]));
            await vm.selectForComparison(find(args[1]));
            throwIfError(vm.state.error);
            const diff = vm.state.currentDiff;
            if (diff) print('history', diff, options, () => formatDiff(diff));
            return;
          }
          case 'restore': {
            requireWritable();
            const backup = find(args[0]);
            vm.confirmRestore(backup);
            await vm.restoreVersion();
            throwIfError(vm.state.error);
            print('history', { restored: backup.id }, options, () => `Restored ${backup.id}`);
            return;
          }
          case 'prune': {
            requireWritable();
            const keep = options.keep ? parseInt(options.keep, 10) : config.backupKeepCount;
            const before = vm.state.backups.length;
            await vm.pruneOld(Number.isNaN(keep) ? config.backupKeepCount : keep);
            throwIfError(vm.state.error);
            const removed = before - vm.state.backups.length;
            print('history', { removed }, options, () => `Removed ${removed} backup${removed === 1 ? '' : 's'}`);
            return;
          }
          default:
            throw new Error(`Unknown history action: ${action}`);
        }
      } catch (error) {
        console.error('History failed:', error);
        process.exit(1);
      }
    });
}

// =============================================================================
// VIOLATIONS
// =============================================================================

function createInspector(withAnalyzer: boolean): ViolationInspectorViewModel {
  const storage = createStorage();
  return new ViolationInspectorViewModel(
    storage,
    withAnalyzer ? new WorkspaceAnalyzer(createCLI(), storage) : undefined
  );
}

function parseViolationSort(value: string): ViolationSortOption {
  if (value === 'file' || value === 'rule' || value === 'severity' || value === 'date' || value === 'line') {
    return value;
  }
  throw new Error(`Unknown sort option: ${value}`);
}

function registerViolationCommands(program: Command): void {
  program
    .command('lint')
    .description('Run SwiftLint on the workspace and store the violations')
    .option('-v, --verbose', 'Print the swiftlint command and the number of Swift files')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (options: OutputOptions & { verbose?: boolean }) => {
      try {
        const config = getConfig();
        const manager = new WorkspaceManager(config);
        const workspace = await manager.openWorkspace(workspaceRoot()).catch(() => createWorkspace(workspaceRoot(), config));

        if (options.verbose) {
          const cli = createCLI();
          const files = await findSwiftFiles(workspace.path);
          console.error(`$ ${cli.describeCommand(cli.lintArguments(workspace.configPath, workspace.path))}`);
          console.error(`${files.length} Swift file${files.length === 1 ? '' : 's'} in ${workspace.path}`);
        }

        const vm = createInspector(true);
        await vm.loadViolations(workspace.id, workspace);
        throwIfError(vm.state.error);
        if (manager.currentWorkspace) await manager.markAnalyzed();

        const violations = vm.state.filteredViolations;
        print(
          'lint',
          { violations, errors: vm.errorCount, warnings: vm.warningCount },
          options,
          () => formatViolations(violations)
        );
        if (vm.errorCount > 0) process.exitCode = 2;
      } catch (error) {
        console.error('Lint failed:', error);
        process.exit(1);
      }
    });

  program
    .command('violations')
    .description('Show stored violations')
    .option('--rule <ids>', 'Comma-separated rule ids')
    .option('--severity <levels>', 'Comma-separated: warning, error')
    .option('--file <paths>', 'Comma-separated file paths')
    .option('--suppressed', 'Only suppressed violations')
    .option('-s, --search <text>', 'Search rule, message and path')
    .option('--sort <sort>', 'file, rule, severity, date or line', 'file')
    .option('--desc', 'Descending order')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(
      async (
        options: OutputOptions & {
          rule?: string;
          severity?: string;
          file?: string;
          suppressed?: boolean;
          search?: string;
          sort: string;
          desc?: boolean;
        }
      ) => {
        try {
          const vm = createInspector(false);
          await vm.loadViolations(workspaceId(workspaceRoot()));
          vm.updateFilters({
            searchText: options.search || '',
            selectedRuleIds: splitList(options.rule) || [],
            selectedSeverities: (splitList(options.severity) || []).filter(isSeverity),
            selectedFiles: splitList(options.file) || [],
            showSuppressedOnly: options.suppressed === true,
            sortOption: parseViolationSort(options.sort),
            sortOrder: options.desc ? 'descending' : 'ascending',
          });

          const violations = vm.state.filteredViolations;
          print('violations', violations, options, () => formatViolations(violations));
        } catch (error) {
          console.error('Listing violations failed:', error);
          process.exit(1);
        }
      }
    );

  /**
   * Select violations by id or id prefix (the list shows the first 8 characters)
   */
  async function selectViolations(vm: ViolationInspectorViewModel, refs: string[]): Promise<string[]> {
    await vm.loadViolations(workspaceId(workspaceRoot()));
    const ids = refs.map((ref) => {
      const matches = vm.state.violations.filter((v) => v.id.startsWith(ref));
      if (matches.length !== 1) {
        throw new Error(matches.length === 0 ? `No violation matches '${ref}'` : `'${ref}' matches several violations`);
      }
      return matches[0].id;
    });
    for (const id of ids) vm.toggleSelection(id);
    return ids;
  }

  program
    .command('suppress <ids...>')
    .description('Suppress violations by id')
    .option('-r, --reason <text>', 'Why the violations are suppressed', 'Suppressed from CLI')
    .action(async (refs: string[], options: { reason: string }) => {
      try {
        const vm = createInspector(false);
        const ids = await selectViolations(vm, refs);
        await vm.suppressSelectedViolations(options.reason);
        console.log(`Suppressed ${ids.length} violation${ids.length === 1 ? '' : 's'}`);
      } catch (error) {
        console.error('Suppress failed:', error);
        process.exit(1);
      }
    });

  program
    .command('resolve <ids...>')
    .description('Mark violations as resolved')
    .action(async (refs: string[]) => {
      try {
        const vm = createInspector(false);
        const ids = await selectViolations(vm, refs);
        await vm.resolveSelectedViolations();
        console.log(`Resolved ${ids.length} violation${ids.length === 1 ? '' : 's'}`);
      } catch (error) {
        console.error('Resolve failed:', error);
        process.exit(1);
      }
    });
}

// =============================================================================
// VERSIONS
// =============================================================================

function registerVersionCommands(program: Command): void {
  program
    .command('compat')
    .description('Check the configuration against a SwiftLint version')
    .option('--version <version>', 'SwiftLint version (defaults to the installed one)')
    .option('--fix', 'Apply every rename and drop removed rules')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (options: OutputOptions & { version?: string; fix?: boolean }) => {
      try {
        const vm = new VersionCompatibilityViewModel(new VersionCompatibilityChecker(), createCLI(), configPath());
        await vm.checkCompatibility(options.version);
        throwIfError(vm.state.error);

        if (options.fix && vm.state.report?.hasIssues) {
          requireWritable();
          await vm.applyAllFixes();
          throwIfError(vm.state.error);
        }

        const report = vm.state.report;
        if (report) print('compat', report, options, () => formatCompatibility(report));
      } catch (error) {
        console.error('Compatibility check failed:', error);
        process.exit(1);
      }
    });

  program
    .command('migrate')
    .description('Plan (and apply) config changes after upgrading SwiftLint')
    .requiredOption('--from <version>', 'SwiftLint version the config was written for')
    .option('--to <version>', 'Target version (defaults to the installed one)')
    .option('--apply', 'Write the automatic steps, with a backup')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (options: OutputOptions & { from: string; to?: string; apply?: boolean }) => {
      try {
        const vm = new MigrationAssistantViewModel(new MigrationAssistant(), createCLI(), configPath());
        vm.setPreviousVersion(options.from);
        await vm.detectMigrations(options.to);
        throwIfError(vm.state.error);

        const plan = vm.state.migrationPlan;
        if (!plan) return;
        const diff = await vm.previewChanges();
        throwIfError(vm.state.error);

        if (options.apply && plan.autoApplyableSteps.length > 0) {
          requireWritable();
          await vm.applyMigration();
          throwIfError(vm.state.error);
        }

        print('migrate', { plan, diff, applied: vm.state.migrationComplete }, options, () => {
          const lines = [formatMigrationPlan(plan)];
          if (diff && plan.autoApplyableSteps.length > 0) lines.push('', formatDiff(diff));
          if (vm.state.migrationComplete) lines.push('', 'Migration applied.');
          return lines.join('\n');
        });
      } catch (error) {
        console.error('Migration failed:', error);
        process.exit(1);
      }
    });
}

// =============================================================================
// WORKSPACES
// =============================================================================

function registerWorkspaceCommands(program: Command): void {
  program
    .command('init')
    .description('Create a default .swiftlint.yml in the workspace')
    .option('--exclusions', 'Add build and dependency directories to excluded')
    .action(async (options: { exclusions?: boolean }) => {
      try {
        requireWritable();
        const manager = new WorkspaceManager(getConfig());
        await manager.openWorkspace(workspaceRoot());
        const existed = !manager.configFileMissing;
        const file = await manager.createDefaultConfigFile();
        console.log(existed ? `Configuration already exists: ${file}` : `Created ${file}`);

        if (options.exclusions) {
          const engine = await loadYamlConfig(file);
          const updated = engine.getConfig();
          const before = updated.excluded || [];
          updated.excluded = mergeExclusions(updated.excluded);
          if (updated.excluded.length > before.length) {
            await engine.save(updated);
            console.log(`Excluded: ${updated.excluded.join(', ')}`);
          }
        }
      } catch (error) {
        console.error('Init failed:', error);
        process.exit(1);
      }
    });

  program
    .command('workspaces')
    .description('List recently opened workspaces')
    .option('--remove <id>', 'Remove a workspace from the list')
    .option('--clear', 'Clear the list')
    .option('--json', 'Output as JSON')
    .option('--agent', 'Output wrapped in agent envelope (implies --json)')
    .action(async (options: OutputOptions & { remove?: string; clear?: boolean }) => {
      try {
        const manager = new WorkspaceManager(getConfig());
        await manager.loadRecentWorkspaces();
        if (options.clear) await manager.clearRecent();
        if (options.remove) await manager.removeFromRecent(options.remove);

        const workspaces = manager.recentWorkspaces;
        print('workspaces', workspaces, options, () => formatWorkspaces(workspaces));
      } catch (error) {
        console.error('Listing workspaces failed:', error);
        process.exit(1);
      }
    });

  program
    .command('ui')
    .description('Serve the read-only dashboard for the workspace')
    .option('-p, --port <port>', 'Port to serve on')
    .action(async (options: { port?: string }) => {
      try {
        if (isSandboxMode()) {
          console.log('Dashboard not available in sandbox mode.');
          return;
        }

        const port = options.port ? parseInt(options.port, 10) : getConfig().uiPort;
        const workspacePath = workspaceRoot();
        const server = await startUIServer({ port, workspacePath });

        console.log('');
        console.log('rulestudio Dashboard');
        console.log(`   Workspace: ${workspacePath}`);
        console.log(`   Running at: http://localhost:${server.port}`);
        console.log('');
        console.log('Press Ctrl+C to stop');

        const cleanup = () => {
          console.log('\nShutting down...');
          server.close();
          process.exit(0);
        };
        process.on('SIGINT', cleanup);
        process.on('SIGTERM', cleanup);
      } catch (error) {
        console.error('Failed to start UI:', error);
        process.exit(1);
      }
    });
}

// =============================================================================
// PROGRAM
// =============================================================================

export function createProgram(): Command {
  const program = new Command();

  program
    .name('rulestudio')
    .description('Configuration studio for SwiftLint')
    .version('0.1.0')
    .enablePositionalOptions()
    .option('--sandbox', 'Run in sandbox mode (no network, no child processes)')
    .option('-w, --workspace <path>', 'Workspace directory (defaults to current directory)');

  // Apply global options before any command runs
  program.hook('preAction', (thisCommand) => {
    const options = thisCommand.opts<GlobalOptions>();
    workspaceOption = options.workspace;
    if (options.sandbox) {
      process.env.RULESTUDIO_SANDBOX = '1';
    }
  });

  registerStatusCommands(program);
  registerRuleCommands(program);
  registerEditingCommands(program);
  registerQualityCommands(program);
  registerComparisonCommands(program);
  registerImportCommands(program);
  registerHistoryCommands(program);
  registerViolationCommands(program);
  registerVersionCommands(program);
  registerWorkspaceCommands(program);

  return program;
}
