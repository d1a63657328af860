/**
 * rulestudio UI Server
 * Built-in read-only dashboard for a workspace's SwiftLint configuration
 */

import * as fs from 'fs';
import * as http from 'http';
import * as path from 'path';
import { Rule, Severity, StudioYamlConfig, ViolationFilter, isSeverity } from './types.js';
import { StudioConfig, getConfig, getViolationsPath } from './config.js';
import { StudioError, errorMessage } from './errors.js';
import { SwiftLintCLI } from './swiftlint-cli.js';
import { RuleRegistry } from './rule-registry.js';
import { loadYamlConfig } from './yaml-config.js';
import { ViolationStorage, ViolationStore } from './violation-storage.js';
import { VersionHistoryService, versionHistory } from './version-history.js';
import { ConfigComparisonService, ConfigComparisonServiceLike } from './comparison.js';
import { VersionCompatibilityChecker } from './compatibility.js';
import { ConfigurationHealthAnalyzer } from './health.js';
import { ConfigurationValidator } from './validator.js';
import { getAllPresets } from './presets.js';
import { GitService, getGitInfo } from './git.js';
import { workspaceId } from './workspace.js';
import { buildStatusSummary } from './agent-output.js';
import { configLabel } from './viewmodels/config-comparison.js';

export interface UIContext {
  workspacePath: string;
  config: StudioConfig;
  cli: Pick<SwiftLintCLI, 'getVersion' | 'executeRulesCommand' | 'executeRuleDetailCommand' | 'generateDocsForRule'>;
  storage: ViolationStore;
  history: VersionHistoryService;
  comparison: ConfigComparisonServiceLike;
  git: GitService;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

export function createUIContext(workspacePath: string, config: StudioConfig = getConfig()): UIContext {
  const root = path.resolve(workspacePath);
  return {
    workspacePath: root,
    config,
    cli: new SwiftLintCLI({ config }),
    storage: new ViolationStorage(getViolationsPath(config, root)),
    history: versionHistory,
    comparison: new ConfigComparisonService(),
    git: new GitService({ timeoutMs: config.gitTimeoutMs }),
  };
}

// =============================================================================
// API
// =============================================================================

function configPathFor(ctx: UIContext): string {
  return path.join(ctx.workspacePath, ctx.config.configFileName);
}

async function loadWorkspaceConfig(ctx: UIContext): Promise<StudioYamlConfig | null> {
  const configPath = configPathFor(ctx);
  if (!fs.existsSync(configPath)) return null;
  return (await loadYamlConfig(configPath)).getConfig();
}

/**
 * Rules from the installed SwiftLint, or none when it cannot be run
 */
async function tryLoadRules(ctx: UIContext): Promise<Rule[]> {
  try {
    return await new RuleRegistry(ctx.cli).loadRules();
  } catch {
    return [];
  }
}

function listParam(params: URLSearchParams, name: string): string[] | undefined {
  const values = params.getAll(name).flatMap((v) => v.split(',')).filter((v) => v !== '');
  return values.length > 0 ? values : undefined;
}

function violationFilter(params: URLSearchParams): ViolationFilter {
  const severities = listParam(params, 'severity')?.filter(isSeverity);
  const suppressed = params.get('suppressed');
  return {
    ruleIds: listParam(params, 'rule'),
    filePaths: listParam(params, 'file'),
    severities: severities && severities.length > 0 ? severities : undefined,
    suppressedOnly: suppressed === null ? undefined : suppressed === 'true',
  };
}

const noConfig = (ctx: UIContext): ApiResponse => ({
  status: 404,
  body: { error: `No ${ctx.config.configFileName} in workspace. Run: rulestudio init` },
});

/**
 * Route one API request. Pure apart from the context's services, so it can be
 * exercised without a listening server.
 */
export async function handleApiRequest(
  pathname: string,
  params: URLSearchParams,
  ctx: UIContext
): Promise<ApiResponse> {
  try {
    switch (pathname) {
      case '/api/status': {
        const config = await loadWorkspaceConfig(ctx);
        const violations = await ctx.storage.fetchViolations({}, workspaceId(ctx.workspacePath));
        const git = await getGitInfo(ctx.workspacePath, ctx.git);
        return {
          status: 200,
          body: buildStatusSummary({
            workspacePath: ctx.workspacePath,
            configPath: configPathFor(ctx),
            config,
            git: git ?? undefined,
            validation: config ? new ConfigurationValidator().validate(config) : undefined,
            violations,
          }),
        };
      }

      case '/api/config': {
        const configPath = configPathFor(ctx);
        if (!fs.existsSync(configPath)) return noConfig(ctx);
        const engine = await loadYamlConfig(configPath);
        return { status: 200, body: { path: configPath, content: engine.originalContent, config: engine.getConfig() } };
      }

      case '/api/rules':
        return { status: 200, body: await new RuleRegistry(ctx.cli).loadRules() };

      case '/api/violations':
        return {
          status: 200,
          body: await ctx.storage.fetchViolations(violationFilter(params), workspaceId(ctx.workspacePath)),
        };

      case '/api/backups':
        return { status: 200, body: await ctx.history.listBackups(configPathFor(ctx)) };

      case '/api/compare': {
        const left = params.get('left');
        const right = params.get('right');
        if (!left || !right) {
          return { status: 400, body: { error: 'Both left and right config paths are required' } };
        }
        return {
          status: 200,
          body: await ctx.comparison.compare(left, configLabel(left), right, configLabel(right)),
        };
      }

      case '/api/compat': {
        const config = await loadWorkspaceConfig(ctx);
        if (!config) return noConfig(ctx);
        const version = params.get('version') || (await ctx.cli.getVersion());
        return { status: 200, body: new VersionCompatibilityChecker().checkCompatibility(config, version) };
      }

      case '/api/health': {
        const config = await loadWorkspaceConfig(ctx);
        if (!config) return noConfig(ctx);
        return { status: 200, body: new ConfigurationHealthAnalyzer().analyze(config, await tryLoadRules(ctx)) };
      }

      case '/api/validate': {
        const config = await loadWorkspaceConfig(ctx);
        if (!config) return noConfig(ctx);
        const known = (await tryLoadRules(ctx)).map((rule) => rule.id);
        return { status: 200, body: new ConfigurationValidator().validate(config, known) };
      }

      case '/api/presets':
        return { status: 200, body: getAllPresets() };

      default:
        return { status: 404, body: { error: 'Not Found' } };
    }
  } catch (error) {
    return {
      status: 500,
      body: error instanceof StudioError ? { error: error.message, code: error.code } : { error: errorMessage(error) },
    };
  }
}

// =============================================================================
// SERVER
// =============================================================================

/**
 * Start the UI server
 */
export async function startUIServer(options: {
  port?: number;
  workspacePath?: string;
  context?: UIContext;
}): Promise<{ port: number; close: () => void }> {
  const config = getConfig();
  const port = options.port ?? config.uiPort;
  const ctx = options.context || createUIContext(options.workspacePath || process.cwd(), config);

  const server = http.createServer(async (req, res) => {
    const url = new URL(req.url || '/', `http://localhost:${port}`);

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.writeHead(200);
      res.end();
      return;
    }

    if (url.pathname === '/' || url.pathname === '/index.html') {
      res.writeHead(200, { 'Content-Type': 'text/html' });
      res.end(generateDashboardHTML(ctx.workspacePath));
      return;
    }

    const { status, body } = await handleApiRequest(url.pathname, url.searchParams, ctx);
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      const address = server.address();
      resolve({
        port: address !== null && typeof address === 'object' ? address.port : port,
        close: () => server.close(),
      });
    });
  });
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const SEVERITY_COLORS: Record<Severity, string> = { error: '#ef4444', warning: '#f59e0b' };

/**
 * Dashboard HTML. Everything on the page comes from the API.
 */
export function generateDashboardHTML(workspacePath: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>rulestudio</title>
  <style>
    * { box-sizing: border-box; margin: 0; padding: 0; }
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      background: #0a0a0a;
      color: #e5e5e5;
      min-height: 100vh;
    }
    .header {
      background: #171717;
      border-bottom: 1px solid #262626;
      padding: 12px 24px;
      display: flex;
      align-items: center;
      gap: 12px;
      position: sticky;
      top: 0;
    }
    .header h1 { font-size: 18px; font-weight: 600; }
    .nav { display: flex; gap: 4px; margin-left: 32px; }
    .nav-btn {
      background: transparent;
      border: none;
      color: #737373;
      padding: 8px 16px;
      border-radius: 6px;
      cursor: pointer;
      font-size: 14px;
      font-weight: 500;
    }
    .nav-btn:hover { color: #e5e5e5; background: #262626; }
    .nav-btn.active { color: #f97316; background: #f9731615; }
    .search-box {
      margin-left: auto;
      background: #262626;
      border: 1px solid #404040;
      color: #e5e5e5;
      padding: 8px 12px;
      border-radius: 6px;
      font-size: 14px;
      width: 240px;
    }
    .container { max-width: 1400px; margin: 0 auto; padding: 24px; }
    .grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(240px, 1fr)); gap: 16px; margin-bottom: 24px; }
    .card { background: #171717; border: 1px solid #262626; border-radius: 8px; padding: 20px; }
    .card h2 { font-size: 12px; font-weight: 500; color: #737373; margin-bottom: 8px; text-transform: uppercase; }
    .stat { font-size: 32px; font-weight: 700; color: #f97316; }
    .stat-label { font-size: 13px; color: #525252; margin-top: 4px; }
    .table { width: 100%; border-collapse: collapse; }
    .table th, .table td { text-align: left; padding: 10px 16px; border-bottom: 1px solid #262626; font-size: 13px; }
    .table th { color: #525252; font-weight: 500; font-size: 11px; text-transform: uppercase; background: #0f0f0f; }
    .table-wrapper { max-height: 600px; overflow-y: auto; border-radius: 8px; border: 1px solid #262626; }
    .badge { background: #262626; padding: 3px 10px; border-radius: 4px; font-size: 12px; color: #a3a3a3; }
    .badge.error { color: ${SEVERITY_COLORS.error}; }
    .badge.warning { color: ${SEVERITY_COLORS.warning}; }
    .mono { font-family: 'SF Mono', Monaco, monospace; font-size: 12px; color: #a3a3a3; }
    .loading, .empty { text-align: center; padding: 60px 20px; color: #525252; }
    .empty code { background: #262626; padding: 4px 12px; border-radius: 4px; color: #f97316; }
    .workspace-path { font-size: 12px; color: #525252; font-family: monospace; }
  </style>
</head>
<body>
  <div class="header">
    <h1>rulestudio</h1>
    <span class="workspace-path">${escapeHtml(workspacePath)}</span>
    <nav class="nav">
      <button class="nav-btn active" data-view="overview">Overview</button>
      <button class="nav-btn" data-view="rules">Rules</button>
      <button class="nav-btn" data-view="violations">Violations</button>
      <button class="nav-btn" data-view="history">History</button>
    </nav>
    <input type="text" class="search-box" placeholder="Search..." id="searchInput">
  </div>
  <div class="container">
    <div id="content"><div class="loading">Loading...</div></div>
  </div>
  <script>
    const data = { status: null, health: null, rules: [], violations: [], backups: [] };
    let currentView = 'overview';
    let query = '';

    const esc = (s) => String(s).replace(/[&<>"']/g, (c) => ({ '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;', "'": '&#39;' })[c]);
    const getJson = (url) => fetch(url).then((r) => r.json()).catch(() => null);

    document.querySelectorAll('.nav-btn').forEach((btn) => {
      btn.addEventListener('click', () => {
        document.querySelectorAll('.nav-btn').forEach((b) => b.classList.remove('active'));
        btn.classList.add('active');
        currentView = btn.dataset.view;
        render();
      });
    });
    document.getElementById('searchInput').addEventListener('input', (e) => {
      query = e.target.value.toLowerCase();
      render();
    });

    async function loadData() {
      const [status, health, rules, violations, backups] = await Promise.all([
        getJson('/api/status'), getJson('/api/health'), getJson('/api/rules'),
        getJson('/api/violations'), getJson('/api/backups'),
      ]);
      Object.assign(data, {
        status,
        health: health && !health.error ? health : null,
        rules: Array.isArray(rules) ? rules : [],
        violations: Array.isArray(violations) ? violations : [],
        backups: Array.isArray(backups) ? backups : [],
      });
      render();
    }

    function render() {
      const content = document.getElementById('content');
      if (!data.status || !data.status.config.exists) {
        content.innerHTML = '<div class="empty"><h2>No configuration</h2><p>Run <code>rulestudio init</code> in this workspace.</p></div>';
        return;
      }
      if (currentView === 'overview') content.innerHTML = renderOverview();
      if (currentView === 'rules') content.innerHTML = renderRules();
      if (currentView === 'violations') content.innerHTML = renderViolations();
      if (currentView === 'history') content.innerHTML = renderHistory();
    }

    function renderOverview() {
      const s = data.status;
      const h = data.health;
      return \`
        <div class="grid">
          <div class="card"><h2>Health</h2><div class="stat">\${h ? esc(h.grade) : '-'}</div><div class="stat-label">\${h ? h.score + '/100' : 'SwiftLint unavailable'}</div></div>
          <div class="card"><h2>Configured rules</h2><div class="stat">\${s.config.rule_count}</div><div class="stat-label">\${s.config.opt_in_count} opt-in, \${s.config.disabled_count} disabled</div></div>
          <div class="card"><h2>Violations</h2><div class="stat">\${s.violations.total}</div><div class="stat-label">\${s.violations.errors} errors, \${s.violations.warnings} warnings</div></div>
          <div class="card"><h2>Backups</h2><div class="stat">\${data.backups.length}</div><div class="stat-label">Saved versions of the config</div></div>
        </div>
        <div class="card"><h2>Next actions</h2>
          \${s.next_actions.map((a) => \`<p>\${esc(a.action)} <span class="mono">\${esc(a.command || '')}</span></p>\`).join('') || '<p class="stat-label">Nothing to do</p>'}
        </div>\`;
    }

    function renderRules() {
      const rows = data.rules.filter((r) => !query || r.id.includes(query) || r.name.toLowerCase().includes(query));
      return \`<div class="table-wrapper"><table class="table">
        <thead><tr><th>Identifier</th><th>Name</th><th>Category</th><th>Opt-in</th><th>Enabled</th></tr></thead>
        <tbody>\${rows.map((r) => \`<tr><td class="mono">\${esc(r.id)}</td><td>\${esc(r.name)}</td><td>\${esc(r.category)}</td><td>\${r.isOptIn ? 'yes' : ''}</td><td>\${r.isEnabled ? 'yes' : ''}</td></tr>\`).join('')}</tbody>
      </table></div>\`;
    }

    function renderViolations() {
      const rows = data.violations.filter((v) => !query || v.ruleId.includes(query) || v.filePath.toLowerCase().includes(query) || v.message.toLowerCase().includes(query));
      return \`<div class="table-wrapper"><table class="table">
        <thead><tr><th>Severity</th><th>Rule</th><th>Location</th><th>Message</th></tr></thead>
        <tbody>\${rows.map((v) => \`<tr><td><span class="badge \${esc(v.severity)}">\${esc(v.severity)}</span></td><td class="mono">\${esc(v.ruleId)}</td><td class="mono">\${esc(v.filePath)}:\${v.line}</td><td>\${esc(v.message)}\${v.suppressed ? ' <span class="badge">suppressed</span>' : ''}</td></tr>\`).join('')}</tbody>
      </table></div>\`;
    }

    function renderHistory() {
      return \`<div class="table-wrapper"><table class="table">
        <thead><tr><th>Backup</th><th>Saved</th><th>Size</th></tr></thead>
        <tbody>\${data.backups.map((b) => \`<tr><td class="mono">\${esc(b.id)}</td><td>\${new Date(b.timestamp * 1000).toLocaleString()}</td><td>\${b.fileSize} B</td></tr>\`).join('')}</tbody>
      </table></div>\`;
    }

    loadData();
  </script>
</body>
</html>`;
}
