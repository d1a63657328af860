/**
 * rulestudio Rule Registry
 * Parses `swiftlint rules` output and rule documentation into Rule records
 */

import { Rule, RuleCategory, Severity, isRuleCategory } from './types.js';
import { RuleRegistryError } from './errors.js';
import { SwiftLintCLI } from './swiftlint-cli.js';

export const LOADING_DESCRIPTION = 'Loading...';
const NO_DESCRIPTION = 'No description available';

// =============================================================================
// RULES TABLE
// =============================================================================

/**
 * "force_cast" -> "Force Cast"
 */
export function ruleDisplayName(id: string): string {
  return id
    .split('_')
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

function createRule(id: string, category: RuleCategory, isOptIn: boolean): Rule {
  return {
    id,
    name: ruleDisplayName(id),
    description: LOADING_DESCRIPTION,
    category,
    isOptIn,
    isEnabled: !isOptIn,
    triggeringExamples: [],
    nonTriggeringExamples: [],
    supportsAutocorrection: false,
  };
}

/**
 * Parse the box-drawn table printed by `swiftlint rules`:
 *
 *   | identifier | opt-in | correctable | enabled in your config | kind | ...
 *   | force_cast | no     | no          | yes                    | idiomatic | ...
 */
export function parseRulesTable(output: string): Rule[] {
  const rules: Rule[] = [];

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('+') || !line.startsWith('|')) {
      continue;
    }

    const columns = line
      .split('|')
      .map((column) => column.trim())
      .filter((column) => column.length > 0);
    // identifier_name is a rule; only the header row has `identifier` on its own
    if (columns.length < 5 || columns[0] === 'identifier') continue;

    const kind = columns[4].toLowerCase();
    rules.push(createRule(columns[0], isRuleCategory(kind) ? kind : 'style', columns[1] === 'yes'));
  }

  return rules;
}

// =============================================================================
// RULE DOCUMENTATION
// =============================================================================

export interface ParsedRuleDocumentation {
  name: string;
  description: string;
  supportsAutocorrection: boolean;
  minimumSwiftVersion?: string;
  defaultSeverity?: Severity;
  triggeringExamples: string[];
  nonTriggeringExamples: string[];
}

/**
 * Parse the markdown written by `swiftlint generate-docs` for one rule
 */
export function parseRuleDocumentation(markdown: string): ParsedRuleDocumentation {
  const lines = markdown.split(/\r?\n/);
  const doc: ParsedRuleDocumentation = {
    name: '',
    description: '',
    supportsAutocorrection: false,
    triggeringExamples: [],
    nonTriggeringExamples: [],
  };

  if (lines[0]?.startsWith('#')) {
    doc.name = lines[0].replace(/^#+/, '').trim();
  }

  let section: 'triggering' | 'nonTriggering' | null = null;
  let inCodeBlock = false;
  let example: string[] = [];

  lines.forEach((line, index) => {
    const trimmed = line.trim();

    if (index === 1 && trimmed !== '' && !trimmed.startsWith('*') && !trimmed.startsWith('#')) {
      doc.description = trimmed;
    }

    if (trimmed.startsWith('```')) {
      if (inCodeBlock) {
        const text = example.join('\n').trim();
        if (text !== '' && section === 'triggering') doc.triggeringExamples.push(text);
        if (text !== '' && section === 'nonTriggering') doc.nonTriggeringExamples.push(text);
        example = [];
      }
      inCodeBlock = !inCodeBlock;
      return;
    }
    if (inCodeBlock) {
      example.push(line);
      return;
    }

    const meta = /^\* \*\*(.+?):\*\*\s*(.*)$/.exec(trimmed);
    if (meta) {
      const key = meta[1].toLowerCase();
      const value = meta[2].trim().replace(/^`(.*)`$/, '$1');
      if (key === 'supports autocorrection') doc.supportsAutocorrection = value.toLowerCase() === 'yes';
      if (key === 'minimum swift compiler version') doc.minimumSwiftVersion = value;
    }

    if (trimmed.includes('severity') && doc.defaultSeverity === undefined) {
      for (const next of lines.slice(index + 1, index + 10)) {
        const cell = next.trim();
        if (cell.startsWith('<td>') && cell.includes('</td>')) {
          const value = cell.replace(/<\/?td>/g, '').trim().toLowerCase();
          if (value === 'warning' || value === 'error') doc.defaultSeverity = value;
          break;
        }
      }
    }

    if (trimmed.startsWith('##')) {
      const heading = trimmed.replace(/^#+/, '').trim().toLowerCase();
      if (heading.includes('non triggering') || heading.includes('non-triggering')) {
        section = 'nonTriggering';
      } else if (heading.includes('triggering')) {
        section = 'triggering';
      } else {
        section = null;
      }
    }
  });

  return doc;
}

/**
 * Fallback parser for `swiftlint rules <id>` plain-text output.
 * First line reads "Name (identifier): description".
 */
export function parseRuleDetailText(text: string): ParsedRuleDocumentation {
  const lines = text.split(/\r?\n/);
  const doc: ParsedRuleDocumentation = {
    name: '',
    description: '',
    supportsAutocorrection: false,
    triggeringExamples: [],
    nonTriggeringExamples: [],
  };

  const header = lines[0] || '';
  const colon = header.indexOf(':');
  if (header.includes('(') && colon > 0) {
    doc.name = header.slice(0, header.indexOf('(')).trim();
    doc.description = header.slice(colon + 1).trim();
  }

  let section: 'triggering' | 'nonTriggering' | null = null;
  let example: string[] = [];

  const flush = (): void => {
    const text = example.join('\n').trim();
    if (text !== '' && section === 'triggering') doc.triggeringExamples.push(text);
    if (text !== '' && section === 'nonTriggering') doc.nonTriggeringExamples.push(text);
    example = [];
  };

  for (const line of lines.slice(1)) {
    if (line.includes('Non-Triggering Examples') || line.includes('Non Triggering Examples')) {
      flush();
      section = 'nonTriggering';
      continue;
    }
    if (line.includes('Triggering Examples')) {
      flush();
      section = 'triggering';
      continue;
    }
    if (line.includes('Configuration')) {
      flush();
      section = null;
      continue;
    }
    if (line.trim() === '' || line.includes('Example #')) {
      flush();
      continue;
    }
    if (section) {
      const clean = line.replace(/↓/g, '').trim();
      if (clean !== '') example.push(clean);
    }
  }
  flush();

  return doc;
}

function applyDocumentation(rule: Rule, doc: ParsedRuleDocumentation, markdown?: string): Rule {
  return {
    ...rule,
    name: doc.name || rule.name,
    description: doc.description || (rule.description === LOADING_DESCRIPTION ? NO_DESCRIPTION : rule.description),
    triggeringExamples: doc.triggeringExamples,
    nonTriggeringExamples: doc.nonTriggeringExamples,
    supportsAutocorrection: doc.supportsAutocorrection,
    minimumSwiftVersion: doc.minimumSwiftVersion,
    defaultSeverity: doc.defaultSeverity,
    severity: rule.severity || doc.defaultSeverity,
    markdownDocumentation: markdown,
  };
}

// =============================================================================
// REGISTRY
// =============================================================================

export class RuleRegistry {
  private rules: Rule[] = [];

  constructor(
    private readonly cli: Pick<SwiftLintCLI, 'executeRulesCommand' | 'executeRuleDetailCommand' | 'generateDocsForRule'>
  ) {}

  getRules(): Rule[] {
    return [...this.rules];
  }

  getRule(id: string): Rule | undefined {
    return this.rules.find((rule) => rule.id === id);
  }

  /**
   * Load all rules from `swiftlint rules`
   */
  async loadRules(): Promise<Rule[]> {
    const output = await this.cli.executeRulesCommand();
    const rules = parseRulesTable(output);
    if (rules.length === 0) {
      throw RuleRegistryError.noRules();
    }
    this.rules = rules;
    return this.getRules();
  }

  /**
   * Docs first; the plain `rules <id>` output when docs are unavailable or carry no examples
   */
  async fetchRuleDetails(rule: Rule): Promise<Rule> {
    const markdown = await this.cli.generateDocsForRule(rule.id).catch(() => '');
    let doc = markdown.trim() !== '' ? parseRuleDocumentation(markdown) : null;

    if (!doc || (doc.triggeringExamples.length === 0 && doc.nonTriggeringExamples.length === 0)) {
      const fallback = parseRuleDetailText(await this.cli.executeRuleDetailCommand(rule.id));
      doc = doc
        ? {
            ...doc,
            name: doc.name || fallback.name,
            description: doc.description || fallback.description,
            triggeringExamples: fallback.triggeringExamples,
            nonTriggeringExamples: fallback.nonTriggeringExamples,
          }
        : fallback;
    }

    const detailed = applyDocumentation(rule, doc, markdown.trim() !== '' ? markdown : undefined);
    this.replaceRule(detailed);
    return detailed;
  }

  /**
   * Fetch details for the first `limit` rules; a rule whose details fail keeps its summary record
   */
  async enrichRules(limit = 20): Promise<Rule[]> {
    await Promise.allSettled(this.rules.slice(0, limit).map((rule) => this.fetchRuleDetails(rule)));
    return this.getRules();
  }

  private replaceRule(rule: Rule): void {
    const index = this.rules.findIndex((r) => r.id === rule.id);
    if (index >= 0) {
      this.rules[index] = rule;
    } else {
      this.rules.push(rule);
    }
  }
}
