/**
 * rulestudio Config Import
 * Preview and apply a configuration fetched from a URL
 */

import * as fs from 'fs';
import { ConfigDiff, ConfigImportPreview, ImportMode, StudioYamlConfig, emptyConfig } from './types.js';
import { ConfigImportError, errorMessage } from './errors.js';
import { URLConfigFetcher } from './url-fetcher.js';
import { YamlConfigEngine, loadYamlConfig, parseConfigContent } from './yaml-config.js';

export const EMPTY_CONFIG_MESSAGE = 'Configuration appears empty - no rules defined.';

function unionSorted(existing: string[] | undefined, imported: string[] | undefined): string[] | undefined {
  if (!imported) return existing;
  return Array.from(new Set([...(existing || []), ...imported])).sort();
}

/**
 * Imported rules win; disabled, opt-in and excluded lists are unioned
 */
export function mergeConfigs(current: StudioYamlConfig, imported: StudioYamlConfig): StudioYamlConfig {
  return {
    ...current,
    rules: { ...current.rules, ...imported.rules },
    disabledRules: unionSorted(current.disabledRules, imported.disabledRules),
    optInRules: unionSorted(current.optInRules, imported.optInRules),
    excluded: unionSorted(current.excluded, imported.excluded),
  };
}

export class ConfigImportService {
  constructor(private readonly fetcher: Pick<URLConfigFetcher, 'fetchConfig'> = new URLConfigFetcher()) {}

  async fetchAndPreview(url: string, currentConfigPath?: string): Promise<ConfigImportPreview> {
    let content: string;
    try {
      content = await this.fetcher.fetchConfig(url);
    } catch (error) {
      throw ConfigImportError.fetchFailed(errorMessage(error), error);
    }

    const validationErrors: string[] = [];
    let config: StudioYamlConfig;
    try {
      config = parseConfigContent(content);
    } catch {
      config = emptyConfig();
      validationErrors.push(EMPTY_CONFIG_MESSAGE);
    }

    let diff: ConfigDiff | undefined;
    if (currentConfigPath && fs.existsSync(currentConfigPath)) {
      const current = await loadYamlConfig(currentConfigPath);
      diff = current.generateDiff(config);
    }

    if (
      validationErrors.length === 0 &&
      Object.keys(config.rules).length === 0 &&
      config.disabledRules === undefined &&
      config.optInRules === undefined &&
      config.onlyRules === undefined
    ) {
      validationErrors.push(EMPTY_CONFIG_MESSAGE);
    }

    return { sourceUrl: url, content, config, diff, validationErrors };
  }

  async applyImport(preview: ConfigImportPreview, mode: ImportMode, configPath: string): Promise<void> {
    const engine = new YamlConfigEngine(configPath);
    try {
      if (mode === 'replace') {
        await engine.save(preview.config, true);
        return;
      }

      if (fs.existsSync(configPath)) {
        await engine.load();
        await engine.save(mergeConfigs(engine.getConfig(), preview.config), true);
      } else {
        await engine.save(preview.config, false);
      }
    } catch (error) {
      throw ConfigImportError.saveFailed(errorMessage(error), error);
    }
  }
}
