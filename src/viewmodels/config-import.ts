/**
 * rulestudio Config Import
 * Fetch a remote .swiftlint.yml, preview it and apply it
 */

import { ConfigImportPreview, ImportMode } from '../types.js';
import { UrlFetchError } from '../errors.js';
import { ConfigImportService } from '../config-import.js';
import { ViewModel } from './base.js';

type ImportService = Pick<ConfigImportService, 'fetchAndPreview' | 'applyImport'>;

export interface ConfigImportState {
  urlString: string;
  preview: ConfigImportPreview | null;
  importMode: ImportMode;
  isFetching: boolean;
  isImporting: boolean;
  error: unknown;
  importComplete: boolean;
}

function isParsableUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

export class ConfigImportViewModel extends ViewModel<ConfigImportState> {
  constructor(
    private readonly importService: ImportService,
    private readonly configPath: string | null
  ) {
    super({
      urlString: '',
      preview: null,
      importMode: 'merge',
      isFetching: false,
      isImporting: false,
      error: null,
      importComplete: false,
    });
  }

  setUrl(urlString: string): void {
    this.setState({ urlString });
  }

  setImportMode(importMode: ImportMode): void {
    this.setState({ importMode });
  }

  async fetchPreview(): Promise<void> {
    const { urlString } = this.state;
    if (urlString.trim() === '' || !isParsableUrl(urlString)) {
      this.setState({ error: UrlFetchError.invalidUrl() });
      return;
    }

    this.setState({ isFetching: true, error: null, preview: null, importComplete: false });
    try {
      const preview = await this.importService.fetchAndPreview(urlString, this.configPath ?? undefined);
      this.setState({ preview });
    } catch (error) {
      this.setState({ error });
    } finally {
      this.setState({ isFetching: false });
    }
  }

  async applyImport(): Promise<void> {
    const { preview, importMode } = this.state;
    if (!preview || !this.configPath) return;

    this.setState({ isImporting: true, error: null });
    try {
      await this.importService.applyImport(preview, importMode, this.configPath);
      this.setState({ importComplete: true });
    } catch (error) {
      this.setState({ error });
    } finally {
      this.setState({ isImporting: false });
    }
  }
}
