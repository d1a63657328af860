/**
 * rulestudio Violation Storage
 * One JSON file per workspace under <storage>/violations/
 */

import * as fs from 'fs';
import * as path from 'path';
import { Violation, ViolationFilter, isSeverity } from './types.js';
import { SCHEMA_VERSION, getConfig, getViolationsPath } from './config.js';
import { isObject } from './data-loader.js';

interface ViolationFile {
  schema_version: string;
  workspace_id: string;
  violations: Violation[];
}

export interface ViolationStore {
  storeViolations(violations: Violation[], workspaceId: string): Promise<void>;
  fetchViolations(filter: ViolationFilter, workspaceId?: string): Promise<Violation[]>;
  suppressViolations(ids: string[], reason: string): Promise<void>;
  resolveViolations(ids: string[]): Promise<void>;
  deleteViolations(workspaceId: string): Promise<void>;
  getViolationCount(filter: ViolationFilter, workspaceId?: string): Promise<number>;
}

// =============================================================================
// FILTERING
// =============================================================================

export function matchesFilter(violation: Violation, filter: ViolationFilter): boolean {
  if (filter.ruleIds && !filter.ruleIds.includes(violation.ruleId)) return false;
  if (filter.filePaths && !filter.filePaths.includes(violation.filePath)) return false;
  if (filter.severities && !filter.severities.includes(violation.severity)) return false;
  if (filter.suppressedOnly !== undefined && violation.suppressed !== filter.suppressedOnly) return false;
  if (
    filter.dateRange &&
    (violation.detectedAt < filter.dateRange.start || violation.detectedAt > filter.dateRange.end)
  ) {
    return false;
  }
  return true;
}

function isViolation(record: unknown): record is Violation {
  return (
    isObject(record) &&
    typeof record['id'] === 'string' &&
    typeof record['ruleId'] === 'string' &&
    typeof record['filePath'] === 'string' &&
    typeof record['line'] === 'number' &&
    isSeverity(record['severity']) &&
    typeof record['message'] === 'string' &&
    typeof record['detectedAt'] === 'number' &&
    typeof record['suppressed'] === 'boolean'
  );
}

function carryOver(violation: Violation, earlier: Violation | undefined): Violation {
  if (!earlier) return violation;
  let next = violation;
  if (earlier.suppressed) {
    next = { ...next, suppressed: true, suppressionReason: earlier.suppressionReason };
  }
  if (earlier.resolvedAt !== undefined && next.resolvedAt === undefined) {
    next = { ...next, resolvedAt: earlier.resolvedAt };
  }
  return next;
}

// =============================================================================
// STORE
// =============================================================================

export class ViolationStorage implements ViolationStore {
  readonly directory: string;

  constructor(directory?: string) {
    this.directory = directory || getViolationsPath(getConfig());
  }

  /**
   * Replace the stored set for a workspace. Suppression and resolution carry
   * over to violations that keep the same id.
   */
  async storeViolations(violations: Violation[], workspaceId: string): Promise<void> {
    const previous = new Map((await this.readWorkspace(workspaceId)).map((v) => [v.id, v]));

    const unique = new Map<string, Violation>();
    for (const violation of violations) {
      unique.set(violation.id, carryOver(violation, previous.get(violation.id)));
    }

    await this.writeWorkspace(workspaceId, Array.from(unique.values()));
  }

  /**
   * Newest first
   */
  async fetchViolations(filter: ViolationFilter, workspaceId?: string): Promise<Violation[]> {
    const all = workspaceId ? await this.readWorkspace(workspaceId) : await this.readAll();
    return all.filter((v) => matchesFilter(v, filter)).sort((a, b) => b.detectedAt - a.detectedAt);
  }

  async suppressViolations(ids: string[], reason: string): Promise<void> {
    await this.updateWhere(ids, (v) => ({ ...v, suppressed: true, suppressionReason: reason }));
  }

  async resolveViolations(ids: string[]): Promise<void> {
    const now = Date.now();
    await this.updateWhere(ids, (v) => ({ ...v, resolvedAt: now }));
  }

  async deleteViolations(workspaceId: string): Promise<void> {
    await fs.promises.rm(this.fileFor(workspaceId), { force: true });
  }

  async getViolationCount(filter: ViolationFilter, workspaceId?: string): Promise<number> {
    return (await this.fetchViolations(filter, workspaceId)).length;
  }

  private fileFor(workspaceId: string): string {
    return path.join(this.directory, `${workspaceId.replace(/[^a-zA-Z0-9_-]/g, '_')}.json`);
  }

  private async workspaceIds(): Promise<string[]> {
    if (!fs.existsSync(this.directory)) return [];
    const files = await fs.promises.readdir(this.directory);
    return files.filter((f) => f.endsWith('.json')).map((f) => f.slice(0, -'.json'.length));
  }

  /**
   * Unreadable or malformed files read as empty
   */
  private async readWorkspace(workspaceId: string): Promise<Violation[]> {
    const filePath = this.fileFor(workspaceId);
    if (!fs.existsSync(filePath)) return [];

    try {
      const parsed: unknown = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
      const list = isObject(parsed) ? parsed['violations'] : undefined;
      return Array.isArray(list) ? list.filter(isViolation) : [];
    } catch {
      return [];
    }
  }

  private async readAll(): Promise<Violation[]> {
    const all: Violation[] = [];
    for (const id of await this.workspaceIds()) {
      all.push(...(await this.readWorkspace(id)));
    }
    return all;
  }

  private async writeWorkspace(workspaceId: string, violations: Violation[]): Promise<void> {
    await fs.promises.mkdir(this.directory, { recursive: true });
    const file: ViolationFile = { schema_version: SCHEMA_VERSION, workspace_id: workspaceId, violations };
    await fs.promises.writeFile(this.fileFor(workspaceId), JSON.stringify(file, null, 2), 'utf-8');
  }

  private async updateWhere(ids: string[], update: (violation: Violation) => Violation): Promise<void> {
    const wanted = new Set(ids);
    for (const workspaceId of await this.workspaceIds()) {
      const violations = await this.readWorkspace(workspaceId);
      if (!violations.some((v) => wanted.has(v.id))) continue;
      await this.writeWorkspace(
        workspaceId,
        violations.map((v) => (wanted.has(v.id) ? update(v) : v))
      );
    }
  }
}
