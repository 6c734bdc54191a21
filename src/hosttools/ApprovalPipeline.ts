/**
 * HarborGate ApprovalPipeline
 * Promotes staged tool scripts into the per-project approved store
 *
 * Only this pipeline writes the approved store; the registry only reads it.
 */

import { createTwoFilesPatch } from 'diff';
import fs from 'fs-extra';
import path from 'path';
import { HostToolsConfig, SyncItem } from '../types';
import { AuditEvent, AuditSink } from '../storage/AuditLog';
import { ConfigError, errorMessage } from '../core/errors';
import { logger } from '../core/Logger';
import { ApprovalPrompter } from './ApprovalPrompter';
import { listToolsInDir } from './HostToolRegistry';
import { compareFiles, copyTool, projectApprovedDir, stagingDirectories, writeProjectMarker } from './ToolStore';

export interface SyncReport {
  approved: string[];
  rejected: string[];
  failed: Array<{ name: string; error: string }>;
  unchanged: string[];
}

export interface ApprovalPipelineOptions {
  workspaceRoot: string;
  audit?: AuditSink;
}

/** Unified diff from the approved copy to the staged one. */
export async function renderDiff(item: SyncItem): Promise<string> {
  const [approved, staged] = await Promise.all([
    fs.readFile(item.approvedPath, 'utf8'),
    fs.readFile(item.stagingPath, 'utf8'),
  ]);
  return createTwoFilesPatch(item.approvedPath, item.stagingPath, approved, staged, 'approved', 'staging');
}

export class ApprovalPipeline {
  private readonly workspaceRoot: string;
  private readonly auditSink?: AuditSink;

  constructor(private readonly config: HostToolsConfig, options: ApprovalPipelineOptions) {
    this.workspaceRoot = options.workspaceRoot;
    this.auditSink = options.audit;
  }

  get approvedDir(): string {
    if (!this.config.approvedDir) {
      throw new ConfigError('hostAccess.hostTools.approvedDir must be set to sync tools');
    }
    return projectApprovedDir(this.config.approvedDir, this.workspaceRoot);
  }

  /** Compare every staged tool with its approved counterpart. */
  async detectChanges(): Promise<SyncItem[]> {
    return (await this.scan()).items;
  }

  /**
   * Staged tools deduplicated by name, the first staging directory winning as
   * it does for the registry. A tool that cannot be compared is reported in
   * `failed` instead of aborting the scan.
   */
  private async scan(): Promise<{ items: SyncItem[]; failed: SyncReport['failed'] }> {
    const approvedDir = this.approvedDir;
    const items: SyncItem[] = [];
    const failed: SyncReport['failed'] = [];
    const seen = new Set<string>();

    for (const dir of stagingDirectories(this.config, this.workspaceRoot)) {
      for (const tool of await listToolsInDir(dir, this.config.allowedExtensions)) {
        if (seen.has(tool.name)) {
          logger.warn('Ignoring shadowed staged tool', { tool: tool.name, dir });
          continue;
        }
        seen.add(tool.name);

        const stagingPath = path.join(dir, tool.name);
        const approvedPath = path.join(approvedDir, tool.name);
        try {
          items.push({
            name: tool.name,
            description: tool.description,
            status: await compareFiles(stagingPath, approvedPath),
            stagingPath,
            approvedPath,
          });
        } catch (error) {
          logger.error('Failed to compare staged tool', { tool: tool.name, error: errorMessage(error) });
          failed.push({ name: tool.name, error: errorMessage(error) });
        }
      }
    }

    return { items, failed };
  }

  /**
   * Ask about every new or updated tool and copy the approved ones.
   * A failure to copy one tool does not stop the others.
   */
  async runInteractiveSync(prompter: ApprovalPrompter): Promise<SyncReport> {
    const report: SyncReport = { approved: [], rejected: [], failed: [], unchanged: [] };

    const approvedDir = this.approvedDir;
    await fs.ensureDir(approvedDir);
    try {
      await writeProjectMarker(approvedDir, this.workspaceRoot);
    } catch (error) {
      logger.warn('Failed to write project marker', { dir: approvedDir, error: errorMessage(error) });
    }

    const { items, failed } = await this.scan();
    const pending = items.filter((item) => item.status !== 'unchanged');
    report.unchanged.push(...items.filter((item) => item.status === 'unchanged').map((item) => item.name));

    for (const failure of failed) {
      report.failed.push(failure);
      await prompter.notify(`    ❌ Error: ${failure.name}: ${failure.error}`);
      await this.audit({ operation: 'sync', target: failure.name, decision: 'FAILED', reason: failure.error });
    }

    if (pending.length === 0) {
      if (failed.length === 0) {
        await prompter.notify('All tools are up to date. No sync needed.');
      }
      return report;
    }

    for (const item of pending) {
      try {
        const decision = await this.decide(item, prompter);
        if (decision === 'approve') {
          await copyTool(item.stagingPath, item.approvedPath);
          report.approved.push(item.name);
          await prompter.notify(item.status === 'new' ? '    ✅ Copied' : '    ✅ Updated');
          await this.audit({ operation: 'sync', target: item.name, decision: 'APPROVED', reason: item.status });
        } else {
          report.rejected.push(item.name);
          await prompter.notify('    ⏭️  Skipped');
          await this.audit({ operation: 'sync', target: item.name, decision: 'REJECTED', reason: item.status });
        }
      } catch (error) {
        const message = errorMessage(error);
        logger.error('Tool sync failed', { tool: item.name, error: message });
        report.failed.push({ name: item.name, error: message });
        await prompter.notify(`    ❌ Error: ${message}`);
        await this.audit({ operation: 'sync', target: item.name, decision: 'FAILED', reason: message });
      }
    }

    logger.info('Tool sync finished', {
      approved: report.approved.length,
      rejected: report.rejected.length,
      failed: report.failed.length,
    });
    return report;
  }

  /** Ask once; a diff request on an updated item shows the diff and asks again. */
  private async decide(item: SyncItem, prompter: ApprovalPrompter): Promise<'approve' | 'reject'> {
    const diffAvailable = item.status === 'updated';
    const first = await prompter.present({ item, diffAvailable });
    if (first !== 'diff') {
      return first;
    }
    if (!diffAvailable) {
      return 'reject';
    }

    await prompter.showDiff(item, await renderDiff(item));
    const second = await prompter.present({ item, diffAvailable: false });
    return second === 'approve' ? 'approve' : 'reject';
  }

  private async audit(event: Omit<AuditEvent, 'surface'>): Promise<void> {
    if (!this.auditSink) {
      return;
    }
    try {
      await this.auditSink.record({ surface: 'approval', ...event });
    } catch (error) {
      logger.error('Audit sink failed', { error: errorMessage(error) });
    }
  }
}
