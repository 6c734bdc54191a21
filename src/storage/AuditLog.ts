/**
 * HarborGate AuditLog
 * Audit trail in JSON Lines format (~/.harborgate/audit.jsonl)
 */

import fs from 'fs-extra';
import path from 'path';
import { HARBORGATE_DATA_DIR, logger } from '../core/Logger';

const AUDIT_FILE = path.join(HARBORGATE_DATA_DIR, 'audit.jsonl');

export type AuditSurface = 'container' | 'host-command' | 'host-tool' | 'approval';

export type AuditDecision = 'ALLOWED' | 'DENIED' | 'FAILED' | 'APPROVED' | 'REJECTED';

export interface AuditRecord {
  timestamp: string;
  surface: AuditSurface;
  operation: string;
  target: string;
  detail?: string;
  decision: AuditDecision;
  reason?: string;
  durationMs?: number;
}

export type AuditEvent = Omit<AuditRecord, 'timestamp'>;

/** Receives every allow, deny and failure from the enforcement surfaces. */
export interface AuditSink {
  record(event: AuditEvent): Promise<void>;
}

export class AuditLog {
  /**
   * Append a record to the trail (JSON Lines format)
   */
  static async append(record: AuditRecord, file: string = AUDIT_FILE): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(file));
      await fs.appendFile(file, JSON.stringify(record) + '\n', 'utf8');
      logger.debug('Audit record written', { surface: record.surface, decision: record.decision });
    } catch (error) {
      logger.error('Failed to write audit record', { error });
      // Audit failures never fail the audited operation
    }
  }

  /**
   * Read every record. Lines that are not valid JSON are skipped.
   */
  static async readAll(file: string = AUDIT_FILE): Promise<AuditRecord[]> {
    try {
      if (!(await fs.pathExists(file))) {
        return [];
      }

      const content = await fs.readFile(file, 'utf8');
      const records: AuditRecord[] = [];
      for (const line of content.split('\n')) {
        if (!line.trim()) {
          continue;
        }
        try {
          records.push(JSON.parse(line));
        } catch (error) {
          logger.warn('Skipping malformed audit line', { error });
        }
      }
      return records;
    } catch (error) {
      logger.error('Failed to read audit log', { error });
      return [];
    }
  }

  static async readLast(n: number, file: string = AUDIT_FILE): Promise<AuditRecord[]> {
    const all = await this.readAll(file);
    return n > 0 ? all.slice(-n) : [];
  }

  static getPath(): string {
    return AUDIT_FILE;
  }

  /** A sink that timestamps events and appends them to `file`. */
  static sink(file: string = AUDIT_FILE): AuditSink {
    return {
      record: (event) => AuditLog.append({ timestamp: new Date().toISOString(), ...event }, file),
    };
  }
}
