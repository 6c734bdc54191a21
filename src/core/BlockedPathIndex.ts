/**
 * HarborGate BlockedPathIndex
 * Lookup over manual, global and auto-imported blocked paths
 */

import { BlockedPath } from '../types';
import { matchBlockedPath } from './PatternMatcher';

export class BlockedPathIndex {
  private readonly specific: readonly BlockedPath[];
  private readonly global: readonly BlockedPath[];

  constructor(entries: readonly BlockedPath[]) {
    this.specific = Object.freeze(entries.filter((entry) => entry.scope !== '*'));
    this.global = Object.freeze(entries.filter((entry) => entry.scope === '*'));
  }

  /**
   * First rule blocking `path` for `container`. Container-specific rules are
   * consulted before global ones. Passing `*` as the container consults
   * global rules only.
   */
  find(container: string, path: string): BlockedPath | undefined {
    if (container !== '*') {
      const hit = this.specific.find(
        (entry) => entry.scope === container && matchBlockedPath(entry.pattern, path)
      );
      if (hit) {
        return hit;
      }
    }
    return this.global.find((entry) => matchBlockedPath(entry.pattern, path));
  }

  /** Rules that apply to `container`, or every rule when omitted. */
  list(container?: string): BlockedPath[] {
    if (container === undefined) {
      return [...this.specific, ...this.global];
    }
    return [...this.specific.filter((entry) => entry.scope === container), ...this.global];
  }

  get size(): number {
    return this.specific.length + this.global.length;
  }
}
