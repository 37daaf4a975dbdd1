/**
 * CommandFilter
 *
 * Deny-list policy gate for shell commands.
 *
 * Policy:
 * - Default allow: any command not matched by a deny pattern may run
 * - Deny patterns are globs, matched case-insensitively against the whole command
 * - `*` spans path separators and `\` is a literal character, so Windows
 *   paths and switches such as `/fs:ntfs` can be written into patterns as-is
 * - No allow-list is consulted
 *
 * A missing policy file yields an empty deny-list; nothing is blocked and a
 * warning is logged so operators notice.
 */

import { existsSync, readFileSync } from 'fs';
import { minimatch, type MinimatchOptions } from 'minimatch';

export const DENYLIST_REASON = 'Command blocked by denylist.';

/**
 * Policy document format
 */
export interface DenyListFile {
  commands: string[];
}

export interface FilterDecision {
  allowed: boolean;
  /** Empty when allowed */
  reason: string;
}

export interface CommandPolicy {
  mode: 'deny-list';
  patterns: readonly string[];
  /** File the patterns came from, or null when no policy was found */
  source: string | null;
}

// Path separators are swapped for a neutral character on both sides so
// minimatch treats every pattern as a single segment.
const SEPARATOR_STAND_IN = '∕';

const MATCH_OPTIONS: MinimatchOptions = {
  nocase: true,
  dot: true,
  nobrace: true,
  noext: true,
  nonegate: true,
  nocomment: true,
  platform: 'linux'
};

function flattenSeparators(text: string): string {
  return text.replace(/[\\/]/g, SEPARATOR_STAND_IN);
}

export class CommandFilter {
  private readonly patterns: readonly string[];
  private readonly compiled: readonly string[];
  private readonly source: string | null;

  constructor(patterns: readonly string[], source: string | null = null) {
    this.patterns = [...patterns];
    this.compiled = this.patterns.map(flattenSeparators);
    this.source = source;
  }

  /**
   * Load the deny-list from a policy file
   */
  static fromFile(path: string): CommandFilter {
    if (!existsSync(path)) {
      console.warn(`[CommandFilter] No policy found at ${path}; deny-list is empty and every command is permitted`);
      return new CommandFilter([], null);
    }

    const data: Partial<DenyListFile> = JSON.parse(readFileSync(path, 'utf-8'));
    const patterns = Array.isArray(data.commands)
      ? data.commands.filter((pattern): pattern is string => typeof pattern === 'string' && pattern.trim() !== '')
      : [];
    console.log(`[CommandFilter] Loaded ${patterns.length} deny patterns from ${path}`);
    return new CommandFilter(patterns, path);
  }

  /**
   * Decide whether a command may run
   */
  isAllowed(command: string): FilterDecision {
    const subject = flattenSeparators(command);
    for (const pattern of this.compiled) {
      if (minimatch(subject, pattern, MATCH_OPTIONS)) {
        return { allowed: false, reason: DENYLIST_REASON };
      }
    }
    return { allowed: true, reason: '' };
  }

  /**
   * The pattern that blocks a command, if any
   */
  matchingPattern(command: string): string | undefined {
    const subject = flattenSeparators(command);
    const index = this.compiled.findIndex(pattern => minimatch(subject, pattern, MATCH_OPTIONS));
    return index === -1 ? undefined : this.patterns[index];
  }

  getPolicy(): CommandPolicy {
    return { mode: 'deny-list', patterns: this.patterns, source: this.source };
  }
}
