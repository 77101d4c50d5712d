/**
 * BranchPatterns - Name matching shared by ranking, grouping and coloring.
 *
 * A name matches a pattern when it matches directly, or when it carries a
 * remote-tracking prefix (e.g. `origin/`) and the remainder matches.
 * The first matching pattern in list order wins.
 */

import type { ColorRule } from '@shared/types'

export const DEFAULT_REMOTE = 'origin'

export class BranchPatterns {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * Returns the name without its remote-tracking prefix, or null when the name
   * does not start with one of the given remotes.
   */
  public static stripRemote(name: string, remotes: ReadonlySet<string>): string | null {
    const slash = name.indexOf('/')
    if (slash <= 0) return null
    return remotes.has(name.slice(0, slash)) ? name.slice(slash + 1) : null
  }

  public static matches(name: string, pattern: RegExp, remotes: ReadonlySet<string>): boolean {
    const remainder = BranchPatterns.stripRemote(name, remotes)
    return (remainder !== null && pattern.test(remainder)) || pattern.test(name)
  }

  /**
   * Index of the first matching pattern, or the table length when none match.
   */
  public static rank(name: string, patterns: RegExp[], remotes: ReadonlySet<string>): number {
    const position = patterns.findIndex((pattern) =>
      BranchPatterns.matches(name, pattern, remotes)
    )
    return position === -1 ? patterns.length : position
  }

  /**
   * Picks a color round-robin from the first matching rule's list, falling
   * back to the unknown list.
   */
  public static color<T>(
    name: string,
    rules: ColorRule<T>[],
    unknown: T[],
    counter: number,
    remotes: ReadonlySet<string>
  ): T {
    const rule = rules.find((candidate) => BranchPatterns.matches(name, candidate.pattern, remotes))
    const colors = rule ? rule.colors : unknown
    return colors[counter % colors.length]
  }

  /**
   * Extracts the merged-in branch name from a merge commit summary.
   * A pattern only counts when it has exactly one capture group and that group
   * participated in the match.
   */
  public static parseMergeSummary(summary: string, patterns: RegExp[]): string | null {
    for (const pattern of patterns) {
      const match = pattern.exec(summary)
      if (match && match.length === 2 && match[1] !== undefined) {
        return match[1]
      }
    }
    return null
  }

  /**
   * True when `name` is the remote-tracking counterpart of `localName`,
   * e.g. origin/develop for develop.
   */
  public static isRemoteTrackingOf(
    name: string,
    localName: string,
    remotes: ReadonlySet<string>
  ): boolean {
    return BranchPatterns.stripRemote(name, remotes) === localName
  }
}
