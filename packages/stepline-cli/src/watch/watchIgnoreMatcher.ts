import { hasWildcard, matchSegment, matchSegments, splitSegments } from '@stepline/core'

/**
 * One compiled `watch.exclude` entry.
 *
 * - `segment`: a name or name glob without `/`, matched against every segment.
 * - `prefix`: a plain path, matched against the leading segments.
 * - `glob`: a path glob, matched against the whole path.
 */
export type WatchExcludeRule =
  | { readonly kind: 'segment'; readonly pattern: string }
  | { readonly kind: 'prefix'; readonly segments: readonly string[] }
  | { readonly kind: 'glob'; readonly glob: readonly string[] }

// Build output, VCS metadata and editor scratch files.
const DEFAULT_EXCLUDES = [
  'node_modules',
  '.git',
  'dist',
  'coverage',
  'target',
  '.tmp',
  '.vite',
  '*.tsbuildinfo',
  '*.swp',
  '*~',
]

/**
 * Converts backslash separators so Windows paths match like POSIX ones.
 *
 * @param filePath Raw file path.
 * @returns Path with `/` separators.
 */
export const normalizeWatchPath = (filePath: string): string => {
  return filePath.replaceAll('\\', '/')
}

/**
 * Compiles one exclude pattern.
 *
 * @param pattern Entry from `watch.exclude`; a leading `./` is ignored.
 * @returns Rule, or null for a blank pattern.
 */
export const parseWatchExcludeRule = (pattern: string): WatchExcludeRule | null => {
  const segments = splitSegments(normalizeWatchPath(pattern.trim()))
  const relativeSegments = segments[0] === '.' ? segments.slice(1) : segments

  const [single] = relativeSegments
  if (single === undefined) {
    return null
  }

  if (relativeSegments.length === 1) {
    return { kind: 'segment', pattern: single }
  }

  return relativeSegments.some(hasWildcard)
    ? { kind: 'glob', glob: relativeSegments }
    : { kind: 'prefix', segments: relativeSegments }
}

const matchesRule = (rule: WatchExcludeRule, segments: readonly string[]): boolean => {
  switch (rule.kind) {
    case 'segment':
      return segments.some((segment) => matchSegment(rule.pattern, segment))
    case 'prefix':
      return (
        segments.length >= rule.segments.length &&
        rule.segments.every((segment, index) => segments[index] === segment)
      )
    case 'glob':
      return matchSegments(rule.glob, segments)
  }
}

/**
 * Creates the predicate watch mode uses to drop change events.
 *
 * @param excludePatterns `watch.exclude` entries, checked after the defaults.
 * @returns True for paths whose changes must not trigger a rerun.
 */
export const createWatchIgnoreMatcher = (
  excludePatterns: readonly string[] = []
): ((filePath: string) => boolean) => {
  const rules = [...DEFAULT_EXCLUDES, ...excludePatterns]
    .map(parseWatchExcludeRule)
    .filter((rule): rule is WatchExcludeRule => rule !== null)

  return (filePath: string): boolean => {
    const segments = splitSegments(normalizeWatchPath(filePath))
    return rules.some((rule) => matchesRule(rule, segments))
  }
}
