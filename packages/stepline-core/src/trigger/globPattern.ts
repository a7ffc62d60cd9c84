/**
 * Slash-separated glob, split into segments. A `**` segment matches zero or
 * more whole segments; inside any other segment `*` matches a run of
 * characters.
 */
export type SegmentGlob = readonly string[]

const GLOBSTAR = '**'

/**
 * Splits a pattern or a value into its non-empty slash segments.
 *
 * @param value Slash-separated text.
 * @returns Segments.
 */
export const splitSegments = (value: string): readonly string[] => {
  return value.split('/').filter((segment) => segment.length > 0)
}

/**
 * Matches one segment against one segment pattern.
 *
 * @param pattern Segment pattern, `*` being the only wildcard.
 * @param value Candidate segment.
 * @returns True when the whole segment matches.
 */
export const matchSegment = (pattern: string, value: string): boolean => {
  let patternIndex = 0
  let valueIndex = 0
  let starIndex = -1
  let starValueIndex = 0

  while (valueIndex < value.length) {
    const expected = pattern[patternIndex]
    if (expected === '*') {
      starIndex = patternIndex
      starValueIndex = valueIndex
      patternIndex += 1
      continue
    }

    if (expected !== undefined && expected === value[valueIndex]) {
      patternIndex += 1
      valueIndex += 1
      continue
    }

    if (starIndex === -1) {
      return false
    }

    // Let the last star absorb one more character and retry.
    starValueIndex += 1
    valueIndex = starValueIndex
    patternIndex = starIndex + 1
  }

  while (pattern[patternIndex] === '*') {
    patternIndex += 1
  }

  return patternIndex === pattern.length
}

/**
 * Matches a segment list against a segment glob.
 *
 * @param glob Pattern segments.
 * @param segments Candidate segments.
 * @returns True when every segment is consumed by the glob.
 */
export const matchSegments = (glob: SegmentGlob, segments: readonly string[]): boolean => {
  const matchFrom = (globIndex: number, segmentIndex: number): boolean => {
    const head = glob[globIndex]
    if (head === undefined) {
      return segmentIndex === segments.length
    }

    if (head === GLOBSTAR) {
      for (let next = segmentIndex; next <= segments.length; next += 1) {
        if (matchFrom(globIndex + 1, next)) {
          return true
        }
      }
      return false
    }

    const segment = segments[segmentIndex]
    return (
      segment !== undefined &&
      matchSegment(head, segment) &&
      matchFrom(globIndex + 1, segmentIndex + 1)
    )
  }

  return matchFrom(0, 0)
}

/**
 * Checks whether a pattern contains a wildcard.
 */
export const hasWildcard = (pattern: string): boolean => pattern.includes('*')

/**
 * Compiles a branch filter. Names without `*` compare exactly, so
 * `release` never matches `release/1.2`.
 *
 * @param pattern Branch name or branch glob such as `release/*`.
 * @returns Predicate over short branch names.
 */
export const compileBranchPattern = (pattern: string): ((branch: string) => boolean) => {
  if (!hasWildcard(pattern)) {
    return (branch: string): boolean => branch === pattern
  }

  const glob = splitSegments(pattern)
  return (branch: string): boolean => matchSegments(glob, splitSegments(branch))
}
