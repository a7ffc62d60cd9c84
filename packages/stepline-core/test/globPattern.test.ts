import { describe, expect, it } from 'vitest'

import { compileBranchPattern, matchSegment, matchSegments, splitSegments } from '../src/index.js'

describe('matchSegment', () => {
  it('matches stars within a single segment', () => {
    expect(matchSegment('*.log', 'dev.log')).toBe(true)
    expect(matchSegment('v*-rc*', 'v1-rc2')).toBe(true)
    expect(matchSegment('a*c', 'abcd')).toBe(false)
    expect(matchSegment('*', '')).toBe(true)
  })

  it('compares characters literally', () => {
    expect(matchSegment('v1.0', 'v1.0')).toBe(true)
    expect(matchSegment('v1.0', 'v1x0')).toBe(false)
  })
})

describe('matchSegments', () => {
  it('lets a globstar consume zero or more segments', () => {
    expect(matchSegments(['**', '*.snap'], ['report.snap'])).toBe(true)
    expect(matchSegments(['**', '*.snap'], ['crates', 'core', 'report.snap'])).toBe(true)
    expect(matchSegments(['crates', '*', 'tmp', '**'], ['crates', 'core', 'tmp'])).toBe(true)
  })

  it('requires every segment to be consumed', () => {
    expect(matchSegments(['release', '*'], ['release', '1.2', 'rc'])).toBe(false)
    expect(matchSegments(['release', '*'], ['release'])).toBe(false)
  })
})

describe('compileBranchPattern', () => {
  it('matches branch globs segment by segment', () => {
    expect(compileBranchPattern('release/*')('release/1.2')).toBe(true)
    expect(compileBranchPattern('release/*')('release/1.2/rc')).toBe(false)
    expect(compileBranchPattern('feature/**/wip')('feature/a/b/wip')).toBe(true)
  })

  it('compares plain names exactly', () => {
    expect(compileBranchPattern('release')('release/1.2')).toBe(false)
    expect(compileBranchPattern('main')('main')).toBe(true)
  })
})

describe('splitSegments', () => {
  it('drops empty segments', () => {
    expect(splitSegments('/crates//core/')).toEqual(['crates', 'core'])
  })
})
