import { describe, expect, it } from 'vitest'
import { RequestSampler } from '../../../src/core/requestSampler.js'

describe('RequestSampler', () => {
  it('samples every Nth request', () => {
    const sampler = new RequestSampler({ every: 3, now: () => 0 })

    expect(['r1', 'r2', 'r3', 'r4', 'r5', 'r6'].map((id) => sampler.begin(id))).toEqual([
      false, false, true, false, false, true,
    ])
  })

  it('times a sampled request once', () => {
    const clock = { now: 100 }
    const sampler = new RequestSampler({ every: 1, now: () => clock.now })

    sampler.begin('r1')
    clock.now = 142

    expect(sampler.end('r1')).toBe(42)
    expect(sampler.end('r1')).toBeNull()
  })

  it('ignores requests that were not sampled', () => {
    const sampler = new RequestSampler({ every: 2, now: () => 0 })

    sampler.begin('r1')

    expect(sampler.end('r1')).toBeNull()
    expect(sampler.drop('r1')).toBe(false)
  })

  it('forgets an aborted request', () => {
    const sampler = new RequestSampler({ every: 1, now: () => 0 })

    sampler.begin('r1')

    expect(sampler.drop('r1')).toBe(true)
    expect(sampler.end('r1')).toBeNull()
  })

  it('treats a sampling rate below 1 as every request', () => {
    const sampler = new RequestSampler({ every: 0, now: () => 0 })
    expect(sampler.begin('r1')).toBe(true)
  })
})
