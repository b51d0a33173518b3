import { describe, it, expect } from 'vitest'
import { StopSignal } from './stop-signal'

describe('StopSignal', () => {
  it('starts lowered and is raised exactly once', () => {
    const stop = StopSignal.create()
    expect(stop.requested).toBe(false)
    expect(stop.request()).toBe(true)
    expect(stop.requested).toBe(true)
    expect(stop.request()).toBe(false)
    expect(stop.requested).toBe(true)
  })

  it('is visible through every handle on the same buffer', () => {
    const owner = StopSignal.create()
    const observer = StopSignal.attach(owner.buffer)
    owner.request()
    expect(observer.requested).toBe(true)
  })

  it('refuses buffers of the wrong size', () => {
    expect(() => StopSignal.attach(new SharedArrayBuffer(8))).toThrow(RangeError)
  })
})
