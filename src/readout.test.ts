import * as THREE from 'three'
import { describe, it, expect } from 'vitest'
import { IDENTITY_ORIENTATION, tiltOrientation } from './orientation-types'
import type { Pose } from './pose'
import { formatReadout, normalize180, TerminalReadout } from './readout'

function pose(sequence: number, euler = { roll: 0, pitch: 0, yaw: 0 }): Pose {
  return {
    rotation: new THREE.Quaternion(),
    euler,
    orientation: sequence === 0 ? IDENTITY_ORIENTATION : tiltOrientation(30, -15),
    sequence,
    fresh: true,
  }
}

class Collector {
  writes: string[] = []
  constructor(public isTTY: boolean) {}
  write(text: string) {
    this.writes.push(text)
    return true
  }
}

describe('normalize180', () => {
  it('wraps angles into [-180, 180)', () => {
    expect(normalize180(0)).toBe(0)
    expect(normalize180(180)).toBe(-180)
    expect(normalize180(-190)).toBe(170)
    expect(normalize180(540)).toBe(-180)
    expect(normalize180(190)).toBe(-170)
  })
})

describe('formatReadout', () => {
  it('flags the placeholder pose shown before data arrives', () => {
    expect(formatReadout(pose(0), 0)).toBe(
      'roll    0.0°  pitch    0.0°  yaw    0.0°  |  Msgs/s: 0  |  quat (waiting for data)'
    )
  })

  it('prints wrapped angles, rate and the raw tilt reading', () => {
    expect(formatReadout(pose(4, { roll: 12.34, pitch: -5, yaw: 190 }), 48)).toBe(
      'roll   12.3°  pitch   -5.0°  yaw -170.0°  |  Msgs/s: 48  |  tilt 30°/-15°'
    )
  })
})

describe('TerminalReadout', () => {
  it('prints a line per new sample on a plain stream, throttled', () => {
    let now = 0
    const out = new Collector(false)
    const readout = new TerminalReadout(out, { intervalMs: 100, now: () => now })

    readout.render(pose(1))
    now = 200
    readout.render(pose(1))
    now = 250
    readout.render(pose(2))
    now = 300
    readout.render(pose(3))

    expect(out.writes).toEqual([`${formatReadout(pose(1), 0)}\n`, `${formatReadout(pose(2), 1)}\n`])
  })

  it('redraws in place on a terminal and ends with a newline', () => {
    let now = 0
    const out = new Collector(true)
    const readout = new TerminalReadout(out, { intervalMs: 100, now: () => now })

    readout.render(pose(1))
    now = 150
    readout.render(pose(1))
    readout.finish()

    const line = formatReadout(pose(1), 0)
    expect(out.writes).toEqual([`\r${line}\x1b[K`, `\r${line}\x1b[K`, '\n'])
  })

  it('counts messages over the last second', () => {
    let now = 0
    const readout = new TerminalReadout(new Collector(false), { now: () => now })
    readout.render(pose(0))
    now = 500
    readout.render(pose(10))
    now = 1200
    readout.render(pose(30))
    expect(readout.messageRate()).toBe(20)
  })
})
