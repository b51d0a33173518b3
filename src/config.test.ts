import { describe, it, expect } from 'vitest'
import { parseCliArgs } from './config'
import { ConfigError } from './errors'

function runConfig(argv: string[]) {
  const command = parseCliArgs(argv)
  if (command.kind !== 'run') throw new Error(`expected a run command, got ${command.kind}`)
  return command.config
}

describe('parseCliArgs', () => {
  it('fills in defaults around the device path', () => {
    expect(runConfig(['/dev/ttyUSB0'])).toEqual({
      device: '/dev/ttyUSB0',
      baudRate: 38400,
      rtscts: true,
      fps: 60,
      format: 'auto',
      axisMapping: ['x', 'z', '-y'],
      inProcess: false,
      quiet: false,
    })
  })

  it('reads every option', () => {
    const config = runConfig([
      'COM3',
      '--baud', '115200',
      '--no-rtscts',
      '--fps', '30',
      '--format', 'tilt',
      '--axes', 'x,y,z',
      '--in-process',
      '-q',
    ])
    expect(config).toEqual({
      device: 'COM3',
      baudRate: 115200,
      rtscts: false,
      fps: 30,
      format: 'tilt',
      axisMapping: ['x', 'y', 'z'],
      inProcess: true,
      quiet: true,
    })
  })

  it('asks for usage without a device or with --help', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'usage' })
    expect(parseCliArgs(['/dev/ttyUSB0', '--help'])).toEqual({ kind: 'usage' })
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'usage' })
  })

  it('rejects unknown flags and missing values', () => {
    expect(() => parseCliArgs(['/dev/ttyUSB0', '--bogus'])).toThrow(ConfigError)
    expect(() => parseCliArgs(['/dev/ttyUSB0', '--baud'])).toThrow(ConfigError)
  })

  it('rejects more than one device', () => {
    expect(() => parseCliArgs(['/dev/ttyUSB0', '/dev/ttyUSB1'])).toThrow(
      'Expected a single device path, got 2 arguments'
    )
  })

  it('reports which option failed validation', () => {
    expect(() => parseCliArgs(['/dev/ttyUSB0', '--baud', 'fast'])).toThrow(/^Invalid options: baudRate: /)
    expect(() => parseCliArgs(['/dev/ttyUSB0', '--format', 'json'])).toThrow(/^Invalid options: format: /)
    expect(() => parseCliArgs(['/dev/ttyUSB0', '--fps', '0'])).toThrow(/^Invalid options: fps: /)
    expect(() => parseCliArgs(['/dev/ttyUSB0', '--axes', 'x,y,-z'])).toThrow(
      /^Invalid options: axisMapping: .*not a proper rotation/
    )
  })

  it('keeps the validation issues on the error', () => {
    try {
      parseCliArgs(['/dev/ttyUSB0', '--fps', '0', '--baud=-5'])
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError)
      if (!(error instanceof ConfigError)) return
      expect(error.issues.map((issue) => issue.path.join('.'))).toEqual(['baudRate', 'fps'])
    }
  })
})
