import { SerialPortMock } from 'serialport'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { EXIT_OK, EXIT_TRANSPORT, EXIT_USAGE, runCli } from './cli'
import type { PortFactory } from './serial-source'

class Collector {
  isTTY = false
  writes: string[] = []
  write(text: string) {
    this.writes.push(text)
    return true
  }
}

describe('runCli', () => {
  let opened: SerialPortMock | null = null
  const portFactory: PortFactory = (settings) => {
    opened = new SerialPortMock({ path: settings.path, baudRate: settings.baudRate, autoOpen: false })
    return opened
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    SerialPortMock.binding.reset()
    opened = null
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints usage and exits cleanly without a device', async () => {
    expect(await runCli([])).toBe(EXIT_OK)
    expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/^Usage: imu-view <device>/))
  })

  it('exits with the usage code on bad options', async () => {
    expect(await runCli(['/dev/ttyUSB0', '--fps', '0'])).toBe(EXIT_USAGE)
    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^Invalid options: fps: /))
  })

  it('exits with the transport code when the device cannot be opened', async () => {
    const code = await runCli(['/dev/ttyMISSING', '--in-process'], {
      portFactory,
      output: new Collector(),
      closeSignal: new AbortController().signal,
    })
    expect(code).toBe(EXIT_TRANSPORT)
    expect(console.error).toHaveBeenCalledWith(
      expect.stringMatching(/^Failed to open serial device \/dev\/ttyMISSING: /)
    )
  })

  it('fails on the main thread when worker mode cannot configure the device', async () => {
    const code = await runCli(['/dev/ttyMISSING'], {
      portFactory,
      output: new Collector(),
      closeSignal: new AbortController().signal,
    })
    expect(code).toBe(EXIT_TRANSPORT)
    expect(console.error).toHaveBeenCalledWith(
      expect.stringMatching(/^Failed to open serial device \/dev\/ttyMISSING: /)
    )
  })

  it('streams from the port until closed, then releases it', async () => {
    SerialPortMock.binding.createPort('/dev/ttyIMU', { echo: false, record: false, readyData: Buffer.alloc(0) })
    const output = new Collector()
    const controller = new AbortController()

    const feeder = setInterval(() => {
      const port = opened
      if (!port?.isOpen) return
      port.port?.emitData('Ang.x = 10 Ang.y = 20\n')
    }, 5)

    try {
      const running = runCli(['/dev/ttyIMU', '--in-process', '--fps', '100'], {
        portFactory,
        output,
        closeSignal: controller.signal,
      })
      await vi.waitFor(() => expect(output.writes.some((line) => line.includes('tilt 10°/20°'))).toBe(true), {
        timeout: 2000,
      })
      controller.abort()

      expect(await running).toBe(EXIT_OK)
      expect(opened?.isOpen).toBe(false)
      expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/^\[lifecycle\] Session ended after \d+ frames; ingestion stopped: /))
    } finally {
      clearInterval(feeder)
    }
  })
})
