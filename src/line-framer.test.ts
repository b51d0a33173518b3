import { describe, it, expect } from 'vitest'
import { LineFramer, MAX_LINE_BYTES } from './line-framer'

describe('LineFramer', () => {
  it('joins lines split across chunks', () => {
    const framer = new LineFramer()
    expect(framer.push('w = 1\nAng')).toEqual([{ text: 'w = 1', truncated: false }])
    expect(framer.push('.x = 1\n')).toEqual([{ text: 'Ang.x = 1', truncated: false }])
  })

  it('emits several lines from one chunk, empty ones included', () => {
    const framer = new LineFramer()
    expect(framer.push('a\n\nb\n')).toEqual([
      { text: 'a', truncated: false },
      { text: '', truncated: false },
      { text: 'b', truncated: false },
    ])
  })

  it('strips the carriage return of CRLF terminators', () => {
    expect(new LineFramer().push('abc\r\n')).toEqual([{ text: 'abc', truncated: false }])
  })

  it('ends lines on a bare carriage return', () => {
    expect(new LineFramer().push('Ang.x = 1\t\tAng.y = 2\rAng.x = 3\t\tAng.y = 4\r')).toEqual([
      { text: 'Ang.x = 1\t\tAng.y = 2', truncated: false },
      { text: 'Ang.x = 3\t\tAng.y = 4', truncated: false },
    ])
  })

  it('counts a CRLF split across chunks as one terminator', () => {
    const framer = new LineFramer()
    expect(framer.push('abc\r')).toEqual([{ text: 'abc', truncated: false }])
    expect(framer.push('\ndef\n')).toEqual([{ text: 'def', truncated: false }])
  })

  it('keeps the empty line between two carriage returns', () => {
    expect(new LineFramer().push('a\r\rb\n')).toEqual([
      { text: 'a', truncated: false },
      { text: '', truncated: false },
      { text: 'b', truncated: false },
    ])
  })

  it('accepts raw byte chunks', () => {
    expect(new LineFramer().push(new Uint8Array([0x68, 0x69, 0x0a]))).toEqual([{ text: 'hi', truncated: false }])
  })

  it('cuts an overlong line at the cap and drops the rest of it', () => {
    const framer = new LineFramer(8)
    expect(framer.push('0123456789\nok\n')).toEqual([
      { text: '01234567', truncated: true },
      { text: 'ok', truncated: false },
    ])
  })

  it('keeps a line of exactly the cap intact', () => {
    expect(new LineFramer(4).push('abcd\n')).toEqual([{ text: 'abcd', truncated: false }])
  })

  it('applies the cap across chunk boundaries', () => {
    const framer = new LineFramer(4)
    expect(framer.push('abc')).toEqual([])
    expect(framer.push('def')).toEqual([])
    expect(framer.push('\nnext\n')).toEqual([
      { text: 'abcd', truncated: true },
      { text: 'next', truncated: false },
    ])
  })

  it('caps lines at 1024 bytes by default', () => {
    const [line] = new LineFramer().push(`${'x'.repeat(2000)}\n`)
    expect(MAX_LINE_BYTES).toBe(1024)
    expect(line.text).toBe('x'.repeat(1024))
    expect(line.truncated).toBe(true)
  })

  it('flushes an unterminated tail once', () => {
    const framer = new LineFramer()
    framer.push('tail')
    expect(framer.flush()).toEqual({ text: 'tail', truncated: false })
    expect(framer.flush()).toBeNull()
  })

  it('rejects a non-positive cap', () => {
    expect(() => new LineFramer(0)).toThrow(RangeError)
  })
})
