import process from 'node:process'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { formatBytes, formatDuration, Spinner } from '../src/progress'

describe('progress', () => {
  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  it('formats byte counts', () => {
    expect(formatBytes(0)).toBe('0 B')
    expect(formatBytes(512)).toBe('512.0 B')
    expect(formatBytes(1536)).toBe('1.5 KB')
    expect(formatBytes(10 * 1024 * 1024)).toBe('10.0 MB')
    expect(formatBytes(1024 ** 5)).toBe('1024.0 TB')
  })

  it('formats durations', () => {
    expect(formatDuration(250)).toBe('250ms')
    expect(formatDuration(1500)).toBe('1.5s')
    expect(formatDuration(61000)).toBe('1m 1s')
    expect(formatDuration(125000)).toBe('2m 5s')
  })

  describe('Spinner', () => {
    it('draws frames until stopped', () => {
      vi.useFakeTimers()
      const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
      const spinner = new Spinner()

      spinner.start('Installing WordPress...')
      expect(spinner.isSpinning).toBe(true)
      vi.advanceTimersByTime(250)
      expect(write).toHaveBeenNthCalledWith(1, '\r⠋ Installing WordPress...')
      expect(write).toHaveBeenNthCalledWith(2, '\r⠙ Installing WordPress...')

      spinner.update('Extracting...')
      vi.advanceTimersByTime(100)
      expect(write).toHaveBeenLastCalledWith('\r⠹ Extracting...')

      spinner.stop()
      expect(spinner.isSpinning).toBe(false)
      expect(write).toHaveBeenLastCalledWith(`\r${' '.repeat('Extracting...'.length + 2)}\r`)

      const calls = write.mock.calls.length
      vi.advanceTimersByTime(500)
      expect(write.mock.calls.length).toBe(calls)
    })

    it('prints the final message', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {})
      new Spinner().stop('done')
      expect(log).toHaveBeenCalledWith('done')
    })
  })
})
