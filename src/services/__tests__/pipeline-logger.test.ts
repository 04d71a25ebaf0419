import { describe, it, expect, afterEach } from '@jest/globals'
import {
  clearPipelineLogs,
  log,
  logDebug,
  logOnce,
  logWarning,
  pipelineLogs,
  setLogCallback,
  setVerbosity,
  type LogEntry
} from '../pipeline-logger'

describe('pipeline logger', () => {
  afterEach(() => {
    setVerbosity('normal')
    setLogCallback(null)
  })

  it('records entries with their level', () => {
    log('[Batch] started')
    logWarning('[Batch] a.jpg skipped')

    expect(pipelineLogs).toEqual([
      { level: 'info', message: '[Batch] started' },
      { level: 'warn', message: '[Batch] a.jpg skipped' }
    ])
  })

  it('drops consecutive duplicates', () => {
    log('same')
    log('same')
    log('other')
    log('same')

    expect(pipelineLogs.map(entry => entry.message)).toEqual(['same', 'other', 'same'])
  })

  it('only records debug output when verbose', () => {
    logDebug('hidden')
    setVerbosity('verbose')
    logDebug('shown')

    expect(pipelineLogs).toEqual([{ level: 'debug', message: 'shown' }])
  })

  it('logs a once-only message a single time until cleared', () => {
    logOnce('fallback in use')
    log('between')
    logOnce('fallback in use')
    expect(pipelineLogs.map(entry => entry.message)).toEqual(['fallback in use', 'between'])

    clearPipelineLogs()
    logOnce('fallback in use')
    expect(pipelineLogs.map(entry => entry.message)).toEqual(['fallback in use'])
  })

  it('forwards entries to the subscribed callback', () => {
    const received: LogEntry[] = []
    setLogCallback(entry => received.push(entry))

    logWarning('heads up')

    expect(received).toEqual([{ level: 'warn', message: 'heads up' }])
  })
})
