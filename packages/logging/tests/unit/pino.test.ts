import { describe, expect, it } from 'vitest'
import { createLogger, LogChannel, makeClientBuffer } from '../../src/index.js'

describe('createLogger', () => {
  it('fans channel messages out to the client buffer', () => {
    const buf = makeClientBuffer(10)
    const { channel } = createLogger('test', buf)

    channel(LogChannel.list).info('kind=list-item-added index=0')
    channel(LogChannel.google_sheets).warn('kind=store-load-rows-skipped count=1', { count: 1 })

    const [first, second] = buf.getLatest(2)
    expect(first).toMatchObject({ channel: 'list', level: 'info', message: 'kind=list-item-added index=0' })
    expect(second).toMatchObject({ channel: 'google-sheets', level: 'warn', message: 'kind=store-load-rows-skipped count=1' })
  })

  it('uses the channel metadata for client entries', () => {
    const buf = makeClientBuffer(10)
    const { channel } = createLogger('test', buf)

    channel(LogChannel.sessions).error('kind=session-failed')

    const [log] = buf.getLatest(1)
    expect(log).toMatchObject({ channel: 'sessions', emoji: '🪪', color: 'cyan', level: 'error' })
  })
})
