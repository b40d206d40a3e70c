import { describe, expect, it, vi } from 'vitest'
import { deliverAlert, webhookPayload } from './notify'
import { fakeFetch, jsonResponse } from './testing'

function clearChannels() {
  vi.stubEnv('ALERT_WEBHOOK_URL', '')
  vi.stubEnv('RESEND_API_KEY', '')
  vi.stubEnv('ALERT_EMAIL_TO', '')
  vi.stubEnv('ALERT_EMAIL_FROM', '')
}

describe('webhookPayload', () => {
  it('formats a text bot message', () => {
    expect(webhookPayload('Daily close monitor', 'QQQ RSI oversold (28.0)')).toEqual({
      msg_type: 'text',
      content: { text: '[DCA Cockpit alert]\nDaily close monitor\n\nQQQ RSI oversold (28.0)' },
    })
  })
})

describe('deliverAlert', () => {
  it('posts to the webhook when configured', async () => {
    clearChannels()
    vi.stubEnv('ALERT_WEBHOOK_URL', 'https://hooks.example.test/bot')
    const { impl, calls } = fakeFetch(() => jsonResponse({ code: 0 }))
    await expect(deliverAlert('t', 'c', impl)).resolves.toEqual({ delivered: true, channel: 'webhook', status: 200, text: undefined })
    expect(calls[0].url).toBe('https://hooks.example.test/bot')
    expect(JSON.parse(String(calls[0].init?.body))).toEqual(webhookPayload('t', 'c'))
  })

  it('sends e-mail through Resend without a webhook', async () => {
    clearChannels()
    vi.stubEnv('RESEND_API_KEY', 'test-secret')
    vi.stubEnv('ALERT_EMAIL_TO', 'me@example.test')
    const { impl, calls } = fakeFetch(() => jsonResponse({ id: 'x' }))
    const res = await deliverAlert('Daily close monitor', 'body', impl)
    expect(res.channel).toBe('email')
    expect(res.delivered).toBe(true)
    expect(calls[0].url).toBe('https://api.resend.com/emails')
    expect(new Headers(calls[0].init?.headers).get('Authorization')).toBe('Bearer test-secret')
    expect(JSON.parse(String(calls[0].init?.body))).toEqual({
      from: 'alerts@dca-cockpit.local',
      to: 'me@example.test',
      subject: '[DCA Cockpit alert] Daily close monitor',
      text: 'body',
    })
  })

  it('reports a failed delivery instead of throwing', async () => {
    clearChannels()
    vi.stubEnv('ALERT_WEBHOOK_URL', 'https://hooks.example.test/bot')
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const { impl } = fakeFetch(() => { throw new TypeError('fetch failed') })
    await expect(deliverAlert('t', 'c', impl)).resolves.toEqual({ delivered: false, channel: 'webhook', text: 'fetch failed' })
  })

  it('only logs when no channel is configured', async () => {
    clearChannels()
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const { impl, calls } = fakeFetch(() => jsonResponse({}))
    await expect(deliverAlert('t', 'c', impl)).resolves.toEqual({ delivered: false, channel: 'log' })
    expect(calls).toHaveLength(0)
    expect(info).toHaveBeenCalledWith('notify: no channel configured', { title: 't', content: 'c' })
  })
})
