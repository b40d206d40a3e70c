import { env } from './config'
import { errorMessage } from './errors'

export type Delivery = {
  delivered: boolean
  channel: 'webhook' | 'email' | 'log'
  status?: number
  text?: string
}

export interface Notifier {
  deliver(title: string, content: string): Promise<Delivery>
}

export const ALERT_PREFIX = '[DCA Cockpit alert]'

type FetchFn = typeof fetch

// Feishu/Lark custom bot message
export function webhookPayload(title: string, content: string) {
  return { msg_type: 'text', content: { text: `${ALERT_PREFIX}\n${title}\n\n${content}` } }
}

async function postWebhook(fetchImpl: FetchFn, url: string, title: string, content: string): Promise<Delivery> {
  const r = await fetchImpl(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(webhookPayload(title, content)),
    signal: AbortSignal.timeout(6_000),
  })
  const ok = r.status >= 200 && r.status < 300
  return { delivered: ok, channel: 'webhook', status: r.status, text: ok ? undefined : await r.text().catch(() => undefined) }
}

async function sendEmail(fetchImpl: FetchFn, apiKey: string, to: string, title: string, content: string): Promise<Delivery> {
  const from = env('ALERT_EMAIL_FROM', false) || 'alerts@dca-cockpit.local'
  const r = await fetchImpl('https://api.resend.com/emails', {
    method: 'POST',
    headers: { Authorization: `Bearer ${apiKey}`, 'content-type': 'application/json' },
    body: JSON.stringify({ from, to, subject: `${ALERT_PREFIX} ${title}`, text: content }),
  })
  const ok = r.status < 300
  return { delivered: ok, channel: 'email', status: r.status, text: ok ? undefined : await r.text().catch(() => undefined) }
}

/**
 * Webhook first, then Resend e-mail, else log only. Failures are reported in
 * the result, not thrown.
 */
export async function deliverAlert(title: string, content: string, fetchImpl: FetchFn = fetch): Promise<Delivery> {
  const webhook = env('ALERT_WEBHOOK_URL', false)
  const apiKey = env('RESEND_API_KEY', false)
  const to = env('ALERT_EMAIL_TO', false)
  try {
    if (webhook) return await postWebhook(fetchImpl, webhook, title, content)
    if (apiKey && to) return await sendEmail(fetchImpl, apiKey, to, title, content)
  } catch (e) {
    console.error('notify: delivery failed', errorMessage(e))
    return { delivered: false, channel: webhook ? 'webhook' : 'email', text: errorMessage(e) }
  }
  console.info('notify: no channel configured', { title, content })
  return { delivered: false, channel: 'log' }
}

export function createNotifier(fetchImpl: FetchFn = fetch): Notifier {
  return { deliver: (title, content) => deliverAlert(title, content, fetchImpl) }
}
