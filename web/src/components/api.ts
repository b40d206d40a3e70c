import { API_BASE } from '../base'

/** GET an API route; non-2xx answers surface the route's `{ error }` message. */
export async function getJson<T>(path: string): Promise<T> {
  const r = await fetch(`${API_BASE}${path}`, { cache: 'no-store' })
  if (!r.ok) {
    const body: { error?: string } = await r.json().catch(() => ({}))
    throw new Error(body.error || `${path} ${r.status}`)
  }
  return r.json()
}

/** Numbers requests so a response is applied only while its request is the latest one. */
export function requestGate() {
  let seq = 0
  return {
    begin() {
      const id = ++seq
      return () => id === seq
    },
    cancel() {
      seq++
    },
  }
}
