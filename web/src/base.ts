export const BASE = (process.env.NEXT_PUBLIC_BASE_PATH || '').replace(/\/$/, '')
export const API_BASE = `${BASE}/api`
