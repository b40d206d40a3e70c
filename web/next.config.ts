import type { NextConfig } from 'next'
import path from 'path'

const base = process.env.NEXT_PUBLIC_BASE_PATH || ''

// Workspace root sits one level above web/ (package.json and lock file live there)
const root = path.resolve(__dirname, '..')

const nextConfig: NextConfig = {
  basePath: base || undefined,
  assetPrefix: base || undefined,
  outputFileTracingRoot: root,
  // yahoo-finance2 pulls optional deps that should stay external on the server
  serverExternalPackages: ['yahoo-finance2'],
}

export default nextConfig
