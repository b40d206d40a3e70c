import type { Config } from 'tailwindcss'

const config: Config = {
  darkMode: 'class',
  content: {
    relative: true,
    files: [
      './src/app/**/*.{ts,tsx}',
      './src/components/**/*.{ts,tsx}',
    ],
  },
  theme: {
    extend: {
      colors: {
        background: '#0b0f16',
        foreground: '#e2e8ef',
        card: '#131b27',
        border: '#1f2a3a',
        muted: {
          DEFAULT: '#1a2535',
          foreground: '#8b9bb4',
        },
        accent: {
          DEFAULT: '#164e63',
          foreground: '#22d3ee',
        },
        // signal colours
        buy: '#22c55e',
        hold: '#94a3b8',
        caution: '#f59e0b',
        sell: '#ef4444',
      },
    },
  },
  plugins: [],
}

export default config
