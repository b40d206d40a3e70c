import type { Metadata } from 'next'
import type { ReactNode } from 'react'
import './globals.css'
import { DashboardShell } from "../components/layout/DashboardShell"

export const metadata: Metadata = {
  title: 'DCA Cockpit',
  description: 'RSI and MA200 signals for a monthly ETF savings plan',
}

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en" className="dark">
      <body className="min-h-screen bg-background text-foreground">
        <DashboardShell>
          {children}
        </DashboardShell>
      </body>
    </html>
  )
}
