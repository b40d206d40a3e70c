import type { ReactNode } from "react"
import { Sidebar } from "./Sidebar"
import { Topbar } from "./Topbar"

export function DashboardShell({ children }: { children: ReactNode }){
  return (
    <div className="min-h-screen bg-background text-foreground">
      <div className="flex w-full">
        <Sidebar />
        <div className="flex-1 min-w-0">
          <Topbar />
          <div className="mx-auto max-w-7xl p-4">
            {children}
          </div>
        </div>
      </div>
    </div>
  )
}
