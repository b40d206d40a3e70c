"use client"
import { usePathname } from "next/navigation"
import { LayoutDashboard, LineChart, type LucideIcon } from "lucide-react"
import { BASE } from "../../base"

const navItems: { href: string; label: string; key: string; icon: LucideIcon }[] = [
  { href: `${BASE}/`, label: "Dashboard", key: "dashboard", icon: LayoutDashboard },
  { href: `${BASE}/ticker`, label: "ETFs", key: "etfs", icon: LineChart },
]

export function Sidebar() {
  const pathname = usePathname() || ""
  function isActive(itemHref: string) {
    if (itemHref === `${BASE}/`) return pathname === BASE || pathname === `${BASE}/`
    return pathname.startsWith(itemHref)
  }
  return (
    <aside className="hidden md:flex w-56 shrink-0 flex-col border-r bg-background/60 backdrop-blur">
      <div className="h-14 border-b flex items-center gap-2 px-4">
        <Logo />
        <div className="font-semibold tracking-tight">DCA Cockpit</div>
      </div>
      <nav className="flex-1 overflow-y-auto p-2 space-y-1">
        {navItems.map((item)=>{
          const active = isActive(item.href)
          const Icon = item.icon
          return (
            <a key={item.key} href={item.href}
               className={`group flex items-center gap-2 rounded-md px-3 py-2 text-sm transition-colors border ${active?"bg-accent/40 border-accent":"hover:bg-muted/40 border-transparent"}`}>
              <Icon size={16} />
              <span className="flex-1">{item.label}</span>
            </a>
          )
        })}
      </nav>
      <div className="p-3 text-xs text-muted-foreground">
        Not investment advice
      </div>
    </aside>
  )
}

function Logo(){
  return (
    <div className="h-8 w-8 rounded-md bg-gradient-to-br from-emerald-500 to-cyan-400 p-[2px]">
      <div className="h-full w-full rounded-[6px] bg-background/80 flex items-center justify-center">
        <svg viewBox="0 0 24 24" width={16} height={16} className="text-foreground/80">
          <path d="M4 13l4-4 3 3 5-5 4 4" fill="none" stroke="currentColor" strokeWidth="2" strokeLinecap="round" strokeLinejoin="round"/>
        </svg>
      </div>
    </div>
  )
}
