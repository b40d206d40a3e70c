"use client"
import { useState, type FormEvent } from "react"
import { Search } from "lucide-react"
import { BASE } from "../../base"

export function Topbar(){
  const [q, setQ] = useState("")
  function onSubmit(e: FormEvent) {
    e.preventDefault()
    const t = q.trim().toUpperCase()
    if (t) window.location.href = `${BASE}/ticker/${encodeURIComponent(t)}`
  }
  return (
    <header className="sticky top-0 z-40 border-b bg-background/60 backdrop-blur supports-[backdrop-filter]:bg-background/60">
      <div className="mx-auto max-w-7xl px-4 h-14 flex items-center gap-3">
        <form onSubmit={onSubmit} className="flex items-center gap-2 w-[300px] max-w-[60vw]">
          <Search size={16} className="text-muted-foreground" />
          <input value={q} onChange={e => setQ(e.target.value)} placeholder="Open ticker, e.g. QQQ"
                 className="h-9 w-full rounded-md border bg-muted/40 px-3 text-sm outline-none focus:border-accent" />
        </form>
      </div>
    </header>
  )
}
