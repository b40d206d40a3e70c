import type { ReactNode } from 'react'

export function Table({ children }: { children: ReactNode }) {
  return (
    <div className="w-full overflow-x-auto">
      <table className="w-full text-sm">{children}</table>
    </div>
  )
}

export function TableHead({ children, align = 'left' }: { children: ReactNode; align?: 'left' | 'right' }) {
  return <th className={`px-3 py-2 text-xs font-medium text-muted-foreground ${align === 'right' ? 'text-right' : 'text-left'}`}>{children}</th>
}

export function TableCell({ children, align = 'left' }: { children: ReactNode; align?: 'left' | 'right' }) {
  return <td className={`border-t px-3 py-2 ${align === 'right' ? 'text-right tabular-nums' : ''}`}>{children}</td>
}
