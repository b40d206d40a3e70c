import type { ButtonHTMLAttributes } from 'react'

export function Button({ active, className = '', ...props }: ButtonHTMLAttributes<HTMLButtonElement> & { active?: boolean }) {
  return (
    <button
      {...props}
      className={`h-8 rounded-md border px-3 text-xs transition-colors disabled:opacity-50 ${active ? 'bg-accent/40 border-accent' : 'hover:bg-muted/40'} ${className}`}
    />
  )
}
