/** Runs tasks with at most `n` in flight; results keep task order. */
export async function pLimit<T>(n: number, tasks: (() => Promise<T>)[]) {
  const out: T[] = new Array(tasks.length)
  let i = 0
  async function run() {
    for (;;) {
      const idx = i++
      if (idx >= tasks.length) break
      out[idx] = await tasks[idx]()
    }
  }
  const workers = Array.from({ length: Math.max(1, Math.min(n, tasks.length)) }, () => run())
  await Promise.all(workers)
  return out
}

export function chunk<T>(arr: T[], size: number) {
  const out: T[][] = []
  for (let i = 0; i < arr.length; i += size) out.push(arr.slice(i, i + size))
  return out
}
