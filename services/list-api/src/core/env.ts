// services/list-api/src/core/env.ts

export function asInt(envVal: string | undefined, fallback: number): number {
  if (envVal == null || envVal.trim() === '') return fallback
  const n = Number(envVal)
  return Number.isFinite(n) ? Math.trunc(n) : fallback
}

export function asBool(envVal: string | undefined, fallback: boolean): boolean {
  if (envVal == null || envVal.trim() === '') return fallback
  const v = envVal.trim().toLowerCase()
  if (v === 'true' || v === '1' || v === 'yes' || v === 'y') return true
  if (v === 'false' || v === '0' || v === 'no' || v === 'n') return false
  return fallback
}

export function asString(envVal: string | undefined, fallback: string): string {
  const v = (envVal ?? '').trim()
  return v || fallback
}

export function clampInt(n: number, min: number, max: number): number {
  if (!Number.isFinite(n)) return min
  if (n < min) return min
  if (n > max) return max
  return Math.trunc(n)
}
