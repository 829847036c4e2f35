const TRUTHY = new Set(['1', 'true', 'yes', 'on'])

export function parseBooleanEnv(value: string | undefined, fallback: boolean): boolean {
  if (!value || value.trim() === '') return fallback
  return TRUTHY.has(value.trim().toLowerCase())
}

export function parseNumberEnv(value: string | undefined, fallback: number): number {
  if (!value || value.trim() === '') return fallback
  const parsed = Number(value.trim())
  return Number.isFinite(parsed) ? parsed : fallback
}

export function parseListEnv(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
}
