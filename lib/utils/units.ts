/**
 * Formatting primitives for the training context.
 *
 * Every formatter takes the raw provider value (which may be missing, null or
 * the wrong type) and returns display text. Missing values become `N/A`.
 */

export const NOT_AVAILABLE = 'N/A'

export const HR_ZONE_LABELS = ['Z1', 'Z2', 'Z3', 'Z4', 'Z5', 'Z6', 'Z7'] as const

// --- Raw conversion ---

/** Finite number from a provider value, or null */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

export function metersToKm(meters: number): number {
  return meters / 1000
}

// --- Formatted strings ---

export function formatNumber(value: unknown, decimals: number, unit?: string): string {
  const n = toNumber(value)
  if (n === null) return NOT_AVAILABLE
  const text = n.toFixed(decimals)
  return unit ? `${text} ${unit}` : text
}

/** Signed fixed-precision value, e.g. +5.0 / -5.0 */
export function formatSigned(value: number, decimals: number = 1): string {
  const sign = value >= 0 ? '+' : '-'
  return `${sign}${Math.abs(value).toFixed(decimals)}`
}

/**
 * Seconds as `{h}h {m}m {s}s`, `{m}m {s}s` or `{s}s`.
 * The hour part is dropped when zero; minutes only when hours and minutes are both zero.
 */
export function formatDuration(seconds: unknown): string {
  const n = toNumber(seconds)
  if (n === null || n < 0) return NOT_AVAILABLE

  const total = Math.floor(n)
  const h = Math.floor(total / 3600)
  const m = Math.floor((total % 3600) / 60)
  const s = total % 60

  if (h > 0) return `${h}h ${m}m ${s}s`
  if (m > 0) return `${m}m ${s}s`
  return `${s}s`
}

/** Meters as kilometers to 2 decimals. Zero counts as missing. */
export function formatDistance(meters: unknown): string {
  const n = toNumber(meters)
  if (n === null || n === 0) return NOT_AVAILABLE
  return `${metersToKm(n).toFixed(2)} km`
}

/** Speed in m/s as a running pace, e.g. 4:10 /km */
export function formatPace(metersPerSecond: unknown): string {
  const n = toNumber(metersPerSecond)
  if (n === null || n <= 0) return NOT_AVAILABLE
  const secsPerKm = Math.round(1000 / n)
  const minutes = Math.floor(secsPerKm / 60)
  const seconds = secsPerKm % 60
  return `${minutes}:${seconds.toString().padStart(2, '0')} /km`
}

/**
 * Per-zone seconds aligned with Z1..Z7. Zones without time are left out;
 * returns N/A when no zone has time.
 */
export function formatZoneTimes(zoneSeconds: unknown): string {
  if (!Array.isArray(zoneSeconds)) return NOT_AVAILABLE

  const parts: string[] = []
  HR_ZONE_LABELS.forEach((label, i) => {
    const secs = toNumber(zoneSeconds[i])
    if (secs !== null && secs > 0) {
      parts.push(`${label}: ${formatDuration(secs)}`)
    }
  })

  return parts.length > 0 ? parts.join(' | ') : NOT_AVAILABLE
}
