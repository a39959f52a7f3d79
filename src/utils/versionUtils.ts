import { PsfError } from './errors'

function parseVersion(version: string): number[] {
  const parts = version.trim().split('.')
  if (parts.some((p) => !/^\d+$/.test(p))) {
    throw new PsfError('MALFORMED_INPUT', `invalid version string '${version}'`)
  }
  return parts.map(Number)
}

/**
 * Compare dotted numeric versions. Missing trailing parts count as 0, so
 * 1.2 equals 1.2.0.
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a)
  const right = parseVersion(b)
  const length = Math.max(left.length, right.length)
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0)
    if (diff !== 0) return diff < 0 ? -1 : 1
  }
  return 0
}

export function satisfiesMinimum(installed: string, minimum: string): boolean {
  return compareVersions(installed, minimum) >= 0
}
