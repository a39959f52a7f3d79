import fs from 'fs'
import path from 'path'

/**
 * Every regular file below root whose name ends with extension, as absolute
 * sorted paths.
 */
export function walkFiles(root: string, extension: string): string[] {
  const base = path.resolve(root)
  return fs.readdirSync(base, { recursive: true, encoding: 'utf8' })
    .filter((rel) => rel.endsWith(extension))
    .map((rel) => path.join(base, rel))
    .filter((file) => fs.statSync(file).isFile())
    .sort()
}

export function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory()
  } catch {
    return false
  }
}

/** Temporary sibling name used for write-then-rename */
export function tempSiblingPath(target: string, token: string): string {
  return path.join(path.dirname(target), `.${path.basename(target)}.${token}.tmp`)
}
