import fs from 'fs'
import os from 'os'
import path from 'path'
import { createArchive, CreateArchiveOptions } from '../services/archiveStore'
import { Archive } from '../models/Archive'
import { IdentityKey } from '../models/Metadata'
import { setLogLevel } from '../utils/logger'

let workspaces: string[] = []

export const sampleKey: IdentityKey = {
  semester: 'C',
  course: 'A',
  section: 'B',
  group: 'E',
  assignment: 'D',
}

/** Fresh scratch directory, removed by cleanupTestWorkspaces */
export function createTestWorkspace(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'psf-test-'))
  workspaces.push(dir)
  return dir
}

export function cleanupTestWorkspaces() {
  for (const dir of workspaces) {
    fs.rmSync(dir, { recursive: true, force: true })
  }
  workspaces = []
}

// Keep expected warnings out of the test output
export function quietLogs() {
  setLogLevel('error')
}

export function writeFiles(root: string, files: Record<string, string>) {
  for (const [rel, content] of Object.entries(files)) {
    const target = path.join(root, rel)
    fs.mkdirSync(path.dirname(target), { recursive: true })
    fs.writeFileSync(target, content)
  }
}

export function writeSubmission(root: string, files: Record<string, string> = { 'file.txt': 'this is a test string!\n' }, dirName = 'submission'): string {
  const dir = path.join(root, dirName)
  fs.mkdirSync(dir, { recursive: true })
  writeFiles(dir, files)
  return dir
}

export function writeCourse(
  root: string,
  courseName: string,
  components: Record<string, { name: string; weight: number }>,
  fileName = `${courseName}.toml`
): string {
  const lines = ['[course]', `name = ${JSON.stringify(courseName)}`, '']
  for (const [key, component] of Object.entries(components)) {
    lines.push(`[${key}]`, `name = ${JSON.stringify(component.name)}`, `weight = ${component.weight}`, '')
  }
  const file = path.join(root, fileName)
  fs.writeFileSync(file, lines.join('\n'))
  return file
}

/**
 * Pack a one-file submission into root with the given identity; files land
 * under a per-archive source directory so several archives can share a root.
 */
export async function createTestArchive(
  root: string,
  key: Partial<IdentityKey> = {},
  options: Partial<CreateArchiveOptions> = {}
): Promise<Archive> {
  const identity = { ...sampleKey, ...key }
  const source = writeSubmission(root, undefined, `src-${Object.values(identity).join('-')}`)
  return createArchive({
    source,
    destination: root,
    allowNoConfig: true,
    metadata: identity,
    ...options,
  })
}
