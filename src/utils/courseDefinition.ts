/**
 * Course definitions
 *
 * A course definition is a TOML file with a [course] table naming the course
 * and one table per gradable component:
 *
 *   [course]
 *   name = "CSCE-146"
 *
 *   [hw1]
 *   name = "Homework 1"
 *   weight = 0.1
 *
 * Keys other than name and weight (rubric categories) are accepted and ignored.
 */

import fs from 'fs'
import path from 'path'
import * as TOML from '@iarna/toml'
import { z } from 'zod'
import { SUBMISSION_CONFIG_FILE } from '../constants'
import { CourseCatalog, CourseComponent, CourseDefinition } from '../models/Course'
import { PsfError, errorMessage, isMissingFileError } from './errors'
import { walkFiles, isDirectory } from './fsUtils'
import { createLogger } from './logger'

const log = createLogger('Course')

const CourseHeaderSchema = z.object({
  name: z.string().min(1),
}).passthrough()

const ComponentSchema = z.object({
  name: z.string().min(1),
  weight: z.number().min(0).max(1),
}).passthrough()

const describeIssues = (error: z.ZodError) =>
  error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')

export function parseCourseDefinition(text: string, source = '<inline>'): CourseDefinition {
  let data: TOML.JsonMap
  try {
    data = TOML.parse(text)
  } catch (e) {
    throw new PsfError('MALFORMED_INPUT', `course file '${source}' is not valid TOML: ${errorMessage(e)}`, { cause: e })
  }

  const header = CourseHeaderSchema.safeParse(data.course)
  if (!header.success) {
    throw new PsfError('MALFORMED_INPUT', `course file '${source}' has an invalid [course] table: ${describeIssues(header.error)}`)
  }

  const components = new Map<string, CourseComponent>()
  for (const [key, value] of Object.entries(data)) {
    if (key === 'course') continue
    const parsed = ComponentSchema.safeParse(value)
    if (!parsed.success) {
      throw new PsfError('MALFORMED_INPUT', `course file '${source}' has a malformed component '${key}': ${describeIssues(parsed.error)}`)
    }
    components.set(key, { name: key, displayName: parsed.data.name, weight: parsed.data.weight })
  }

  return { name: header.data.name, components, source }
}

export function loadCourseDefinition(filePath: string): CourseDefinition {
  let text: string
  try {
    text = fs.readFileSync(filePath, 'utf8')
  } catch (e) {
    if (isMissingFileError(e)) throw new PsfError('NOT_FOUND', `course file '${filePath}' does not exist`, { cause: e })
    throw new PsfError('IO_ERROR', `could not read course file '${filePath}': ${errorMessage(e)}`, { cause: e })
  }
  return parseCourseDefinition(text, filePath)
}

/**
 * Load every course reachable from a course path: a colon-separated list
 * (or an array) of TOML files and directories searched recursively.
 * Submission configs met while searching directories are not courses.
 * Files that fail to load are skipped with a warning; a course name seen
 * twice keeps the later file.
 */
export function loadCourses(coursePath: string | string[]): CourseCatalog {
  const entries = (Array.isArray(coursePath) ? coursePath : coursePath.split(':')).filter((p) => p.length > 0)
  const catalog = new Map<string, CourseDefinition>()

  const tryLoad = (file: string) => {
    try {
      const course = loadCourseDefinition(file)
      if (catalog.has(course.name)) {
        log.warn(`course '${course.name}' from '${file}' replaces the definition from '${catalog.get(course.name)?.source}'`)
      }
      catalog.set(course.name, course)
      log.debug(`loaded course '${course.name}' from '${file}' (${course.components.size} components)`)
    } catch (e) {
      log.warn(`failed to load course from '${file}': ${errorMessage(e)}`)
    }
  }

  for (const entry of entries) {
    if (isDirectory(entry)) {
      walkFiles(entry, '.toml')
        .filter((file) => path.basename(file) !== SUBMISSION_CONFIG_FILE)
        .forEach(tryLoad)
    } else if (fs.existsSync(entry)) {
      tryLoad(path.resolve(entry))
    } else {
      log.warn(`course path entry '${entry}' does not exist`)
    }
  }

  return catalog
}

export function requireCourse(catalog: CourseCatalog, name: string): CourseDefinition {
  const course = catalog.get(name)
  if (!course) {
    throw new PsfError('CONFIGURATION_ERROR', `no course definition named '${name}' on the course path`)
  }
  return course
}
