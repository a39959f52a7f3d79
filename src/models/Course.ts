export interface CourseComponent {
  name: string
  displayName: string
  /** Fraction of the course grade, 0..1 */
  weight: number
}

export interface CourseDefinition {
  name: string
  components: ReadonlyMap<string, CourseComponent>
  /** File the definition was loaded from, when any */
  source?: string
}

/** Course name to definition */
export type CourseCatalog = ReadonlyMap<string, CourseDefinition>
