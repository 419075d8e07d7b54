export const CANONICAL_PROJECT_PREFIX = 'https://wokwi.com/projects/'

/** File extracted from the project archive and written to the working directory. */
export const DIAGRAM_FILE_NAME = 'diagram.json'

export type ProjectReference = {
  /** Canonical URL, e.g. https://wokwi.com/projects/123456 */
  readonly url: string
  readonly projectId: string
}

export type RetrievalState = 'resolved' | 'downloading' | 'extracting' | 'done' | 'failed'

export type DiagramSummary = {
  version: number | string | null
  parts: number
  connections: number
}
