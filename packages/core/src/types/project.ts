export const PROJECT_TYPES = ['rust', 'javascript', 'python', 'documentation', 'mixed', 'unknown'] as const;

export type ProjectType = (typeof PROJECT_TYPES)[number];

/** What a project type contributes to a search scoped to the project. */
export interface ProjectProfile {
  /** Globs searched by default. Empty means every file. */
  filePatterns: readonly string[];
  /** Extra ignore patterns for the directory walk. */
  ignorePatterns: readonly string[];
}
