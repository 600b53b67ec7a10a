/** Machine-readable description of what a change operation found and changed. */
export type ChangeReport = Record<string, unknown>;

/**
 * A unit of work that brings one working copy up to date for one dependency ecosystem.
 * Instances are created per repository with their settings and report location bound in.
 */
export interface RepoChangeOperation {
  /** The dependency ecosystem the operation handles, e.g. `nuget`. */
  readonly ecosystem: string;

  /**
   * Determine whether any change is needed and apply it to the working copy.
   * @param workingDirectory root of the checked out repository
   * @returns whether files were changed
   */
  execute(workingDirectory: string): Promise<boolean>;

  /**
   * Read the report of the changes applied by {@link execute}.
   * @returns `undefined` when no report was produced
   */
  readReport(): Promise<ChangeReport | undefined>;
}
