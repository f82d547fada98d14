/** A live, container-hosted environment the installer mutates. */
export type DeploymentTarget = {
  /** Stable name used for the journal file and in reports. */
  name: string;
  /** Container reference resolvable by the bridge (name or id). */
  container: string;
  /** Directory the dashboard plugins are loaded from. */
  pluginDir: string;
  /** Default `user:group` for injected files. */
  owner: string;
  /** Default octal mode for injected files, e.g. "644". */
  fileMode: string;
  /** Cache scope tag → remote directories whose contents are derived state. */
  cacheScopes: Record<string, string[]>;
};
