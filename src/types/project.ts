export interface UProject {
  FileVersion?: number;
  EngineAssociation?: string; // GUID or string like "5.1"
  Plugins?: Array<{
    Name: string;
  }>;
}

export interface ProjectInfo {
  name: string;
  /** Absolute path to the .uproject file */
  path: string;
  directory: string;
  /** "From Source", "Unknown", or the engine association such as "5.3" */
  engineVersion: string;
  plugins: string[];
}
