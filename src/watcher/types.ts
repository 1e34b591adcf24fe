export enum FileEventType {
  Added = 'added',
  Changed = 'changed',
  Deleted = 'deleted',
}

export interface FileEvent {
  type: FileEventType;
  /** Absolute path on disk */
  path: string;
  /** POSIX path relative to the corpus root */
  relativePath: string;
}
