/**
 * Runtime types shared by the core modules and the command layer.
 */
import type { LineEnding } from '@dotsync/shared';

export type { LineEnding, SettingsFile } from '@dotsync/shared';

/** Resolved configuration, passed by value into every sync run */
export interface Configuration {
  /** Absolute path of the repository dot-files directory */
  repoDotFilesDir: string;
  /** Ordered absolute local target paths */
  localTargetPaths: string[];
  lineEnding: LineEnding;
}

/** A regular file found under a mirrored root, `/`-separated */
export interface FileEntry {
  relativePath: string;
}

/** What a copy did to its destination */
export type FileChange = 'created' | 'updated' | 'unchanged';

export interface CopiedFile {
  relativePath: string;
  source: string;
  destination: string;
  change: FileChange;
}

export type FileFailureKind = 'FILE_UNREADABLE' | 'FILE_UNWRITABLE';

export interface FailedFile {
  relativePath: string;
  source: string;
  destination: string;
  kind: FileFailureKind;
  reason: string;
}

/** A tracked file that one source root does not have */
export interface SkippedFile {
  relativePath: string;
  source: string;
  reason: string;
}

export interface SyncResult {
  copied: CopiedFile[];
  failed: FailedFile[];
  skipped: SkippedFile[];
}

export type VcsOperation = 'pull' | 'commit' | 'push';

export type VcsFailureKind =
  | 'VCS_UNAVAILABLE'
  | 'VCS_CONFLICT'
  | 'VCS_NETWORK'
  | 'VCS_NOTHING_TO_COMMIT'
  | 'VCS_FAILED';

export interface VcsOutcome {
  operation: VcsOperation;
  succeeded: boolean;
  message: string;
  /** Set when `succeeded` is false */
  failure?: VcsFailureKind;
}

/** Version-control capability used by the orchestrator */
export interface VersionControl {
  pull(repoDir: string): Promise<VcsOutcome>;
  commit(repoDir: string, message: string): Promise<VcsOutcome>;
  push(repoDir: string): Promise<VcsOutcome>;
}

/** Terminal states of a `repo` run */
export type RepoRunState = 'no-op' | 'files-copied' | 'committed' | 'pushed' | 'failed';
