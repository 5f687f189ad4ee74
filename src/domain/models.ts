import type { ChallengeKindValue, NavStateValue, RunStatusValue } from '../constants.js';

export interface RunRequest {
  readonly fileNumber: string;
  readonly requestId: string;
  /** Wall-clock budget for the whole run, shared by every step. */
  readonly deadlineMs: number;
}

export interface Challenge {
  readonly id: string;
  readonly kind: ChallengeKindValue;
  readonly siteKey?: string;
  readonly imageBase64?: string;
  readonly pageUrl: string;
  readonly discoveredAt: string;
}

export interface SolvedToken {
  readonly value: string;
  readonly challengeId: string;
  readonly challengeKind: ChallengeKindValue;
  readonly jobId: string;
  readonly issuedAt: string;
  readonly expiresAt: string;
}

export interface ManagerRecord {
  readonly name: string;
  readonly address: string;
  readonly role: string;
}

export interface EntityRecord {
  readonly businessName: string;
  readonly businessAddress: string;
  readonly status: string;
  readonly managers: readonly ManagerRecord[];
}

export interface PageSnapshot {
  url: string;
  html: string;
  /** HTTP status of the main document, null when the browser reported none. */
  status: number | null;
}

export interface TransitionEvent {
  from: NavStateValue;
  to: NavStateValue;
  at: string;
  elapsedMs: number;
  detail?: string;
  page: PageSnapshot | null;
}

export interface NavigationResult {
  state: NavStateValue;
  record: EntityRecord | null;
  reason?: string;
  retryable: boolean;
  searchAttempts: number;
  solveAttempts: number;
}

export interface RunDiagnostics {
  logPath: string;
  screenshotPaths: string[];
  htmlSnapshotPaths: string[];
}

export interface RunResult {
  readonly requestId: string;
  readonly fileNumber: string;
  readonly status: RunStatusValue;
  readonly record: EntityRecord | null;
  readonly error: string | null;
  readonly attempts: { search: number; solve: number };
  readonly elapsedMs: number;
  readonly completedAt: string;
  readonly diagnostics: RunDiagnostics;
}

export interface RunArtifact {
  file_number: string;
  request_id: string;
  status: RunStatusValue;
  data: {
    'Business Name': string;
    'Business Address': string;
    'Status': string;
    managers: { name: string; address: string; role: string }[];
  } | null;
  error: string | null;
  attempts: { search: number; solve: number };
  elapsed_ms: number;
  completed_at: string;
  diagnostics: {
    log: string;
    screenshots: string[];
    html_snapshots: string[];
  };
}

export interface DiagnosticLogEntry {
  ts: string;
  event: 'run_started' | 'transition' | 'run_finished';
  request_id: string;
  seq?: number;
  from?: NavStateValue;
  to?: NavStateValue;
  elapsed_ms?: number;
  detail?: string;
  screenshot?: string | null;
  file_number?: string;
  status?: RunStatusValue;
  error?: string | null;
}
