export type {
  RunRequest,
  Challenge,
  SolvedToken,
  ManagerRecord,
  EntityRecord,
  PageSnapshot,
  TransitionEvent,
  NavigationResult,
  RunDiagnostics,
  RunResult,
  RunArtifact,
  DiagnosticLogEntry
} from './models.js';
export { parseRunRequest } from './schemas.js';
