import fs from 'fs/promises';
import path from 'path';
import type { RunArtifact, RunResult } from '../domain/models.js';
import { DEFAULTS, RUN_STATUSES } from '../constants.js';
import { ArtifactWriteError, errorMessage } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

export function artifactPath(outputDir: string, requestId: string): string {
  return path.join(outputDir, `${DEFAULTS.ARTIFACT_PREFIX}${requestId}.json`);
}

export function toArtifact(result: RunResult): RunArtifact {
  const { record } = result;
  const data = result.status === RUN_STATUSES.SUCCESS && record
    ? {
      'Business Name': record.businessName,
      'Business Address': record.businessAddress,
      'Status': record.status,
      managers: record.managers.map(m => ({ name: m.name, address: m.address, role: m.role }))
    }
    : null;

  return {
    file_number: result.fileNumber,
    request_id: result.requestId,
    status: result.status,
    data,
    error: result.error,
    attempts: { ...result.attempts },
    elapsed_ms: result.elapsedMs,
    completed_at: result.completedAt,
    diagnostics: {
      log: result.diagnostics.logPath,
      screenshots: [...result.diagnostics.screenshotPaths],
      html_snapshots: [...result.diagnostics.htmlSnapshotPaths]
    }
  };
}

/**
 * Writes the artifact for a run. The file is created exclusively: a second
 * write for the same request id fails instead of replacing the first.
 */
export async function writeArtifact(outputDir: string, result: RunResult): Promise<string> {
  const filePath = artifactPath(outputDir, result.requestId);
  const body = JSON.stringify(toArtifact(result), null, 2) + '\n';

  try {
    await fs.mkdir(outputDir, { recursive: true });
    await fs.writeFile(filePath, body, { flag: 'wx' });
  } catch (error) {
    const exists = error instanceof Error && 'code' in error && error.code === 'EEXIST';
    throw new ArtifactWriteError(
      exists ? `Artifact already exists: ${filePath}` : `Failed to write artifact: ${errorMessage(error)}`,
      { filePath, originalError: error }
    );
  }

  logger.info('Artifact written', { filePath, status: result.status }, 'ARTIFACT');
  return filePath;
}
