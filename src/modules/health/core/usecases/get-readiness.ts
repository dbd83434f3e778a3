import type { SourceFileProbe } from '../ports.js';
import type {
  ReadinessResponse,
  SourceFile,
  SourceFileCheck,
  SourceFileKind,
} from '../types.js';

export interface GetReadinessDeps {
  probe: SourceFileProbe;
  files: readonly SourceFile[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

const KIND_LABELS: Record<SourceFileKind, string> = {
  config: 'donation config',
  facility: 'facility dataset',
  region: 'region dataset',
};

/**
 * One clause per file that is not readable, in the order the files were given.
 * Returns undefined when every file is readable.
 */
export const describeUnreadyFiles = (checks: readonly SourceFileCheck[]): string | undefined => {
  const clauses = checks
    .filter((check) => check.state !== 'readable')
    .map((check) => `${KIND_LABELS[check.kind]} is ${check.state} (${check.path})`);

  return clauses.length === 0 ? undefined : clauses.join('; ');
};

export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { probe, files, version } = deps;

  const settled = await Promise.allSettled(files.map((file) => probe(file.path)));
  const checks = files.map((file, index): SourceFileCheck => {
    const outcome = settled[index];
    return {
      kind: file.kind,
      path: file.path,
      state: outcome?.status === 'fulfilled' ? outcome.value : 'unreadable',
    };
  });

  const message = describeUnreadyFiles(checks);

  return {
    status: message === undefined ? 'ok' : 'unhealthy',
    timestamp: input.timestamp,
    uptime: input.uptime,
    files: checks,
    ...(version !== undefined && { version }),
    ...(message !== undefined && { message }),
  };
}
