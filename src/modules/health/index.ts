/**
 * Health module exports
 */

export { makeHealthRoutes } from './shell/rest/routes.js';
export { makeFsFileProbe } from './shell/probes/fs-file-probe.js';

export {
  getReadiness,
  describeUnreadyFiles,
  type GetReadinessDeps,
  type GetReadinessInput,
} from './core/usecases/get-readiness.js';

export type { SourceFileProbe } from './core/ports.js';
export type {
  LivenessResponse,
  ReadinessResponse,
  SourceFile,
  SourceFileCheck,
  SourceFileKind,
  SourceFileState,
} from './core/types.js';
