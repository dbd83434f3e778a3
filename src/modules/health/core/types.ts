import { Type, type Static } from '@sinclair/typebox';

/**
 * A file the service reads at startup or on the first donations request.
 */
export const SourceFileKindSchema = Type.Union([
  Type.Literal('config'),
  Type.Literal('facility'),
  Type.Literal('region'),
]);

export type SourceFileKind = Static<typeof SourceFileKindSchema>;

export const SourceFileStateSchema = Type.Union([
  Type.Literal('readable'),
  Type.Literal('missing'),
  Type.Literal('unreadable'),
  Type.Literal('empty'),
]);

export type SourceFileState = Static<typeof SourceFileStateSchema>;

export interface SourceFile {
  kind: SourceFileKind;
  path: string;
}

export const SourceFileCheckSchema = Type.Object({
  kind: SourceFileKindSchema,
  path: Type.String(),
  state: SourceFileStateSchema,
});

export type SourceFileCheck = Static<typeof SourceFileCheckSchema>;

export const LivenessResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

/**
 * Ready means the donation config and both dataset files can be read.
 */
export const ReadinessResponseSchema = Type.Object({
  status: Type.Union([Type.Literal('ok'), Type.Literal('unhealthy')]),
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.Optional(Type.String()),
  uptime: Type.Number({ description: 'Process uptime in seconds' }),
  message: Type.Optional(Type.String()),
  files: Type.Array(SourceFileCheckSchema),
});

export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;
