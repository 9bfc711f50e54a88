import { readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { TraceFormatError } from '../analyzer/errors.js';
import type { CallObservation, TraceArtifact } from '../analyzer/types.js';

const callObservationSchema: z.ZodType<CallObservation> = z.object({
  path: z.string(),
  line: z.number().int().positive(),
  column: z.number().int().positive(),
  name: z.string(),
  calls: z.number().int().nonnegative(),
  selfTime: z.number().nonnegative(),
  totalTime: z.number().nonnegative(),
});

const traceArtifactSchema: z.ZodType<TraceArtifact> = z.object({
  version: z.literal(1),
  script: z.string(),
  recordedAt: z.string(),
  exitCode: z.number().int().nullable(),
  durationMs: z.number().nonnegative(),
  functions: z.array(callObservationSchema),
});

/** Write an artifact, replacing any previous one at the same path */
export function writeArtifact(artifact: TraceArtifact, artifactPath: string): void {
  writeFileSync(artifactPath, JSON.stringify(artifact, null, 2), 'utf-8');
}

/** Read and validate an artifact */
export function readArtifact(artifactPath: string): TraceArtifact {
  const content = readFileSync(artifactPath, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    throw new TraceFormatError(artifactPath, err instanceof Error ? err.message : String(err));
  }

  const parsed = traceArtifactSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new TraceFormatError(artifactPath, `${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  return parsed.data;
}

/** The call observations recorded in an artifact */
export function readCallObservations(artifactPath: string): CallObservation[] {
  return readArtifact(artifactPath).functions;
}
