import { Candidate, type ValidationScore } from '../candidate';

export function score(
  validatorName: string,
  overrides: Partial<ValidationScore> = {},
): ValidationScore {
  const passed = overrides.passed ?? true;
  return {
    validatorName,
    passed,
    score: passed ? 1 : 0,
    severity: 'error',
    errors: passed ? [] : [`${validatorName} failed`],
    warnings: [],
    weight: 1,
    durationMs: 1,
    cached: false,
    ...overrides,
  };
}

export function makeCandidate(
  id: number,
  scores: ValidationScore[] = [],
  overrides: { artifact?: string; generationTimeMs?: number; taskId?: string } = {},
): Candidate {
  const candidate = new Candidate({
    id,
    taskId: overrides.taskId ?? 'task-1',
    artifact: overrides.artifact ?? `export const value${id} = ${id};`,
    temperature: 0.2,
    seed: 42 + id,
    model: 'fake-model',
    generationTimeMs: overrides.generationTimeMs ?? 10,
  });
  for (const s of scores) candidate.addScore(s);
  if (scores.length > 0) candidate.markValidated();
  return candidate;
}
