import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { OperationResult, UpdateState } from './types.ts';

const EMPTY_STATE: UpdateState = { consecutiveFetchFailures: 0 };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isUpdateState(value: unknown): value is UpdateState {
  if (!isRecord(value)) return false;
  if (
    value.lastFetchFailureAt !== undefined &&
    typeof value.lastFetchFailureAt !== 'number'
  ) {
    return false;
  }
  return (
    typeof value.consecutiveFetchFailures === 'number' &&
    Number.isInteger(value.consecutiveFetchFailures) &&
    value.consecutiveFetchFailures >= 0
  );
}

export async function readUpdateState(statePath: string): Promise<UpdateState> {
  try {
    const content: unknown = JSON.parse(await readFile(statePath, 'utf8'));
    return isUpdateState(content) ? content : EMPTY_STATE;
  } catch {
    return EMPTY_STATE;
  }
}

export async function writeUpdateState(
  statePath: string,
  state: UpdateState
): Promise<OperationResult> {
  try {
    await mkdir(dirname(statePath), { recursive: true });
    await writeFile(statePath, JSON.stringify(state, null, 2) + '\n');
    return { success: true, data: undefined };
  } catch {
    return { success: false, error: 'Failed to write update state' };
  }
}

export async function recordFetchFailure(
  statePath: string,
  now: number = Date.now()
): Promise<number> {
  const state = await readUpdateState(statePath);
  const next = {
    consecutiveFetchFailures: state.consecutiveFetchFailures + 1,
    lastFetchFailureAt: now,
  } satisfies UpdateState;
  await writeUpdateState(statePath, next);
  return next.consecutiveFetchFailures;
}

export async function resetFetchFailures(statePath: string): Promise<void> {
  const state = await readUpdateState(statePath);
  if (state.consecutiveFetchFailures === 0) return;
  await writeUpdateState(statePath, EMPTY_STATE);
}

export function hasExceededFetchFailures(
  failures: number,
  limit: number
): boolean {
  return limit > 0 && failures >= limit;
}
