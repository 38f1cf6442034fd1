// PendingAction construction

import { randomUUID } from "crypto";
import type { ActionParams, PendingAction, WorkerMachineState, WorkerType } from "../../types/index.js";
import { frozenSnapshot } from "../../utils/freeze.js";

export interface CreatePendingActionInput {
  actionId: string;
  params: ActionParams;
  workerType: WorkerType;
  originState: WorkerMachineState;
  originOrdinal?: number;
  summary: string;
}

/**
 * Snapshot the parameters (deep-frozen copy) and open a new request.
 * Later edits to the worker's fields never reach an action already shown.
 */
export function createPendingAction(input: CreatePendingActionInput): PendingAction {
  return {
    id: `action-${randomUUID()}`,
    actionId: input.actionId,
    params: frozenSnapshot(input.params),
    workerType: input.workerType,
    originState: input.originState,
    originOrdinal: input.originOrdinal,
    summary: input.summary,
    status: "requested",
    createdAt: Date.now(),
  };
}

/**
 * Re-freeze the params of an action loaded from disk.
 */
export function restorePendingAction(action: PendingAction): PendingAction {
  return { ...action, params: frozenSnapshot(action.params) };
}
