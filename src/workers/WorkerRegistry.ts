// Fixed map from worker type tag to factory

import { WORKER_TYPES, type PersistedWorker, type RulesConfig, type WorkerType } from "../types/index.js";
import { ReceiptWorker, receiptDefinition } from "./ReceiptWorker.js";
import { TravelWorker, travelDefinition } from "./TravelWorker.js";
import type { Worker, WorkerDefinition, WorkerDeps, WorkerFactory } from "./types.js";

const FACTORIES: Record<WorkerType, WorkerFactory> = {
  travel: (deps, persisted) => new TravelWorker(deps, persisted),
  receipt: (deps, persisted) => new ReceiptWorker(deps, persisted),
};

const DEFINITIONS: Record<WorkerType, (rules: RulesConfig) => WorkerDefinition> = {
  travel: travelDefinition,
  receipt: receiptDefinition,
};

export function isWorkerType(value: string): value is WorkerType {
  return WORKER_TYPES.some((type) => type === value);
}

export function createWorker(type: WorkerType, deps: WorkerDeps, persisted?: PersistedWorker): Worker {
  return FACTORIES[type](deps, persisted);
}

/**
 * Routing targets, in registry order.
 */
export function describeWorkers(rules: RulesConfig): Array<{ type: WorkerType; description: string }> {
  return WORKER_TYPES.map((type) => ({ type, description: DEFINITIONS[type](rules).description }));
}
