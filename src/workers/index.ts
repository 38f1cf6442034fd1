export { BaseWorker } from "./BaseWorker.js";
export { TravelWorker, travelDefinition } from "./TravelWorker.js";
export { ReceiptWorker, receiptDefinition } from "./ReceiptWorker.js";
export { createWorker, describeWorkers, isWorkerType } from "./WorkerRegistry.js";
export type { Worker, WorkerDefinition, WorkerDeps, WorkerFactory, WorkerOutcome, WorkerOutcomeKind, FieldSpec } from "./types.js";
