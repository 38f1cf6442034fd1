// Schema of the persisted session file

import { z } from "zod";
import { WORKER_TYPES, type SessionRecord } from "../types/index.js";

const WorkerTypeSchema = z.enum(WORKER_TYPES);

const WorkerMachineStateSchema = z.enum([
  "Idle",
  "CollectingFields",
  "ReadyForAction",
  "AwaitingApproval",
  "Completed",
  "Cancelled",
  "Error",
]);

const FieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

const FieldMapSchema = z.record(FieldValueSchema);

const ConversationTurnSchema = z.object({
  ordinal: z.number().int().nonnegative(),
  role: z.enum(["user", "agent", "tool"]),
  content: z.string(),
  timestamp: z.number(),
  pinned: z.boolean().optional(),
});

const PendingActionSchema = z.object({
  id: z.string().min(1),
  actionId: z.string().min(1),
  params: z.object({
    fields: FieldMapSchema,
    items: z.array(FieldMapSchema),
    total: z.number(),
  }),
  workerType: WorkerTypeSchema,
  originState: WorkerMachineStateSchema,
  originOrdinal: z.number().int().nonnegative().optional(),
  summary: z.string(),
  status: z.enum(["requested", "approved", "revised", "cancelled"]),
  createdAt: z.number(),
  resolvedAt: z.number().optional(),
});

const PersistedWorkerSchema = z.object({
  state: z.object({
    type: WorkerTypeSchema,
    state: WorkerMachineStateSchema,
    fields: FieldMapSchema,
    items: z.array(FieldMapSchema),
    itemsClosed: z.boolean(),
    pendingAction: PendingActionSchema.optional(),
    lastErrors: z.array(
      z.object({
        field: z.string(),
        item: z.number().int().positive().optional(),
        message: z.string(),
      })
    ),
  }),
  history: z.array(ConversationTurnSchema),
});

export const SessionRecordSchema: z.ZodType<SessionRecord> = z.object({
  version: z.literal(1),
  session: z.object({
    id: z.string().regex(/^[A-Za-z0-9_-]+$/),
    requesterId: z.string().min(1).optional(),
    activeWorker: WorkerTypeSchema.optional(),
    outputDirectory: z.string().min(1).optional(),
    applicationDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    createdAt: z.number(),
    updatedAt: z.number(),
  }),
  dispatcher: z.object({
    history: z.array(ConversationTurnSchema),
  }),
  workers: z.object({
    travel: PersistedWorkerSchema.optional(),
    receipt: PersistedWorkerSchema.optional(),
  }),
});
