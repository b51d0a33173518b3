import { z } from 'zod';

// Messages and startup data exchanged between the main thread and the
// ingestion worker. Both sides validate what they receive.

export const IngestionStatsSchema = z.object({
    linesRead: z.number().int().nonnegative(),
    published: z.number().int().nonnegative(),
    dropped: z.number().int().nonnegative(),
});

export const IngestionExitSchema = z.object({
    reason: z.enum(['stopped', 'eof', 'read-error']),
    stats: IngestionStatsSchema,
    error: z.string().optional(),
});

export const WorkerMessageSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('opened') }),
    z.object({ type: z.literal('open-failed'), path: z.string(), reason: z.string() }),
    z.object({ type: z.literal('exit'), exit: IngestionExitSchema }),
]);

export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;

export const WorkerDataSchema = z.object({
    cellBuffer: z.instanceof(SharedArrayBuffer),
    stopBuffer: z.instanceof(SharedArrayBuffer),
    device: z.string().min(1),
    format: z.enum(['auto', 'quaternion', 'tilt']),
});

export type WorkerData = z.infer<typeof WorkerDataSchema>;
